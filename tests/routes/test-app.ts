/**
 * ルートテスト用のアプリ構築
 */

import { Express } from "express";
import { createApp } from "../../src/server";
import { ABTestManager } from "../../src/ab-test/ab-test-manager";
import { ABTest } from "../../src/ab-test/types";
import { ActionExecutor } from "../../src/apply/action-executor";
import { AuditRecorder } from "../../src/logging/auditLog";
import { ExecutionMode } from "../../src/logging/types";
import { TokenVerifier } from "../../src/middleware/auth";
import { CampaignOptimizer } from "../../src/optimizer/campaign-optimizer";
import { Campaign } from "../../src/optimizer/types";
import { PlatformRegistry } from "../../src/platforms/registry";
import {
  FakeCreativeAdapter,
  InMemoryABTestRepository,
  InMemoryAuditLog,
  InMemoryCampaignRepository,
  RecordingTracker,
  StaticSettingsStore,
  makeCampaign,
  silentLogger,
} from "../helpers/fakes";

export const TEST_API_KEY = "test-api-key";

export interface TestAppOptions {
  campaigns?: Campaign[];
  tests?: ABTest[];
  executionMode?: ExecutionMode;
  apiKey?: string;
  enableOidcAuth?: boolean;
  verifyToken?: TokenVerifier;
  settingsError?: Error;
}

export function buildTestApp(options: TestAppOptions = {}) {
  const log = silentLogger();
  const meta = new FakeCreativeAdapter("meta");
  const registry = new PlatformRegistry([meta]);
  const executor = new ActionExecutor(registry, log);
  const auditLog = new InMemoryAuditLog();
  const audit = new AuditRecorder(auditLog, log);
  const campaigns = new InMemoryCampaignRepository(options.campaigns ?? [makeCampaign()]);
  const tests = new InMemoryABTestRepository(options.tests ?? []);

  const optimizer = new CampaignOptimizer({
    campaigns,
    settings: new StaticSettingsStore(undefined, options.settingsError ?? null),
    executor,
    audit,
    createTracker: () => new RecordingTracker(),
    log,
  });
  const abTests = new ABTestManager({ tests, campaigns, registry, executor, audit, log });

  const executionMode = options.executionMode ?? "SHADOW";
  const app: Express = createApp(
    {
      optimizer,
      abTests,
      executionMode,
      platforms: () => registry.platforms(),
    },
    {
      apiKey: "apiKey" in options ? options.apiKey : TEST_API_KEY,
      googleCloudProjectId: "test-project",
      enableOidcAuth: options.enableOidcAuth ?? false,
      corsAllowedOrigins: ["https://admin.test"],
      verifyToken: options.verifyToken ?? (async () => false),
    }
  );

  return { app, meta, campaigns, tests, auditLog };
}
