/**
 * 広告キャンペーン自動最適化エンジン - APIサーバー
 *
 * エントリポイント: 直接実行された場合のみ startServer() でHTTPサーバーを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import express, { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import packageJson from "../package.json";
import { EnvConfig, loadEnvConfig, validateEnvConfig } from "./config";
import { SERVER } from "./constants";
import { logger } from "./logger";
import { ApiResponseBuilder, errorMessage } from "./errors";
import { apiKeyAuth, internalAuth, TokenVerifier } from "./middleware/auth";
import { createBigQueryClient, BigQueryTarget } from "./bigquery/client";
import { createPlatformRegistry } from "./platforms";
import { ActionExecutor } from "./apply/action-executor";
import { AuditRecorder, BigQueryAuditLog } from "./logging/auditLog";
import { createExecutionLogger } from "./logging/executionLogger";
import { logExecutionModeOnStartup } from "./logging/shadowMode";
import { ExecutionMode } from "./logging/types";
import { SlackNotifier } from "./utils/notification";
import { CampaignOptimizer } from "./optimizer/campaign-optimizer";
import { BigQueryCampaignRepository, BigQuerySettingsStore } from "./optimizer/bigquery-adapter";
import { ABTestManager } from "./ab-test/ab-test-manager";
import { BigQueryABTestRepository } from "./ab-test/bigquery-adapter";
import { Platform } from "./platforms/types";
import {
  createABTestRouter,
  createCronRouter,
  createHealthRouter,
  createOptimizerRouter,
} from "./routes";

// =============================================================================
// 型定義
// =============================================================================

export interface AppServices {
  optimizer: CampaignOptimizer;
  abTests: ABTestManager;
  executionMode: ExecutionMode;
  platforms: () => Platform[];
}

export interface AppSecurity {
  apiKey?: string;
  googleCloudProjectId?: string;
  enableOidcAuth: boolean;
  corsAllowedOrigins: string[];
  verifyToken?: TokenVerifier;
}

const LOCAL_ORIGINS = ["http://localhost:3000", "http://localhost:8080"];

// =============================================================================
// サービス構築
// =============================================================================

/**
 * 環境設定から最適化パスと A/B テスト管理を組み立てる
 */
export function buildServices(config: EnvConfig): AppServices {
  const bigquery = createBigQueryClient(config.bigqueryProjectId);
  const target: BigQueryTarget = {
    client: bigquery,
    projectId: config.bigqueryProjectId,
    datasetId: config.bigqueryDatasetId,
  };

  const registry = createPlatformRegistry(config);
  const executor = new ActionExecutor(registry);
  const audit = new AuditRecorder(new BigQueryAuditLog(bigquery, config.bigqueryDatasetId));
  const notifier = new SlackNotifier({
    enabled: Boolean(config.slackWebhookUrl),
    slackWebhookUrl: config.slackWebhookUrl ?? null,
    channel: config.slackChannel,
  });
  const campaigns = new BigQueryCampaignRepository(target);

  const optimizer = new CampaignOptimizer({
    campaigns,
    settings: new BigQuerySettingsStore(target),
    executor,
    audit,
    notifier,
    createTracker: (context) =>
      createExecutionLogger({
        bigquery,
        dataset: config.bigqueryDatasetId,
        mode: context.executionMode,
        triggerSource: context.triggerSource,
      }),
  });

  const abTests = new ABTestManager({
    tests: new BigQueryABTestRepository(target),
    campaigns,
    registry,
    executor,
    audit,
    notifier,
  });

  return {
    optimizer,
    abTests,
    executionMode: config.executionMode,
    platforms: () => registry.platforms(),
  };
}

// =============================================================================
// Express app
// =============================================================================

export function createApp(services: AppServices, security: AppSecurity): Express {
  const app = express();

  // ===========================================================================
  // CORS設定
  // ===========================================================================

  const allowedOrigins = [...LOCAL_ORIGINS, ...security.corsAllowedOrigins];

  app.use(
    cors({
      origin: (origin, callback) => {
        // サーバー間通信はオリジンなし
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        logger.warn("CORS request blocked", { origin });
        callback(new Error("Not allowed by CORS"));
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-API-Key", "X-Cloud-Trace-Context"],
      exposedHeaders: ["X-RateLimit-Limit", "X-RateLimit-Remaining"],
      maxAge: 86400,
    })
  );

  // ===========================================================================
  // ミドルウェア
  // ===========================================================================

  app.use(express.json({ limit: "1mb" }));
  app.use(logger.requestLogger());

  app.use(
    rateLimit({
      windowMs: SERVER.RATE_LIMIT_WINDOW_MS,
      max: SERVER.RATE_LIMIT_MAX_REQUESTS,
      message: {
        success: false,
        error: "rate-limit-exceeded",
        message: "Too many requests, please try again later.",
      },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // ===========================================================================
  // ルート
  // ===========================================================================

  const apiKeyMiddleware = apiKeyAuth(security.apiKey);
  const internalAuthMiddleware = internalAuth({
    apiKey: security.apiKey,
    projectId: security.googleCloudProjectId,
    oidcEnabled: security.enableOidcAuth,
    verifyToken: security.verifyToken,
  });

  app.use(
    createHealthRouter({
      version: packageJson.version,
      executionMode: services.executionMode,
      platforms: services.platforms,
    })
  );

  app.use(
    "/optimizer",
    apiKeyMiddleware,
    createOptimizerRouter({
      optimizer: services.optimizer,
      defaultExecutionMode: services.executionMode,
    })
  );

  app.use(
    "/ab-test",
    apiKeyMiddleware,
    createABTestRouter({
      manager: services.abTests,
      defaultExecutionMode: services.executionMode,
    })
  );

  // Cloud Scheduler 用（API Key または OIDC）
  app.use(
    "/cron",
    internalAuthMiddleware,
    createCronRouter({
      optimizer: services.optimizer,
      abTests: services.abTests,
      executionMode: services.executionMode,
    })
  );

  // エラーハンドリング（JSON パース失敗など）
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled error", { error: err, path: req.path });
    res.status(500).json(ApiResponseBuilder.error(err));
  });

  return app;
}

// =============================================================================
// サーバー起動
// =============================================================================

/**
 * 環境変数を検証し、HTTPサーバーを起動する
 *
 * @returns サーバー起動完了後にresolve（プロセスは終了しない）
 */
export async function startServer(): Promise<void> {
  const envValidation = validateEnvConfig();
  if (!envValidation.valid) {
    throw new Error(`Environment validation failed: ${envValidation.errors.join(", ")}`);
  }

  const config = loadEnvConfig();
  logExecutionModeOnStartup(config.executionMode);

  const services = buildServices(config);
  const app = createApp(services, config);

  return new Promise<void>((resolve) => {
    app.listen(config.port, () => {
      logger.info("Server started", {
        service: packageJson.name,
        version: packageJson.version,
        port: config.port,
        environment: config.nodeEnv,
        executionMode: config.executionMode,
        platforms: services.platforms(),
        authEnabled: Boolean(config.apiKey) || config.enableOidcAuth,
        notificationsEnabled: Boolean(config.slackWebhookUrl),
      });
      resolve();
    });
  });
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error("Failed to start server", {
      service: packageJson.name,
      error: errorMessage(error),
    });
    process.exit(1);
  });
}
