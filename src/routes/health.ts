/**
 * ヘルスチェック・ルートインデックス
 */

import { Router, Request, Response } from "express";
import { getAllCircuitBreakerStatuses } from "../utils/retry";
import { ExecutionMode } from "../logging/types";
import { Platform } from "../platforms/types";

export interface HealthRouteOptions {
  version: string;
  executionMode: ExecutionMode;
  platforms: () => Platform[];
}

export function createHealthRouter(options: HealthRouteOptions): Router {
  const router = Router();

  // ルート一覧
  router.get("/", (_req: Request, res: Response) => {
    return res.json({
      message: "Campaign Optimizer Engine API",
      version: options.version,
      executionMode: options.executionMode,
      endpoints: {
        health: "GET /health",
        optimizer_run: "POST /optimizer/run",
        optimizer_summary: "GET /optimizer/summary",
        ab_test_results: "GET /ab-test/results",
        ab_test_create: "POST /ab-test/tests",
        ab_test_auto_optimize: "POST /ab-test/auto-optimize",
        cron_optimize: "POST /cron/optimize",
        cron_ab_test_auto_optimize: "POST /cron/ab-test-auto-optimize",
      },
    });
  });

  // ヘルスチェック（サーキットが1つでも OPEN なら degraded）
  router.get("/health", (_req: Request, res: Response) => {
    const cbStatus: Record<string, { state: string; failures: number }> = {};
    let hasOpenCircuit = false;
    getAllCircuitBreakerStatuses().forEach((status, name) => {
      cbStatus[name] = status;
      if (status.state === "OPEN") {
        hasOpenCircuit = true;
      }
    });

    return res.status(hasOpenCircuit ? 503 : 200).json({
      status: hasOpenCircuit ? "degraded" : "healthy",
      timestamp: new Date().toISOString(),
      executionMode: options.executionMode,
      platforms: options.platforms(),
      circuitBreakers: cbStatus,
    });
  });

  return router;
}
