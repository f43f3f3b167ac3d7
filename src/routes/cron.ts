/**
 * Cronジョブエンドポイント
 *
 * Cloud Scheduler から呼ばれる。実行モードは常に環境の既定値。
 */

import { Router, Request, Response } from "express";
import { ExecutionMode } from "../logging/types";
import { CampaignOptimizer } from "../optimizer/campaign-optimizer";
import { ABTestManager } from "../ab-test/ab-test-manager";
import { sendError, sendSuccess } from "./respond";

export interface CronRouteDeps {
  optimizer: CampaignOptimizer;
  abTests: ABTestManager;
  executionMode: ExecutionMode;
}

export function createCronRouter(deps: CronRouteDeps): Router {
  const router = Router();

  router.post("/optimize", async (_req: Request, res: Response) => {
    try {
      const result = await deps.optimizer.optimizeAll({
        executionMode: deps.executionMode,
        now: new Date(),
        triggerSource: "SCHEDULER",
      });
      return sendSuccess(res, result);
    } catch (error) {
      return sendError(res, error, "cron/optimize");
    }
  });

  router.post("/ab-test-auto-optimize", async (_req: Request, res: Response) => {
    try {
      return sendSuccess(res, await deps.abTests.autoOptimizeABTests(deps.executionMode));
    } catch (error) {
      return sendError(res, error, "cron/ab-test-auto-optimize");
    }
  });

  return router;
}
