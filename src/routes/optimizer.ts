/**
 * キャンペーン最適化 APIルート
 */

import { Router, Request, Response } from "express";
import { validateOptimizerRunRequest } from "../schemas";
import { resolveExecutionMode } from "../logging/shadowMode";
import { ExecutionMode } from "../logging/types";
import { CampaignOptimizer } from "../optimizer/campaign-optimizer";
import { sendError, sendSuccess, sendValidationErrors } from "./respond";

export interface OptimizerRouteDeps {
  optimizer: CampaignOptimizer;
  defaultExecutionMode: ExecutionMode;
}

export function createOptimizerRouter(deps: OptimizerRouteDeps): Router {
  const router = Router();

  /**
   * POST /optimizer/run
   * 最適化パスを手動実行（body.mode で APPLY / SHADOW を上書き可能）
   */
  router.post("/run", async (req: Request, res: Response) => {
    const validation = validateOptimizerRunRequest(req.body);
    if (!validation.success) {
      return sendValidationErrors(res, validation.errors);
    }

    try {
      const result = await deps.optimizer.optimizeAll({
        executionMode: resolveExecutionMode(validation.data.mode, deps.defaultExecutionMode),
        now: new Date(),
        triggerSource: "MANUAL",
      });
      return sendSuccess(res, result);
    } catch (error) {
      return sendError(res, error, "optimizer/run");
    }
  });

  /**
   * GET /optimizer/summary
   * 全キャンペーンの集計
   */
  router.get("/summary", async (_req: Request, res: Response) => {
    try {
      return sendSuccess(res, await deps.optimizer.getOptimizationSummary());
    } catch (error) {
      return sendError(res, error, "optimizer/summary");
    }
  });

  return router;
}
