/**
 * A/Bテスト APIルート
 *
 * テストの作成、評価結果の取得、勝者の自動反映
 */

import { Router, Request, Response } from "express";
import {
  validateABTestResultsQuery,
  validateCreateABTestRequest,
  validateOptimizerRunRequest,
} from "../schemas";
import { resolveExecutionMode } from "../logging/shadowMode";
import { ExecutionMode } from "../logging/types";
import { ABTestManager } from "../ab-test/ab-test-manager";
import { sendError, sendSuccess, sendValidationErrors } from "./respond";

export interface ABTestRouteDeps {
  manager: ABTestManager;
  defaultExecutionMode: ExecutionMode;
}

export function createABTestRouter(deps: ABTestRouteDeps): Router {
  const router = Router();

  /**
   * GET /ab-test/results?testId=
   * 実行中の全テスト（または指定テスト）を評価して返す
   */
  router.get("/results", async (req: Request, res: Response) => {
    const validation = validateABTestResultsQuery(req.query);
    if (!validation.success) {
      return sendValidationErrors(res, validation.errors);
    }

    try {
      const results = await deps.manager.evaluateABTests(validation.data.testId);
      return sendSuccess(res, { count: results.length, results });
    } catch (error) {
      return sendError(res, error, "ab-test/results");
    }
  });

  /**
   * POST /ab-test/tests
   * 元広告の広告セットを複製して新しいテストを作成
   */
  router.post("/tests", async (req: Request, res: Response) => {
    const validation = validateCreateABTestRequest(req.body);
    if (!validation.success) {
      return sendValidationErrors(res, validation.errors);
    }

    const body = validation.data;
    try {
      const test = await deps.manager.createABTest({
        campaignId: body.campaign_id,
        originalAdId: body.original_ad_id,
        variantType: body.variant_type,
        variantValue: body.variant_value,
        testName: body.test_name,
      });
      return sendSuccess(res, test, 201);
    } catch (error) {
      return sendError(res, error, "ab-test/tests");
    }
  });

  /**
   * POST /ab-test/auto-optimize
   * 有意な勝者が出たテストを反映（body.mode で APPLY / SHADOW を上書き可能）
   */
  router.post("/auto-optimize", async (req: Request, res: Response) => {
    const validation = validateOptimizerRunRequest(req.body);
    if (!validation.success) {
      return sendValidationErrors(res, validation.errors);
    }

    try {
      const mode = resolveExecutionMode(validation.data.mode, deps.defaultExecutionMode);
      return sendSuccess(res, await deps.manager.autoOptimizeABTests(mode));
    } catch (error) {
      return sendError(res, error, "ab-test/auto-optimize");
    }
  });

  return router;
}
