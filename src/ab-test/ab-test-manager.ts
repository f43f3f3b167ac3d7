/**
 * A/Bテスト管理
 *
 * テストの作成、評価、自動最適化（敗者停止・勝者への予算復元）を行う
 */

import { logger, StructuredLogger } from "../logger";
import {
  NotFoundError,
  OptimizationPreconditionError,
  PlatformApiError,
  ValidationError,
  errorMessage,
  toError,
} from "../errors";
import { ActionExecutor } from "../apply/action-executor";
import { AuditRecorder } from "../logging/auditLog";
import { isShadowMode } from "../logging/shadowMode";
import { ExecutionMode } from "../logging/types";
import { CampaignRepository } from "../optimizer/bigquery-adapter";
import { PlatformRegistry } from "../platforms/registry";
import {
  AdPlatformAdapter,
  CreativeFields,
  supportsCreativeExperiments,
} from "../platforms/types";
import { NOOP_NOTIFIER, Notifier } from "../utils/notification";
import { buildTestResult, skipReason } from "./ab-test-evaluator";
import {
  ABTest,
  ABTestRepository,
  ABTestStatus,
  AutoOptimizeResult,
  CreateABTestInput,
  NewABTest,
  OptimizedTest,
  SkipReason,
  SyncStatus,
  TestEvaluation,
  TestResult,
  VariantType,
} from "./types";

// =============================================================================
// 型定義
// =============================================================================

export interface ABTestManagerDeps {
  tests: ABTestRepository;
  campaigns: CampaignRepository;
  registry: PlatformRegistry;
  executor: ActionExecutor;
  audit: AuditRecorder;
  notifier?: Notifier;
  log?: StructuredLogger;
  clock?: () => Date;
}

interface VariantRefs {
  variantAdId: string;
  variantAdsetId: string;
}

/**
 * 差し替えるクリエイティブ要素
 */
export function creativeOverride(variantType: VariantType, value: string): CreativeFields {
  switch (variantType) {
    case "headline":
      return { headline: value };
    case "image":
      return { imageHash: value };
    case "cta":
      return { callToAction: value };
  }
}

function requireVariant(test: ABTest): VariantRefs {
  if (!test.variantAdId || !test.variantAdsetId) {
    throw new ValidationError(
      [{ field: "variant_ad_id", message: "running test has no variant ad or ad set" }],
      `A/B test ${test.id} has no variant ad`
    );
  }
  return { variantAdId: test.variantAdId, variantAdsetId: test.variantAdsetId };
}

// =============================================================================
// ABTestManager
// =============================================================================

export class ABTestManager {
  private readonly log: StructuredLogger;
  private readonly notifier: Notifier;
  private readonly clock: () => Date;

  constructor(private readonly deps: ABTestManagerDeps) {
    this.log = deps.log ?? logger;
    this.notifier = deps.notifier ?? NOOP_NOTIFIER;
    this.clock = deps.clock ?? (() => new Date());
  }

  private requireAdapter(test: ABTest): AdPlatformAdapter {
    const adapter = this.deps.registry.get(test.platform);
    if (!adapter) {
      throw new PlatformApiError({
        platform: test.platform,
        message: `no adapter registered for platform ${test.platform}`,
      });
    }
    return adapter;
  }

  // ===========================================================================
  // 作成
  // ===========================================================================

  /**
   * 元広告の広告セットを複製し、1要素だけ差し替えた変種広告でテストを開始する
   *
   * 予算は元広告セットと変種広告セットで半分ずつに分割する。
   * 広告セット複製後に失敗した場合は status=error で記録してから例外を投げる。
   */
  async createABTest(input: CreateABTestInput): Promise<ABTest> {
    const campaign = await this.deps.campaigns.getCampaign(input.campaignId);
    if (!campaign) {
      throw new NotFoundError("Campaign", input.campaignId);
    }

    const adapter = this.deps.registry.get(campaign.platform);
    if (!adapter || !supportsCreativeExperiments(adapter)) {
      throw new ValidationError(
        [{ field: "campaign_id", message: `platform ${campaign.platform} does not support creative experiments` }],
        `Creative experiments are not supported on ${campaign.platform}`
      );
    }

    const sourceAd = await adapter.getAd(input.originalAdId);
    const originalBudgetCents = await adapter.getAdSetBudget(sourceAd.adSetId);
    const now = this.clock();

    const base: NewABTest = {
      testName: input.testName ?? `${campaign.name} ${input.variantType} test`,
      campaignId: campaign.id,
      platform: campaign.platform,
      originalAdId: sourceAd.adId,
      originalAdsetId: sourceAd.adSetId,
      variantAdId: null,
      variantAdsetId: null,
      variantType: input.variantType,
      variantValue: input.variantValue,
      status: "running",
      confidenceLevel: 0,
      winner: null,
      originalBudgetCents,
      syncStatus: "pending",
      errorMessage: null,
      createdAt: now,
      completedAt: null,
    };

    const variantAdsetId = await adapter.duplicateAdSet(sourceAd.adSetId, ` - ${input.variantType} variant`);

    let variantAdId: string;
    try {
      variantAdId = await adapter.createVariantAd({
        sourceAd,
        adSetId: variantAdsetId,
        name: `${sourceAd.name} - ${input.variantType} variant`,
        creative: creativeOverride(input.variantType, input.variantValue),
      });
    } catch (error) {
      // 複製済みの広告セットを追跡できるよう失敗状態で残す
      const failed = await this.deps.tests.createTest({
        ...base,
        variantAdsetId,
        status: "error",
        errorMessage: errorMessage(error),
        completedAt: now,
      });
      await this.deps.audit.record({
        action: "ab_test_create_failed",
        entityType: "ab_test",
        entityId: failed.id,
        details: { campaignId: campaign.id, variantAdsetId, error: errorMessage(error) },
        severity: "warning",
      });
      throw error;
    }

    // テスト作成は運用者の明示的な操作なので予算分割は常に適用する
    const halfCents = Math.floor(originalBudgetCents / 2);
    const splitOriginal = await this.deps.executor.setBudget(
      "APPLY",
      { platform: campaign.platform, level: "adset", externalId: sourceAd.adSetId },
      halfCents
    );
    const splitVariant = await this.deps.executor.setBudget(
      "APPLY",
      { platform: campaign.platform, level: "adset", externalId: variantAdsetId },
      halfCents
    );

    const created = await this.deps.tests.createTest({
      ...base,
      variantAdId,
      variantAdsetId,
      syncStatus: splitOriginal.executed && splitVariant.executed ? "synced" : "failed",
    });

    await this.deps.audit.record({
      action: "ab_test_created",
      entityType: "ab_test",
      entityId: created.id,
      details: {
        campaignId: campaign.id,
        variantType: input.variantType,
        originalBudgetCents,
        splitBudgetCents: halfCents,
        splitOriginal: splitOriginal.detail,
        splitVariant: splitVariant.detail,
      },
    });

    this.log.info("A/B test created", {
      testId: created.id,
      campaignId: campaign.id,
      variantType: input.variantType,
      syncStatus: created.syncStatus,
    });

    return created;
  }

  // ===========================================================================
  // 評価
  // ===========================================================================

  /**
   * 両アームの累積実績でz検定を行い、信頼度（常に）と勝者（条件成立時のみ）を保存する
   *
   * 終了済みのテストは結果を返すだけで、判定は書き換えない。
   */
  private async evaluateTest(test: ABTest, now: Date): Promise<{ result: TestResult; test: ABTest }> {
    const adapter = this.requireAdapter(test);
    const { variantAdId } = requireVariant(test);

    const until = test.completedAt ?? now;
    const original = await adapter.getAdInsights(test.originalAdId, test.createdAt, until);
    const variant = await adapter.getAdInsights(variantAdId, test.createdAt, until);
    const result = buildTestResult(test, original, variant);

    if (test.status !== "running") {
      return { result, test };
    }

    const updated: ABTest = {
      ...test,
      confidenceLevel: result.confidence,
      winner: result.winnerPersisted ? result.winner : test.winner,
    };
    await this.deps.tests.updateTest(updated);

    return { result, test: updated };
  }

  private async loadRunningTests(): Promise<ABTest[]> {
    try {
      return await this.deps.tests.getRunningTests();
    } catch (error) {
      throw new OptimizationPreconditionError("tests", toError(error));
    }
  }

  /**
   * 実行中の全テスト、または指定した1件を評価する
   */
  async evaluateABTests(testId?: string): Promise<TestEvaluation[]> {
    let tests: ABTest[];
    if (testId !== undefined) {
      const test = await this.deps.tests.getTest(testId);
      if (!test) {
        throw new NotFoundError("ABTest", testId);
      }
      tests = [test];
    } else {
      tests = await this.loadRunningTests();
    }

    const now = this.clock();
    const evaluations: TestEvaluation[] = [];
    for (const test of tests) {
      try {
        const { result } = await this.evaluateTest(test, now);
        evaluations.push(result);
      } catch (error) {
        this.log.error("A/B test evaluation failed", { testId: test.id, error: toError(error) });
        evaluations.push({
          kind: "failed",
          testId: test.id,
          testName: test.testName,
          error: errorMessage(error),
        });
      }
    }
    return evaluations;
  }

  // ===========================================================================
  // 自動最適化
  // ===========================================================================

  /**
   * 有意な勝者が出たテストの敗者広告セットを停止し、勝者に分割前の予算を戻す
   *
   * status は統計的判定、syncStatus はプラットフォーム反映結果を表す。
   * SHADOW モードでは判定を記録するだけでテストは running のまま残す。
   */
  async autoOptimizeABTests(mode: ExecutionMode): Promise<AutoOptimizeResult> {
    const tests = await this.loadRunningTests();
    const now = this.clock();
    const optimized: OptimizedTest[] = [];
    const skipped: SkipReason[] = [];

    for (const test of tests) {
      try {
        const outcome = await this.optimizeTest(test, mode, now);
        if ("reason" in outcome) {
          skipped.push(outcome);
        } else {
          optimized.push(outcome);
        }
      } catch (error) {
        this.log.error("A/B test auto-optimization failed", { testId: test.id, error: toError(error) });
        skipped.push({
          testId: test.id,
          testName: test.testName,
          reason: `evaluation failed: ${errorMessage(error)}`,
        });
      }
    }

    this.log.info("A/B test auto-optimization completed", {
      mode,
      runningTests: tests.length,
      optimizedCount: optimized.length,
      skippedCount: skipped.length,
    });

    return { optimizedCount: optimized.length, optimized, skipped };
  }

  private async optimizeTest(
    test: ABTest,
    mode: ExecutionMode,
    now: Date
  ): Promise<OptimizedTest | SkipReason> {
    const { result, test: evaluated } = await this.evaluateTest(test, now);

    const reason = skipReason(result);
    if (reason !== null || result.winner === "inconclusive") {
      return { testId: test.id, testName: test.testName, reason: reason ?? "no decisive winner" };
    }

    const winner = result.winner;
    const { variantAdsetId } = requireVariant(evaluated);
    const loserAdsetId = winner === "variant" ? evaluated.originalAdsetId : variantAdsetId;
    const winnerAdsetId = winner === "variant" ? variantAdsetId : evaluated.originalAdsetId;

    const pauseLoser = await this.deps.executor.pause(mode, {
      platform: evaluated.platform,
      level: "adset",
      externalId: loserAdsetId,
    });
    await this.deps.audit.record({
      action: "ab_test_pause_loser",
      entityType: "ab_test",
      entityId: test.id,
      details: { adsetId: loserAdsetId, executed: pauseLoser.executed, detail: pauseLoser.detail },
    });

    const restoreWinner = await this.deps.executor.setBudget(
      mode,
      { platform: evaluated.platform, level: "adset", externalId: winnerAdsetId },
      evaluated.originalBudgetCents
    );
    await this.deps.audit.record({
      action: "ab_test_restore_winner",
      entityType: "ab_test",
      entityId: test.id,
      details: {
        adsetId: winnerAdsetId,
        budgetCents: evaluated.originalBudgetCents,
        executed: restoreWinner.executed,
        detail: restoreWinner.detail,
      },
    });

    let syncStatus: SyncStatus = "pending";
    if (!isShadowMode(mode)) {
      syncStatus = pauseLoser.executed && restoreWinner.executed ? "synced" : "failed";

      const status: ABTestStatus = winner === "variant" ? "winner_variant" : "winner_original";
      await this.deps.tests.updateTest({
        ...evaluated,
        status,
        winner,
        syncStatus,
        completedAt: now,
      });
      await this.deps.audit.record({
        action: "ab_test_completed",
        entityType: "ab_test",
        entityId: test.id,
        details: { status, confidence: result.confidence, syncStatus },
        severity: syncStatus === "synced" ? "info" : "warning",
      });
      await this.notifier.abTestWinner({
        testId: test.id,
        testName: test.testName,
        winner,
        confidence: result.confidence,
        synced: syncStatus === "synced",
      });
    }

    return {
      testId: test.id,
      testName: test.testName,
      winner,
      confidence: result.confidence,
      pauseLoser,
      restoreWinner,
      syncStatus,
    };
  }
}
