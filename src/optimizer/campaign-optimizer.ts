/**
 * キャンペーン最適化パス
 *
 * 稼働中キャンペーンを読み込み → ルール評価 → 保存 → プラットフォーム反映 →
 * セーフティガード の順に1回実行する。SHADOW モードでは保存もしない。
 * キャンペーン単位で失敗を隔離し、読み込み失敗のみパス全体を中断する。
 */

import { logger, StructuredLogger } from "../logger";
import {
  ConcurrentModificationError,
  OptimizationPreconditionError,
  errorMessage,
  toError,
} from "../errors";
import { ActionExecutor, ActionTarget, ExecutionResult, SHADOW_MODE_DETAIL } from "../apply/action-executor";
import { AuditRecorder } from "../logging/auditLog";
import { EMPTY_EXECUTION_STATS, ExecutionTracker } from "../logging/executionLogger";
import { ExecutionStats } from "../logging/types";
import { isShadowMode } from "../logging/shadowMode";
import { NOOP_NOTIFIER, Notifier } from "../utils/notification";
import { CampaignRepository } from "./bigquery-adapter";
import { formatCents, roundTo } from "./metrics";
import { evaluateCampaign, hasMutations } from "./rule-evaluator";
import { evaluateSafetyLimits, SafetyInput } from "./safety-guard";
import { SettingsStore } from "./settings";
import {
  ActionRecord,
  BudgetAdjustment,
  Campaign,
  Decision,
  OptimizationContext,
  OptimizationSummary,
  OptimizeAllResult,
  OptimizerSettings,
  SafetyOutcome,
} from "./types";

// =============================================================================
// 型定義
// =============================================================================

export interface CampaignOptimizerDeps {
  campaigns: CampaignRepository;
  settings: SettingsStore;
  executor: ActionExecutor;
  audit: AuditRecorder;
  createTracker: (context: OptimizationContext) => ExecutionTracker;
  notifier?: Notifier;
  log?: StructuredLogger;
}

interface CampaignPassResult {
  records: ActionRecord[];
  /** 保存後の状態（変更がなければ読み込み時のまま） */
  current: Campaign;
}

function campaignTarget(campaign: Campaign): ActionTarget {
  return {
    platform: campaign.platform,
    level: "campaign",
    externalId: campaign.externalId,
  };
}

function errorRecord(campaign: Campaign, error: unknown): ActionRecord {
  return {
    campaignId: campaign.id,
    campaignName: campaign.name,
    platform: campaign.platform,
    action: "error",
    reason: errorMessage(error),
    executed: false,
  };
}

export function summarizeActions(
  actions: ActionRecord[],
  campaignsCount: number,
  errorCount: number
): ExecutionStats {
  const pausedIds = new Set<string>();
  for (const action of actions) {
    if (
      action.campaignId !== null &&
      (action.action === "pause_underperformer" ||
        action.action === "landing_page_pause" ||
        action.action === "paused" ||
        action.action === "emergency_pause_all")
    ) {
      pausedIds.add(action.campaignId);
    }
  }

  return {
    campaignsCount,
    actionsCount: actions.length,
    executedCount: actions.filter((a) => a.executed).length,
    failedCallsCount: actions.filter(
      (a) => !a.executed && a.detail !== undefined && a.detail !== SHADOW_MODE_DETAIL
    ).length,
    errorCount,
    pausedCount: pausedIds.size,
    budgetChangesCount: actions.filter((a) => a.newBudgetCents !== undefined).length,
  };
}

// =============================================================================
// CampaignOptimizer
// =============================================================================

export class CampaignOptimizer {
  private readonly log: StructuredLogger;
  private readonly notifier: Notifier;

  constructor(private readonly deps: CampaignOptimizerDeps) {
    this.log = deps.log ?? logger;
    this.notifier = deps.notifier ?? NOOP_NOTIFIER;
  }

  /**
   * 稼働中の全キャンペーンを1回ずつ評価する
   *
   * @throws {OptimizationPreconditionError} キャンペーンまたは設定の読み込みに失敗した場合
   */
  async optimizeAll(context: OptimizationContext): Promise<OptimizeAllResult> {
    const tracker = this.deps.createTracker(context);
    await tracker.start();
    const executionId = tracker.getExecutionId();
    const log = this.log.child({ executionId, mode: context.executionMode });

    const campaigns = await this.loadPrecondition(tracker, "campaigns", () =>
      this.deps.campaigns.getActiveCampaigns()
    );
    const settings = await this.loadPrecondition(tracker, "settings", () =>
      this.deps.settings.getSettings()
    );

    const base = {
      executionId,
      executionMode: context.executionMode,
      timestamp: context.now.toISOString(),
    };

    if (campaigns.length === 0) {
      await tracker.finish("SUCCESS", EMPTY_EXECUTION_STATS);
      return { ...base, optimizedCount: 0, errorCount: 0, actions: [], message: "No active campaigns" };
    }

    const actions: ActionRecord[] = [];
    const safetyInputs: SafetyInput[] = [];
    let optimizedCount = 0;
    let errorCount = 0;

    for (const campaign of campaigns) {
      try {
        const result = await this.optimizeCampaign(campaign, settings, context);
        actions.push(...result.records);
        safetyInputs.push({ campaign: result.current, pausedThisPass: result.current.status === "paused" });
        optimizedCount++;
      } catch (error) {
        errorCount++;
        actions.push(errorRecord(campaign, error));
        safetyInputs.push({ campaign, pausedThisPass: false });
        log.error("Campaign evaluation failed", {
          campaignId: campaign.id,
          error: toError(error),
        });
        await this.deps.audit.record({
          action: "error",
          entityType: "campaign",
          entityId: campaign.id,
          details: { error: errorMessage(error) },
          severity: "warning",
        });
      }
    }

    // セーフティガードは全キャンペーンの評価後に1回だけ
    const outcome = evaluateSafetyLimits(safetyInputs, settings);
    const safety = await this.applySafety(outcome, safetyInputs, context, executionId);
    actions.push(...safety.records);
    errorCount += safety.errorCount;

    const stats = summarizeActions(actions, campaigns.length, errorCount);
    await tracker.finish(errorCount > 0 ? "PARTIAL_ERROR" : "SUCCESS", stats);

    log.info("Optimization pass completed", { ...stats, optimizedCount });

    return { ...base, optimizedCount, errorCount, actions };
  }

  /**
   * 全キャンペーンの集計
   */
  async getOptimizationSummary(): Promise<OptimizationSummary> {
    const campaigns = await this.deps.campaigns.getAllCampaigns();
    const totalSpendCents = campaigns.reduce((sum, c) => sum + c.spendCents, 0);
    const totalRevenueCents = campaigns.reduce((sum, c) => sum + c.revenueCents, 0);
    return {
      totalCampaigns: campaigns.length,
      active: campaigns.filter((c) => c.status === "active").length,
      totalSpendCents,
      totalRevenueCents,
      overallRoas: totalSpendCents > 0 ? roundTo(totalRevenueCents / totalSpendCents, 2) : 0,
    };
  }

  // ===========================================================================
  // 内部処理
  // ===========================================================================

  private async loadPrecondition<T>(
    tracker: ExecutionTracker,
    stage: "campaigns" | "settings",
    load: () => Promise<T>
  ): Promise<T> {
    try {
      return await load();
    } catch (error) {
      const failure = new OptimizationPreconditionError(stage, toError(error));
      this.log.error("Optimization precondition failed", { stage, error: toError(error) });
      await tracker.finish("ERROR", EMPTY_EXECUTION_STATS, failure.message);
      throw failure;
    }
  }

  /**
   * version が一致しない場合は ConcurrentModificationError
   */
  private async save(updated: Campaign, expectedVersion: number): Promise<void> {
    const saved = await this.deps.campaigns.saveCampaign(updated, expectedVersion);
    if (!saved) {
      throw new ConcurrentModificationError("campaign", updated.id, expectedVersion);
    }
  }

  private async optimizeCampaign(
    campaign: Campaign,
    settings: OptimizerSettings,
    context: OptimizationContext
  ): Promise<CampaignPassResult> {
    const evaluation = evaluateCampaign(campaign, settings);

    let current = campaign;
    if (hasMutations(evaluation)) {
      current = {
        ...campaign,
        dailyBudgetCents: evaluation.finalBudgetCents,
        status: evaluation.paused ? "paused" : campaign.status,
        updatedAt: context.now,
        version: campaign.version + 1,
      };
      // プラットフォーム呼び出しより先に保存し、競合時は何も送らない
      if (!isShadowMode(context.executionMode)) {
        await this.save(current, campaign.version);
      }
    }

    const records: ActionRecord[] = [];
    for (const decision of evaluation.decisions) {
      const result = await this.executeDecision(decision, campaign, context);
      const record: ActionRecord = {
        campaignId: campaign.id,
        campaignName: campaign.name,
        platform: campaign.platform,
        action: decision.action,
        reason: decision.reason,
        executed: result?.executed ?? false,
      };
      if (result) {
        record.detail = result.detail;
      }
      if (decision.mutation?.type === "set_budget") {
        record.oldBudgetCents = decision.mutation.fromCents;
        record.newBudgetCents = decision.mutation.toCents;
      }
      records.push(record);

      await this.deps.audit.record({
        action: decision.action,
        entityType: "campaign",
        entityId: campaign.id,
        details: {
          reason: decision.reason,
          executed: record.executed,
          detail: record.detail,
          mode: context.executionMode,
        },
        severity: decision.mutation?.type === "pause" ? "warning" : "info",
      });
    }

    return { records, current };
  }

  private async executeDecision(
    decision: Decision,
    campaign: Campaign,
    context: OptimizationContext
  ): Promise<ExecutionResult | null> {
    const mutation = decision.mutation;
    if (!mutation) {
      return null;
    }
    if (mutation.type === "pause") {
      return this.deps.executor.pause(context.executionMode, campaignTarget(campaign));
    }
    return this.deps.executor.setBudget(context.executionMode, campaignTarget(campaign), mutation.toCents);
  }

  /**
   * 緊急停止の保存が競合した場合、最新の行を読み直して停止を上書きする
   *
   * @returns 保存できた場合 true
   */
  private async persistEmergencyPause(
    campaignId: string,
    adjustment: BudgetAdjustment | undefined,
    context: OptimizationContext
  ): Promise<boolean> {
    let failure: unknown;
    try {
      const latest = await this.deps.campaigns.getCampaign(campaignId);
      if (latest) {
        const paused: Campaign = {
          ...latest,
          dailyBudgetCents: adjustment ? adjustment.toCents : latest.dailyBudgetCents,
          status: "paused",
          updatedAt: context.now,
          version: latest.version + 1,
        };
        if (await this.deps.campaigns.saveCampaign(paused, latest.version)) {
          this.log.warn("Emergency pause saved after reloading campaign", {
            campaignId,
            version: paused.version,
          });
          return true;
        }
      }
      failure = new ConcurrentModificationError("campaign", campaignId, latest ? latest.version : 0);
    } catch (error) {
      failure = error;
    }

    this.log.error("Emergency pause could not be saved", { campaignId, error: toError(failure) });
    await this.deps.audit.record({
      action: "emergency_pause_write_failed",
      entityType: "campaign",
      entityId: campaignId,
      details: { error: errorMessage(failure) },
      severity: "critical",
    });
    return false;
  }

  private async applySafety(
    outcome: SafetyOutcome,
    inputs: SafetyInput[],
    context: OptimizationContext,
    executionId: string
  ): Promise<{ records: ActionRecord[]; errorCount: number }> {
    const records: ActionRecord[] = [];
    let errorCount = 0;

    const adjustments = new Map<string, BudgetAdjustment>();
    for (const adjustment of outcome.scaleDown?.adjustments ?? []) {
      adjustments.set(adjustment.campaignId, adjustment);
    }
    const pauseIds = new Set(outcome.emergency?.pausedCampaignIds ?? []);

    for (const { campaign } of inputs) {
      const adjustment = adjustments.get(campaign.id);
      const pause = pauseIds.has(campaign.id);
      if (!adjustment && !pause) {
        continue;
      }

      const updated: Campaign = {
        ...campaign,
        dailyBudgetCents: adjustment ? adjustment.toCents : campaign.dailyBudgetCents,
        status: pause ? "paused" : campaign.status,
        updatedAt: context.now,
        version: campaign.version + 1,
      };

      try {
        if (!isShadowMode(context.executionMode)) {
          await this.save(updated, campaign.version);
        }
      } catch (error) {
        if (!pause) {
          errorCount++;
          records.push(errorRecord(campaign, error));
          this.log.error("Safety guard write failed", { campaignId: campaign.id, error: toError(error) });
          continue;
        }
        // 緊急停止は保存の成否にかかわらずプラットフォームへ送る
        const persisted = await this.persistEmergencyPause(campaign.id, adjustment, context);
        if (!persisted) {
          errorCount++;
        }
      }

      if (adjustment && outcome.scaleDown) {
        const result = await this.deps.executor.setBudget(
          context.executionMode,
          campaignTarget(campaign),
          adjustment.toCents
        );
        records.push({
          campaignId: campaign.id,
          campaignName: campaign.name,
          platform: campaign.platform,
          action: "global_budget_scale",
          reason:
            `Total budget ${formatCents(outcome.scaleDown.totalBudgetCents)} exceeds limit ` +
            `${formatCents(outcome.scaleDown.limitCents)}, scaled by ${outcome.scaleDown.factor.toFixed(2)}`,
          executed: result.executed,
          detail: result.detail,
          oldBudgetCents: adjustment.fromCents,
          newBudgetCents: adjustment.toCents,
        });
      }

      if (pause && outcome.emergency) {
        const result = await this.deps.executor.pause(context.executionMode, campaignTarget(campaign));
        records.push({
          campaignId: campaign.id,
          campaignName: campaign.name,
          platform: campaign.platform,
          action: "emergency_pause_all",
          reason:
            `Net loss ${formatCents(outcome.emergency.netLossCents)} exceeds emergency threshold ` +
            `${formatCents(outcome.emergency.thresholdCents)}`,
          executed: result.executed,
          detail: result.detail,
        });
      }
    }

    if (outcome.scaleDown) {
      await this.deps.audit.record({
        action: "global_budget_scale",
        entityType: "account",
        details: {
          totalBudgetCents: outcome.scaleDown.totalBudgetCents,
          limitCents: outcome.scaleDown.limitCents,
          factor: outcome.scaleDown.factor,
          adjustments: outcome.scaleDown.adjustments,
        },
        severity: "warning",
      });
    }

    if (outcome.emergency) {
      await this.deps.audit.record({
        action: "emergency_pause_all",
        entityType: "account",
        details: {
          netLossCents: outcome.emergency.netLossCents,
          thresholdCents: outcome.emergency.thresholdCents,
          pausedCampaignIds: outcome.emergency.pausedCampaignIds,
          executionId,
        },
        severity: "critical",
      });
      this.log.warn("Emergency pause triggered", {
        executionId,
        netLossCents: outcome.emergency.netLossCents,
        pausedCount: outcome.emergency.pausedCampaignIds.length,
      });
      await this.notifier.emergencyPause({
        netLossCents: outcome.emergency.netLossCents,
        thresholdCents: outcome.emergency.thresholdCents,
        pausedCount: outcome.emergency.pausedCampaignIds.length,
        executionId,
      });
    }

    return { records, errorCount };
  }
}
