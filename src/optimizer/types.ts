/**
 * キャンペーン最適化 型定義
 *
 * 金額はすべて最小通貨単位（セント）の整数
 */

import { Platform } from "../platforms/types";
import { ExecutionMode, TriggerSource } from "../logging/types";

// =============================================================================
// キャンペーン
// =============================================================================

export type CampaignStatus = "draft" | "active" | "paused" | "removed";

export interface Campaign {
  id: string;
  name: string;
  platform: Platform;
  /** プラットフォーム側のID（未公開の間は null） */
  externalId: string | null;
  status: CampaignStatus;
  dailyBudgetCents: number | null;

  // 作成時からの累積値
  impressions: number;
  clicks: number;
  conversions: number;
  spendCents: number;
  revenueCents: number;

  updatedAt: Date | null;
  /** 楽観的排他制御のバージョン */
  version: number;
}

// =============================================================================
// 設定
// =============================================================================

/**
 * アカウント全体の閾値（パス開始時に1回だけ読み込むスナップショット）
 */
export interface OptimizerSettings {
  dailySpendLimitCents: number;
  monthlySpendLimitCents: number;
  /** 0 の場合は認知目的モード（ROASによる停止を行わない） */
  minRoasThreshold: number;
  emergencyPauseLossCents: number;
}

// =============================================================================
// 判定
// =============================================================================

export interface CampaignMetrics {
  ctr: number;
  conversionRate: number;
  roas: number;
  cpcCents: number;
}

export type DecisionAction =
  | "waiting"
  | "pause_underperformer"
  | "landing_page_pause"
  | "landing_page_budget_decrease"
  | "scale_winner"
  | "budget_increase"
  | "budget_decrease"
  | "paused"
  | "flag_low_ctr"
  | "flag_high_cpc"
  | "no_change";

export type Mutation =
  | { type: "pause" }
  | { type: "set_budget"; fromCents: number; toCents: number };

export interface Decision {
  action: DecisionAction;
  reason: string;
  mutation?: Mutation;
}

/**
 * ルール適用中の状態
 */
export interface RuleState {
  readonly campaign: Campaign;
  readonly settings: OptimizerSettings;
  readonly metrics: CampaignMetrics;
  budgetCents: number;
  paused: boolean;
}

/**
 * ルールの結果
 * terminal=true の場合、以降のルールは評価しない
 */
export interface RuleOutcome {
  decisions: Decision[];
  terminal: boolean;
}

export interface OptimizationRule {
  readonly name: string;
  /** 該当しない場合は null */
  apply(state: Readonly<RuleState>): RuleOutcome | null;
}

export interface CampaignEvaluation {
  campaignId: string;
  metrics: CampaignMetrics;
  decisions: Decision[];
  /** 予算変更がなければ元の値（null を含む） */
  finalBudgetCents: number | null;
  paused: boolean;
  /** 評価を打ち切ったルール名 */
  terminatedBy: string | null;
}

// =============================================================================
// セーフティガード
// =============================================================================

export interface BudgetAdjustment {
  campaignId: string;
  fromCents: number;
  toCents: number;
}

export interface SafetyOutcome {
  scaleDown: {
    totalBudgetCents: number;
    limitCents: number;
    factor: number;
    adjustments: BudgetAdjustment[];
  } | null;
  emergency: {
    netLossCents: number;
    thresholdCents: number;
    pausedCampaignIds: string[];
  } | null;
}

// =============================================================================
// 最適化パス
// =============================================================================

/**
 * 1回の呼び出しごとに構築するコンテキスト
 */
export interface OptimizationContext {
  executionMode: ExecutionMode;
  now: Date;
  triggerSource: TriggerSource;
}

export type ActionName = DecisionAction | "global_budget_scale" | "emergency_pause_all" | "error";

export interface ActionRecord {
  campaignId: string | null;
  campaignName?: string;
  platform?: Platform;
  action: ActionName;
  reason: string;
  /** プラットフォームへの反映に成功したか */
  executed: boolean;
  detail?: string;
  oldBudgetCents?: number;
  newBudgetCents?: number;
}

export interface OptimizeAllResult {
  executionId: string;
  executionMode: ExecutionMode;
  /** 評価に成功したキャンペーン数 */
  optimizedCount: number;
  errorCount: number;
  actions: ActionRecord[];
  timestamp: string;
  message?: string;
}

export interface OptimizationSummary {
  totalCampaigns: number;
  active: number;
  totalSpendCents: number;
  totalRevenueCents: number;
  overallRoas: number;
}
