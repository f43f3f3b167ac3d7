/**
 * キャンペーン最適化モジュール
 *
 * - ルール評価（ルールインタープリター）
 * - セーフティガード（全体予算縮小・緊急停止）
 * - 最適化パスの実行と集計
 */

// 型定義
export {
  Campaign,
  CampaignStatus,
  OptimizerSettings,
  CampaignMetrics,
  DecisionAction,
  Mutation,
  Decision,
  RuleState,
  RuleOutcome,
  OptimizationRule,
  CampaignEvaluation,
  BudgetAdjustment,
  SafetyOutcome,
  OptimizationContext,
  ActionName,
  ActionRecord,
  OptimizeAllResult,
  OptimizationSummary,
} from "./types";

// ルール
export { DEFAULT_RULES } from "./rules";
export { evaluateCampaign, hasMutations } from "./rule-evaluator";
export { evaluateSafetyLimits, SafetyInput } from "./safety-guard";
export { computeMetrics, clampBudget, effectiveBudgetCents } from "./metrics";

// 設定
export {
  SettingsStore,
  RawSettings,
  parseSettings,
  DEFAULT_OPTIMIZER_SETTINGS,
} from "./settings";

// 最適化パス
export {
  CampaignOptimizer,
  CampaignOptimizerDeps,
  summarizeActions,
} from "./campaign-optimizer";

// BigQuery
export {
  CampaignRepository,
  BigQueryCampaignRepository,
  BigQuerySettingsStore,
  rowToCampaign,
} from "./bigquery-adapter";
