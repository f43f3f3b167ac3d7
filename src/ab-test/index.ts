/**
 * A/Bテストモジュール
 *
 * クリエイティブ変種のCTRをz検定で比較し、
 * 勝者が確定したら敗者の広告セットを停止して勝者に予算を戻す
 */

// 型定義
export {
  ABTestStatus,
  ABTestWinner,
  DecisiveWinner,
  VariantType,
  SyncStatus,
  ABTest,
  NewABTest,
  ABTestRepository,
  ArmCounts,
  ArmStats,
  ZTestResult,
  TestResult,
  TestEvaluationFailure,
  TestEvaluation,
  SkipReason,
  OptimizedTest,
  AutoOptimizeResult,
  CreateABTestInput,
} from "./types";

// 評価
export {
  normalCdf,
  twoProportionZTest,
  toArmStats,
  minImpressionsMet,
  buildTestResult,
  skipReason,
} from "./ab-test-evaluator";

// 管理
export { ABTestManager, ABTestManagerDeps, creativeOverride } from "./ab-test-manager";

// BigQuery
export { BigQueryABTestRepository, testToRecord, recordToTest } from "./bigquery-adapter";
