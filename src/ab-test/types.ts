/**
 * A/Bテスト型定義
 *
 * 元広告と変種広告のCTRを比較するクリエイティブ実験。
 * 統計的判定（status / winner）とプラットフォーム反映（syncStatus）は別フィールドで持つ。
 */

import { ExecutionResult } from "../apply/action-executor";
import { Platform } from "../platforms/types";

// =============================================================================
// 基本型
// =============================================================================

/**
 * A/Bテストのステータス
 */
export type ABTestStatus =
  | "running"          // 実行中
  | "winner_original"  // 元広告の勝ち
  | "winner_variant"   // 変種広告の勝ち
  | "error";           // 作成途中で失敗

export type ABTestWinner = "original" | "variant" | "inconclusive";

export type DecisiveWinner = Exclude<ABTestWinner, "inconclusive">;

/**
 * 差し替えるクリエイティブ要素
 */
export type VariantType = "headline" | "image" | "cta";

/**
 * プラットフォームへの反映状況
 * - pending: 未反映（シャドーモード等）
 * - synced: 全操作が成功
 * - failed: 失敗した操作がある
 */
export type SyncStatus = "pending" | "synced" | "failed";

// =============================================================================
// テスト
// =============================================================================

export interface ABTest {
  id: string;
  testName: string;
  campaignId: string;
  platform: Platform;

  originalAdId: string;
  originalAdsetId: string;
  /** running の間は必ず設定されている */
  variantAdId: string | null;
  variantAdsetId: string | null;

  variantType: VariantType;
  variantValue: string;

  status: ABTestStatus;
  /** 0-100 */
  confidenceLevel: number;
  winner: ABTestWinner | null;
  /** 分割前の予算。勝者の広告セットに戻す */
  originalBudgetCents: number;
  syncStatus: SyncStatus;
  errorMessage: string | null;

  createdAt: Date;
  /** running から遷移したときに1回だけ設定 */
  completedAt: Date | null;
}

export type NewABTest = Omit<ABTest, "id">;

export interface ABTestRepository {
  getRunningTests(): Promise<ABTest[]>;
  getTest(testId: string): Promise<ABTest | null>;
  createTest(test: NewABTest): Promise<ABTest>;
  updateTest(test: ABTest): Promise<void>;
}

// =============================================================================
// 統計
// =============================================================================

export interface ArmCounts {
  impressions: number;
  clicks: number;
}

export interface ArmStats extends ArmCounts {
  ctr: number;
}

export interface ZTestResult {
  /** 検定不能（片側0インプレッション、プールCTRが0または1）の場合は null */
  zScore: number | null;
  pValue: number | null;
  /** (1 - p) * 100、小数2桁 */
  confidence: number;
  significant: boolean;
  winner: ABTestWinner;
}

export interface TestResult extends ZTestResult {
  kind: "evaluated";
  testId: string;
  testName: string;
  status: ABTestStatus;
  original: ArmStats;
  variant: ArmStats;
  minImpressionsMet: boolean;
  /** winner を保存したか */
  winnerPersisted: boolean;
}

export interface TestEvaluationFailure {
  kind: "failed";
  testId: string;
  testName: string;
  error: string;
}

export type TestEvaluation = TestResult | TestEvaluationFailure;

// =============================================================================
// 自動最適化
// =============================================================================

export interface SkipReason {
  testId: string;
  testName: string;
  reason: string;
}

export interface OptimizedTest {
  testId: string;
  testName: string;
  winner: DecisiveWinner;
  confidence: number;
  pauseLoser: ExecutionResult;
  restoreWinner: ExecutionResult;
  syncStatus: SyncStatus;
}

export interface AutoOptimizeResult {
  optimizedCount: number;
  optimized: OptimizedTest[];
  skipped: SkipReason[];
}

// =============================================================================
// 作成
// =============================================================================

export interface CreateABTestInput {
  campaignId: string;
  originalAdId: string;
  variantType: VariantType;
  variantValue: string;
  testName?: string;
}
