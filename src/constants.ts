/**
 * 広告キャンペーン自動最適化エンジン - 定数定義
 */

// =============================================================================
// サーバー設定
// =============================================================================
export const SERVER = {
  /** デフォルトポート */
  DEFAULT_PORT: 8080,
  /** レート制限: ウィンドウ（ミリ秒） */
  RATE_LIMIT_WINDOW_MS: 60 * 1000,
  /** レート制限: ウィンドウあたりの最大リクエスト数 */
  RATE_LIMIT_MAX_REQUESTS: 60,
} as const;

// =============================================================================
// Meta Marketing API
// =============================================================================
export const META_GRAPH_API = {
  BASE_URL: "https://graph.facebook.com",
  DEFAULT_VERSION: "v19.0",
  /** APIリクエストのタイムアウト（ミリ秒） */
  REQUEST_TIMEOUT_MS: 30000,
} as const;

// =============================================================================
// TikTok Business API
// =============================================================================
export const TIKTOK_API = {
  BASE_URL: "https://business-api.tiktok.com/open_api/v1.3",
  REQUEST_TIMEOUT_MS: 30000,
} as const;

// =============================================================================
// BigQuery設定
// =============================================================================
export const BIGQUERY = {
  PROJECT_ID: "campaign-optimizer",
  DATASET_ID: "ad_automation",
} as const;

export const TABLES = {
  CAMPAIGNS: "campaigns",
  SETTINGS: "settings",
  AB_TESTS: "ab_tests",
  AUDIT_LOG: "audit_log",
  EXECUTIONS: "optimizer_executions",
} as const;

// =============================================================================
// キャンペーン最適化ルール（金額はセント）
// =============================================================================
export const OPTIMIZER_RULES = {
  MIN_IMPRESSIONS_FOR_DECISION: 100,
  MIN_CLICKS_FOR_DECISION: 10,
  LOW_CTR_THRESHOLD: 0.005,
  HIGH_CTR_THRESHOLD: 0.03,
  LOW_CONVERSION_RATE: 0.01,

  BUDGET_INCREASE_FACTOR: 1.25,
  BUDGET_DECREASE_FACTOR: 0.75,
  MIN_DAILY_BUDGET_CENTS: 300,
  MAX_DAILY_BUDGET_CENTS: 5000,
  /** 予算未設定キャンペーンの基準値 */
  DEFAULT_DAILY_BUDGET_CENTS: 1000,

  /** 不振停止: 消化額と ROAS */
  UNDERPERFORMER_MIN_SPEND_CENTS: 2000,
  UNDERPERFORMER_MAX_ROAS: 0.5,

  /** LP問題: CPC 閾値 */
  LANDING_PAGE_PAUSE_CPC_CENTS: 100,
  LANDING_PAGE_REDUCE_CPC_CENTS: 50,

  SCALE_WINNER_MAX_CPC_CENTS: 20,
  SCALE_WINNER_FACTOR: 1.2,
  SCALE_WINNER_MAX_BUDGET_CENTS: 2500,

  /** ROAS 予算調整 */
  ROAS_ADJUSTMENT_MIN_SPEND_CENTS: 2000,
  ROAS_STRONG_MULTIPLIER: 1.5,
  ROAS_DECREASE_MIN_SPEND_CENTS: 5000,
  ROAS_PAUSE_MIN_SPEND_CENTS: 10000,
  ROAS_PAUSE_MAX_ROAS: 0.5,

  /** CPC が日予算のこの割合を超えたら入札見直しを提案 */
  HIGH_CPC_BUDGET_RATIO: 0.5,
} as const;

// =============================================================================
// アカウント設定のデフォルト（ドル）
// =============================================================================
export const DEFAULT_SETTINGS = {
  daily_spend_limit: "200.0",
  monthly_spend_limit: "5000.0",
  min_roas_threshold: "1.5",
  emergency_pause_loss: "500.0",
} as const;

// =============================================================================
// A/Bテスト
// =============================================================================
export const AB_TEST = {
  MIN_IMPRESSIONS_PER_VARIANT: 1000,
  CONFIDENCE_THRESHOLD: 95,
} as const;
