/**
 * ログ記録関連の型定義
 */

// =============================================================================
// 実行モード
// =============================================================================

/**
 * 実行モード
 * - APPLY: 広告プラットフォームAPIを呼び出して変更を適用
 * - SHADOW: 判定は計算・記録するが、APIは呼び出さない
 */
export type ExecutionMode = "APPLY" | "SHADOW";

export const VALID_EXECUTION_MODES: readonly ExecutionMode[] = ["APPLY", "SHADOW"] as const;

export function isValidExecutionMode(value: string): value is ExecutionMode {
  return VALID_EXECUTION_MODES.some((mode) => mode === value);
}

/**
 * 実行ステータス
 */
export type ExecutionStatus = "RUNNING" | "SUCCESS" | "ERROR" | "PARTIAL_ERROR";

/**
 * トリガー元
 */
export type TriggerSource = "SCHEDULER" | "MANUAL" | "API";

// =============================================================================
// 監査ログ
// =============================================================================

/**
 * 監査ログの重大度
 * critical は緊急停止（SafetyBreach）専用
 */
export type AuditSeverity = "info" | "warning" | "critical";

/**
 * 監査ログエントリ（追記専用）
 */
export interface AuditLogEntry {
  action: string;
  entityType: string;
  entityId: string | null;
  details: string;
  severity: AuditSeverity;
  timestamp: Date;
}

/**
 * 監査ログ BigQuery行
 */
export interface AuditLogRow {
  action: string;
  entity_type: string;
  entity_id: string | null;
  details: string;
  severity: AuditSeverity;
  timestamp: string;
}

// =============================================================================
// 実行ログ
// =============================================================================

/**
 * 最適化パスの集計
 */
export interface ExecutionStats {
  campaignsCount: number;
  actionsCount: number;
  executedCount: number;
  failedCallsCount: number;
  errorCount: number;
  pausedCount: number;
  budgetChangesCount: number;
}

/**
 * optimizer_executions BigQuery行
 */
export interface ExecutionRow {
  execution_id: string;
  started_at: string;
  finished_at: string | null;
  mode: ExecutionMode;
  status: ExecutionStatus;
  trigger_source: TriggerSource;
  campaigns_count: number;
  actions_count: number;
  executed_count: number;
  failed_calls_count: number;
  error_count: number;
  paused_count: number;
  budget_changes_count: number;
  error_message: string | null;
  environment: string;
}
