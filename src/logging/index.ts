/**
 * ログ記録モジュール
 *
 * 最適化パスの実行ログと監査ログを記録する機能を提供
 */

// 型定義
export {
  ExecutionMode,
  ExecutionStatus,
  ExecutionStats,
  TriggerSource,
  AuditSeverity,
  AuditLogEntry,
  VALID_EXECUTION_MODES,
  isValidExecutionMode,
} from "./types";

// 監査ログ
export {
  AuditLog,
  AuditRecordInput,
  AuditRecorder,
  BigQueryAuditLog,
  auditEntryToRow,
} from "./auditLog";

// ExecutionLogger
export {
  ExecutionLogger,
  ExecutionLoggerOptions,
  ExecutionTracker,
  EMPTY_EXECUTION_STATS,
  createExecutionLogger,
} from "./executionLogger";

// シャドーモード
export {
  resolveExecutionMode,
  isShadowMode,
  logExecutionModeOnStartup,
} from "./shadowMode";
