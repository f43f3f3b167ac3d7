/**
 * 監査ログ
 *
 * すべての判定と、実行・試行したすべてのプラットフォーム操作を
 * 追記専用で記録する
 */

import { BigQuery } from "@google-cloud/bigquery";
import { logger, StructuredLogger } from "../logger";
import { TABLES } from "../constants";
import { errorMessage } from "../errors";
import { AuditLogEntry, AuditLogRow, AuditSeverity } from "./types";

// =============================================================================
// インターフェース
// =============================================================================

/**
 * 監査ログの書き込み先
 */
export interface AuditLog {
  append(entries: AuditLogEntry[]): Promise<void>;
}

/**
 * 記録時の入力（timestamp は記録時に付与）
 */
export interface AuditRecordInput {
  action: string;
  entityType: string;
  entityId?: string | number | null;
  details: string | Record<string, unknown>;
  severity?: AuditSeverity;
}

// =============================================================================
// BigQuery実装
// =============================================================================

export function auditEntryToRow(entry: AuditLogEntry): AuditLogRow {
  return {
    action: entry.action,
    entity_type: entry.entityType,
    entity_id: entry.entityId,
    details: entry.details,
    severity: entry.severity,
    timestamp: entry.timestamp.toISOString(),
  };
}

export class BigQueryAuditLog implements AuditLog {
  constructor(
    private readonly bigquery: BigQuery,
    private readonly dataset: string
  ) {}

  async append(entries: AuditLogEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }
    await this.bigquery
      .dataset(this.dataset)
      .table(TABLES.AUDIT_LOG)
      .insert(entries.map(auditEntryToRow));
  }
}

// =============================================================================
// AuditRecorder
// =============================================================================

/**
 * 監査ログへの書き込みラッパー
 *
 * 書き込み失敗は構造化ログに残し、呼び出し元へは伝播しない
 * （監査ログの障害で最適化パスを止めない）
 */
export class AuditRecorder {
  constructor(
    private readonly sink: AuditLog,
    private readonly log: StructuredLogger = logger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async record(input: AuditRecordInput): Promise<void> {
    const entry: AuditLogEntry = {
      action: input.action,
      entityType: input.entityType,
      entityId: input.entityId === undefined || input.entityId === null
        ? null
        : String(input.entityId),
      details: typeof input.details === "string"
        ? input.details
        : JSON.stringify(input.details),
      severity: input.severity ?? "info",
      timestamp: this.clock(),
    };

    try {
      await this.sink.append([entry]);
    } catch (error) {
      this.log.error("Failed to write audit log entry", {
        action: entry.action,
        entityType: entry.entityType,
        entityId: entry.entityId,
        error: errorMessage(error),
      });
    }
  }
}
