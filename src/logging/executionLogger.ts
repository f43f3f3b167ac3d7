/**
 * ExecutionLogger
 *
 * 最適化パス1回ごとの実行ログを記録するクラス
 * BigQueryの optimizer_executions テーブルに書き込む
 */

import { BigQuery } from "@google-cloud/bigquery";
import { v4 as uuidv4 } from "uuid";
import { logger } from "../logger";
import { TABLES } from "../constants";
import { errorMessage } from "../errors";
import {
  ExecutionMode,
  ExecutionStatus,
  ExecutionStats,
  ExecutionRow,
  TriggerSource,
} from "./types";

// =============================================================================
// 型定義
// =============================================================================

export interface ExecutionLoggerOptions {
  bigquery: BigQuery;
  dataset: string;
  mode: ExecutionMode;
  triggerSource: TriggerSource;
}

/**
 * 最適化パスから見た実行ログの契約
 */
export interface ExecutionTracker {
  getExecutionId(): string;
  start(): Promise<void>;
  finish(status: ExecutionStatus, stats: ExecutionStats, errorMessage?: string): Promise<void>;
}

export const EMPTY_EXECUTION_STATS: ExecutionStats = {
  campaignsCount: 0,
  actionsCount: 0,
  executedCount: 0,
  failedCallsCount: 0,
  errorCount: 0,
  pausedCount: 0,
  budgetChangesCount: 0,
};

// =============================================================================
// ExecutionLogger クラス
// =============================================================================

export class ExecutionLogger implements ExecutionTracker {
  private readonly executionId: string;
  private readonly startedAt: Date;

  constructor(private readonly options: ExecutionLoggerOptions) {
    this.executionId = uuidv4();
    this.startedAt = new Date();
  }

  getExecutionId(): string {
    return this.executionId;
  }

  getMode(): ExecutionMode {
    return this.options.mode;
  }

  private buildRow(
    status: ExecutionStatus,
    stats: ExecutionStats,
    finishedAt: Date | null,
    error?: string
  ): ExecutionRow {
    return {
      execution_id: this.executionId,
      started_at: this.startedAt.toISOString(),
      finished_at: finishedAt ? finishedAt.toISOString() : null,
      mode: this.options.mode,
      status,
      trigger_source: this.options.triggerSource,
      campaigns_count: stats.campaignsCount,
      actions_count: stats.actionsCount,
      executed_count: stats.executedCount,
      failed_calls_count: stats.failedCallsCount,
      error_count: stats.errorCount,
      paused_count: stats.pausedCount,
      budget_changes_count: stats.budgetChangesCount,
      error_message: error ?? null,
      environment: process.env.NODE_ENV ?? "development",
    };
  }

  private async insert(row: ExecutionRow): Promise<void> {
    await this.options.bigquery
      .dataset(this.options.dataset)
      .table(TABLES.EXECUTIONS)
      .insert([row]);
  }

  /**
   * 実行開始を記録
   */
  async start(): Promise<void> {
    try {
      await this.insert(this.buildRow("RUNNING", EMPTY_EXECUTION_STATS, null));
      logger.info("Optimization execution started", {
        executionId: this.executionId,
        mode: this.options.mode,
        triggerSource: this.options.triggerSource,
      });
    } catch (error) {
      // ログ失敗は実行を止めない
      logger.error("Failed to log execution start", {
        executionId: this.executionId,
        error: errorMessage(error),
      });
    }
  }

  /**
   * 実行完了を記録
   *
   * BigQueryのストリーミング挿入行は直後にUPDATEできないため、完了行を追記する
   */
  async finish(
    status: ExecutionStatus,
    stats: ExecutionStats,
    error?: string
  ): Promise<void> {
    try {
      await this.insert(this.buildRow(status, stats, new Date(), error));
      logger.info("Optimization execution finished", {
        executionId: this.executionId,
        status,
        ...stats,
        durationMs: Date.now() - this.startedAt.getTime(),
      });
    } catch (insertError) {
      logger.error("Failed to log execution finish", {
        executionId: this.executionId,
        error: errorMessage(insertError),
      });
    }
  }
}

export function createExecutionLogger(options: ExecutionLoggerOptions): ExecutionLogger {
  return new ExecutionLogger(options);
}
