/**
 * BigQuery クライアント
 *
 * ADC（Application Default Credentials）認証で動作する。
 * Cloud Run 上ではサービスアカウントの認証情報を自動取得。
 */

import { BigQuery } from "@google-cloud/bigquery";
import { z } from "zod";
import { logger } from "../logger";
import { BigQueryError, toError } from "../errors";
import { safeParseArray } from "../schemas/external-api";

export interface BigQueryTarget {
  client: BigQuery;
  projectId: string;
  datasetId: string;
}

/**
 * BigQuery クライアントを生成
 */
export function createBigQueryClient(projectId: string): BigQuery {
  const client = new BigQuery({ projectId });
  logger.debug("BigQuery client initialized", { projectId });
  return client;
}

/**
 * 完全修飾テーブル名を生成
 */
export function getFullTableName(target: BigQueryTarget, tableName: string): string {
  return `${target.projectId}.${target.datasetId}.${tableName}`;
}

/**
 * クエリを実行し、各行をスキーマで検証して返す
 *
 * 検証に失敗した行はスキップして警告ログを出す
 */
export async function executeQuery<T>(
  target: BigQueryTarget,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  query: string,
  params?: Record<string, unknown>
): Promise<T[]> {
  let rows: unknown[];
  try {
    [rows] = await target.client.query({ query, params });
  } catch (error) {
    logger.error("BigQuery query failed", {
      error: toError(error).message,
      query: query.substring(0, 200),
    });
    throw BigQueryError.fromError(toError(error));
  }

  const { valid, invalid } = safeParseArray(schema, rows, { skipInvalid: true });
  if (invalid.length > 0) {
    logger.warn("Skipped invalid BigQuery rows", {
      invalidCount: invalid.length,
      firstIssue: invalid[0].error.issues[0]?.message,
      query: query.substring(0, 200),
    });
  }
  return valid;
}

/**
 * DMLクエリを実行（INSERT/UPDATE/DELETE）し、影響行数を返す
 *
 * null を渡すパラメータは types で型を指定する
 */
export async function executeDml(
  target: BigQueryTarget,
  query: string,
  params?: Record<string, unknown>,
  types?: Record<string, string>
): Promise<number> {
  try {
    const [job] = await target.client.createQueryJob({ query, params, types });
    await job.getQueryResults();

    const [metadata] = await job.getMetadata();
    const numDmlAffectedRows: unknown = metadata?.statistics?.query?.numDmlAffectedRows;

    logger.debug("BigQuery DML executed", {
      affectedRows: numDmlAffectedRows,
    });

    return typeof numDmlAffectedRows === "string" || typeof numDmlAffectedRows === "number"
      ? parseInt(String(numDmlAffectedRows), 10)
      : 0;
  } catch (error) {
    logger.error("BigQuery DML failed", {
      error: toError(error).message,
      query: query.substring(0, 200),
    });
    throw BigQueryError.fromError(toError(error));
  }
}
