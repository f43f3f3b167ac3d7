/**
 * BigQuery マイグレーションスクリプト
 *
 * sql/ 以下のテーブル定義をデータセットに適用する
 */

import { BigQuery } from "@google-cloud/bigquery";
import * as fs from "fs";
import * as path from "path";
import { BIGQUERY } from "../constants";
import { errorMessage } from "../errors";
import { logger } from "../logger";

export interface MigrationConfig {
  projectId: string;
  dataset: string;
  dryRun?: boolean;
  /** 既定はカレントディレクトリの sql/ */
  schemaDir?: string;
  location?: string;
}

/**
 * 適用順のスキーマファイル
 */
export const SCHEMA_FILES = [
  "campaigns.sql",
  "settings.sql",
  "ab_tests.sql",
  "audit_log.sql",
  "optimizer_executions.sql",
] as const;

/**
 * SQLファイルを読み込み、プレースホルダーを置換
 */
export function loadSqlFile(schemaDir: string, filename: string, config: MigrationConfig): string {
  const sql = fs.readFileSync(path.join(schemaDir, filename), "utf-8");
  return sql
    .replace(/\$\{PROJECT_ID\}/g, config.projectId)
    .replace(/\$\{DATASET\}/g, config.dataset);
}

/**
 * SQLを個別のステートメントに分割（行コメントは除く）
 */
export function splitSqlStatements(sql: string): string[] {
  return sql
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/**
 * マイグレーション実行
 */
export async function runMigration(config: MigrationConfig): Promise<void> {
  const bigquery = new BigQuery({ projectId: config.projectId });
  const schemaDir = config.schemaDir ?? path.join(process.cwd(), "sql");

  logger.info("Starting BigQuery migration", {
    projectId: config.projectId,
    dataset: config.dataset,
    dryRun: config.dryRun ?? false,
    schemaCount: SCHEMA_FILES.length,
  });

  const dataset = bigquery.dataset(config.dataset);
  const [exists] = await dataset.exists();
  if (!exists) {
    if (config.dryRun) {
      logger.info("[DRY RUN] Would create dataset", { dataset: config.dataset });
    } else {
      await bigquery.createDataset(config.dataset, { location: config.location ?? "US" });
      logger.info("Created dataset", { dataset: config.dataset });
    }
  }

  for (const filename of SCHEMA_FILES) {
    try {
      const statements = splitSqlStatements(loadSqlFile(schemaDir, filename, config));
      for (const statement of statements) {
        if (config.dryRun) {
          logger.info("[DRY RUN] Would execute SQL", { filename, preview: statement.substring(0, 100) });
          continue;
        }
        await bigquery.query(statement);
        logger.info("Executed SQL statement", { filename });
      }
    } catch (error) {
      logger.error("Failed to process schema", { filename, error: errorMessage(error) });
      throw error;
    }
  }

  logger.info("Migration completed successfully");
}

async function main(): Promise<void> {
  await runMigration({
    projectId: process.env.BIGQUERY_PROJECT_ID || BIGQUERY.PROJECT_ID,
    dataset: process.env.BIGQUERY_DATASET_ID || BIGQUERY.DATASET_ID,
    dryRun: process.argv.includes("--dry-run"),
  });
}

// CLI実行時のみ
if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error("Migration failed", { error: errorMessage(error) });
    process.exit(1);
  });
}
