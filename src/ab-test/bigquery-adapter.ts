/**
 * A/Bテスト BigQueryアダプター
 *
 * テスト行の作成・更新・読み込み。
 * 作成直後に UPDATE するため、ストリーミング挿入ではなく DML の INSERT を使う。
 */

import { v4 as uuidv4 } from "uuid";
import { TABLES } from "../constants";
import { BigQueryTarget, executeDml, executeQuery, getFullTableName } from "../bigquery/client";
import { ABTestRow, ABTestRowSchema } from "../schemas/external-api";
import { ABTest, ABTestRepository, NewABTest } from "./types";

// =============================================================================
// データ変換
// =============================================================================

/**
 * ABTestをBigQueryクエリパラメータに変換
 */
export function testToRecord(test: ABTest): Record<string, unknown> {
  return {
    id: test.id,
    test_name: test.testName,
    campaign_id: test.campaignId,
    platform: test.platform,
    original_ad_id: test.originalAdId,
    original_adset_id: test.originalAdsetId,
    variant_ad_id: test.variantAdId,
    variant_adset_id: test.variantAdsetId,
    variant_type: test.variantType,
    variant_value: test.variantValue,
    status: test.status,
    confidence_level: test.confidenceLevel,
    winner: test.winner,
    original_budget_cents: test.originalBudgetCents,
    sync_status: test.syncStatus,
    error_message: test.errorMessage,
    created_at: test.createdAt.toISOString(),
    completed_at: test.completedAt ? test.completedAt.toISOString() : null,
  };
}

/**
 * BigQuery行をABTestに変換
 */
export function recordToTest(row: ABTestRow): ABTest {
  return {
    id: row.id,
    testName: row.test_name,
    campaignId: row.campaign_id,
    platform: row.platform,
    originalAdId: row.original_ad_id,
    originalAdsetId: row.original_adset_id,
    variantAdId: row.variant_ad_id ?? null,
    variantAdsetId: row.variant_adset_id ?? null,
    variantType: row.variant_type,
    variantValue: row.variant_value,
    status: row.status,
    confidenceLevel: row.confidence_level,
    winner: row.winner ?? null,
    originalBudgetCents: row.original_budget_cents,
    syncStatus: row.sync_status,
    errorMessage: row.error_message ?? null,
    createdAt: row.created_at,
    completedAt: row.completed_at ?? null,
  };
}

/**
 * null になりうるパラメータの型
 */
const NULLABLE_PARAM_TYPES: Record<string, string> = {
  variant_ad_id: "STRING",
  variant_adset_id: "STRING",
  winner: "STRING",
  error_message: "STRING",
  completed_at: "STRING",
};

// =============================================================================
// BigQuery実装
// =============================================================================

export class BigQueryABTestRepository implements ABTestRepository {
  constructor(private readonly target: BigQueryTarget) {}

  private get table(): string {
    return getFullTableName(this.target, TABLES.AB_TESTS);
  }

  async getRunningTests(): Promise<ABTest[]> {
    const rows = await executeQuery(
      this.target,
      ABTestRowSchema,
      `SELECT * FROM \`${this.table}\` WHERE status = 'running' ORDER BY created_at`
    );
    return rows.map(recordToTest);
  }

  async getTest(testId: string): Promise<ABTest | null> {
    const rows = await executeQuery(
      this.target,
      ABTestRowSchema,
      `SELECT * FROM \`${this.table}\` WHERE id = @id LIMIT 1`,
      { id: testId }
    );
    return rows.length > 0 ? recordToTest(rows[0]) : null;
  }

  async createTest(test: NewABTest): Promise<ABTest> {
    const created: ABTest = { ...test, id: uuidv4() };
    await executeDml(
      this.target,
      `INSERT INTO \`${this.table}\`
         (id, test_name, campaign_id, platform, original_ad_id, original_adset_id,
          variant_ad_id, variant_adset_id, variant_type, variant_value, status,
          confidence_level, winner, original_budget_cents, sync_status, error_message,
          created_at, completed_at)
       VALUES
         (@id, @test_name, @campaign_id, @platform, @original_ad_id, @original_adset_id,
          @variant_ad_id, @variant_adset_id, @variant_type, @variant_value, @status,
          @confidence_level, @winner, @original_budget_cents, @sync_status, @error_message,
          TIMESTAMP(@created_at), TIMESTAMP(@completed_at))`,
      testToRecord(created),
      NULLABLE_PARAM_TYPES
    );
    return created;
  }

  async updateTest(test: ABTest): Promise<void> {
    await executeDml(
      this.target,
      `UPDATE \`${this.table}\`
       SET variant_ad_id = @variant_ad_id,
           variant_adset_id = @variant_adset_id,
           status = @status,
           confidence_level = @confidence_level,
           winner = @winner,
           sync_status = @sync_status,
           error_message = @error_message,
           completed_at = TIMESTAMP(@completed_at)
       WHERE id = @id`,
      testToRecord(test),
      NULLABLE_PARAM_TYPES
    );
  }
}
