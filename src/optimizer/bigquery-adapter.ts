/**
 * キャンペーン最適化 BigQueryアダプター
 *
 * キャンペーンの読み込み・楽観的排他付き保存と、アカウント設定の読み込み
 */

import { TABLES } from "../constants";
import { BigQueryTarget, executeDml, executeQuery, getFullTableName } from "../bigquery/client";
import { CampaignRow, CampaignRowSchema, SettingRowSchema } from "../schemas/external-api";
import { parseSettings, RawSettings, SettingsStore } from "./settings";
import { Campaign, OptimizerSettings } from "./types";

// =============================================================================
// 型定義
// =============================================================================

export interface CampaignRepository {
  /** status が active（旧データの ACTIVE / live を含む）のキャンペーン */
  getActiveCampaigns(): Promise<Campaign[]>;
  getAllCampaigns(): Promise<Campaign[]>;
  getCampaign(campaignId: string): Promise<Campaign | null>;
  /**
   * 保存済みの version が expectedVersion と一致する場合のみ書き込む
   * @returns 書き込んだ場合 true
   */
  saveCampaign(campaign: Campaign, expectedVersion: number): Promise<boolean>;
}

// =============================================================================
// データ変換
// =============================================================================

export function rowToCampaign(row: CampaignRow): Campaign {
  return {
    id: row.id,
    name: row.name,
    platform: row.platform,
    externalId: row.external_id ?? null,
    status: row.status,
    dailyBudgetCents: row.daily_budget_cents ?? null,
    impressions: row.impressions,
    clicks: row.clicks,
    conversions: row.conversions,
    spendCents: row.spend_cents,
    revenueCents: row.revenue_cents,
    updatedAt: row.updated_at ?? null,
    version: row.version,
  };
}

// =============================================================================
// BigQuery実装
// =============================================================================

export class BigQueryCampaignRepository implements CampaignRepository {
  constructor(private readonly target: BigQueryTarget) {}

  private get table(): string {
    return getFullTableName(this.target, TABLES.CAMPAIGNS);
  }

  async getActiveCampaigns(): Promise<Campaign[]> {
    const rows = await executeQuery(
      this.target,
      CampaignRowSchema,
      `SELECT * FROM \`${this.table}\` WHERE LOWER(status) IN ('active', 'live')`
    );
    return rows.map(rowToCampaign);
  }

  async getAllCampaigns(): Promise<Campaign[]> {
    const rows = await executeQuery(this.target, CampaignRowSchema, `SELECT * FROM \`${this.table}\``);
    return rows.map(rowToCampaign);
  }

  async getCampaign(campaignId: string): Promise<Campaign | null> {
    const rows = await executeQuery(
      this.target,
      CampaignRowSchema,
      `SELECT * FROM \`${this.table}\` WHERE id = @id LIMIT 1`,
      { id: campaignId }
    );
    return rows.length > 0 ? rowToCampaign(rows[0]) : null;
  }

  async saveCampaign(campaign: Campaign, expectedVersion: number): Promise<boolean> {
    const affected = await executeDml(
      this.target,
      `UPDATE \`${this.table}\`
       SET status = @status,
           daily_budget_cents = IF(@hasBudget, @dailyBudgetCents, NULL),
           updated_at = TIMESTAMP(@updatedAt),
           version = @version
       WHERE id = @id AND version = @expectedVersion`,
      {
        id: campaign.id,
        status: campaign.status,
        hasBudget: campaign.dailyBudgetCents !== null,
        dailyBudgetCents: campaign.dailyBudgetCents ?? 0,
        updatedAt: (campaign.updatedAt ?? new Date()).toISOString(),
        version: campaign.version,
        expectedVersion,
      }
    );
    return affected > 0;
  }
}

export class BigQuerySettingsStore implements SettingsStore {
  constructor(private readonly target: BigQueryTarget) {}

  async getSettings(): Promise<OptimizerSettings> {
    const rows = await executeQuery(
      this.target,
      SettingRowSchema,
      `SELECT key, value FROM \`${getFullTableName(this.target, TABLES.SETTINGS)}\``
    );
    const raw: RawSettings = {};
    for (const row of rows) {
      raw[row.key] = row.value;
    }
    return parseSettings(raw);
  }
}
