/**
 * 外部API応答のZodスキーマ定義
 *
 * Meta Graph API, TikTok Business API, BigQueryの応答を型安全に検証する
 */

import { z } from "zod";

// =============================================================================
// 共通
// =============================================================================

/**
 * 数値文字列を含むID（Graph APIは文字列、BigQueryは数値で返すことがある）
 */
const IdSchema = z.union([z.string(), z.number()]).transform(String);

/**
 * 数値または数値文字列のカウンター
 */
const CounterSchema = z.coerce.number().nonnegative();

/**
 * BigQueryのTIMESTAMP列（BigQueryTimestamp は { value } で返る）
 */
const TimestampSchema = z
  .union([z.date(), z.string(), z.object({ value: z.string() })])
  .transform((value) => {
    if (value instanceof Date) {
      return value;
    }
    return new Date(typeof value === "string" ? value : value.value);
  });

// =============================================================================
// Meta Graph API スキーマ
// =============================================================================

/**
 * Graph APIエラー応答
 */
export const MetaErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
  }),
});

/**
 * POST /{id} の更新結果
 */
export const MetaMutationResultSchema = z.object({
  success: z.boolean(),
});

/**
 * 広告インサイト（impressions / clicks は文字列で返る）
 */
export const MetaInsightsResponseSchema = z.object({
  data: z.array(
    z.object({
      impressions: CounterSchema.optional(),
      clicks: CounterSchema.optional(),
    })
  ),
});

export type MetaInsightsResponse = z.infer<typeof MetaInsightsResponseSchema>;

/**
 * 広告セット（daily_budget は最小通貨単位の文字列）
 */
export const MetaAdSetSchema = z.object({
  id: IdSchema,
  daily_budget: CounterSchema.optional(),
});

/**
 * 広告のストーリー仕様（再投稿のため未知のキーも保持）
 */
export const MetaObjectStorySpecSchema = z
  .object({
    page_id: z.string(),
    link_data: z
      .object({
        link: z.string().optional(),
        message: z.string().optional(),
        name: z.string().optional(),
        image_hash: z.string().optional(),
        call_to_action: z
          .object({
            type: z.string(),
            value: z.record(z.unknown()).optional(),
          })
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type MetaObjectStorySpec = z.infer<typeof MetaObjectStorySpecSchema>;

/**
 * 広告詳細
 */
export const MetaAdSchema = z.object({
  id: IdSchema,
  name: z.string().default(""),
  adset_id: IdSchema,
  campaign_id: IdSchema,
  creative: z.object({
    id: IdSchema,
    object_story_spec: MetaObjectStorySpecSchema.optional(),
  }),
});

export type MetaAd = z.infer<typeof MetaAdSchema>;

/**
 * POST /{adset_id}/copies の結果
 */
export const MetaCopyResultSchema = z.object({
  copied_adset_id: IdSchema,
});

/**
 * 作成系エンドポイント（adcreatives, ads）の結果
 */
export const MetaCreateResultSchema = z.object({
  id: IdSchema,
});

// =============================================================================
// TikTok Business API スキーマ
// =============================================================================

/**
 * 共通エンベロープ（HTTP 200 でも code != 0 はエラー）
 */
export const TikTokEnvelopeSchema = z.object({
  code: z.number(),
  message: z.string(),
  request_id: z.string().optional(),
  data: z.unknown().optional(),
});

export type TikTokEnvelope = z.infer<typeof TikTokEnvelopeSchema>;

/**
 * 統合レポート
 */
export const TikTokReportDataSchema = z.object({
  list: z.array(
    z.object({
      metrics: z.object({
        impressions: CounterSchema.optional(),
        clicks: CounterSchema.optional(),
      }),
    })
  ),
});

/**
 * 広告グループ一覧（budget は通貨単位の小数）
 */
export const TikTokAdGroupListSchema = z.object({
  list: z.array(
    z.object({
      adgroup_id: IdSchema,
      budget: CounterSchema.optional(),
    })
  ),
});

// =============================================================================
// BigQuery 行スキーマ
// =============================================================================

/**
 * キャンペーンステータス（旧データの "ACTIVE" / "live" を正規化）
 */
const CampaignStatusSchema = z.preprocess(
  (value) => {
    if (typeof value !== "string") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "live" ? "active" : normalized;
  },
  z.enum(["draft", "active", "paused", "removed"])
);

export const CampaignRowSchema = z.object({
  id: IdSchema,
  name: z.string(),
  platform: z.enum(["meta", "google", "tiktok"]),
  external_id: IdSchema.nullable().optional(),
  status: CampaignStatusSchema,
  daily_budget_cents: z.coerce.number().int().nonnegative().nullable().optional(),
  impressions: CounterSchema.default(0),
  clicks: CounterSchema.default(0),
  conversions: CounterSchema.default(0),
  spend_cents: CounterSchema.default(0),
  revenue_cents: CounterSchema.default(0),
  version: z.coerce.number().int().nonnegative().default(0),
  updated_at: TimestampSchema.nullable().optional(),
});

export type CampaignRow = z.infer<typeof CampaignRowSchema>;

export const SettingRowSchema = z.object({
  key: z.string(),
  value: z.string().nullable(),
});

export type SettingRow = z.infer<typeof SettingRowSchema>;

export const ABTestRowSchema = z.object({
  id: IdSchema,
  test_name: z.string(),
  campaign_id: IdSchema,
  platform: z.enum(["meta", "google", "tiktok"]).default("meta"),
  original_ad_id: IdSchema,
  original_adset_id: IdSchema,
  variant_ad_id: IdSchema.nullable().optional(),
  variant_adset_id: IdSchema.nullable().optional(),
  variant_type: z.enum(["headline", "image", "cta"]),
  variant_value: z.string(),
  status: z.enum(["running", "winner_original", "winner_variant", "error"]),
  confidence_level: z.coerce.number().min(0).max(100).default(0),
  winner: z.enum(["original", "variant", "inconclusive"]).nullable().optional(),
  original_budget_cents: z.coerce.number().int().nonnegative(),
  sync_status: z.enum(["pending", "synced", "failed"]).default("pending"),
  error_message: z.string().nullable().optional(),
  created_at: TimestampSchema,
  completed_at: TimestampSchema.nullable().optional(),
});

export type ABTestRow = z.infer<typeof ABTestRowSchema>;

// =============================================================================
// ヘルパー
// =============================================================================

/**
 * 配列の各要素を検証
 */
export function safeParseArray<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown[],
  options?: { skipInvalid?: boolean }
): { valid: T[]; invalid: { index: number; error: z.ZodError }[] } {
  const valid: T[] = [];
  const invalid: { index: number; error: z.ZodError }[] = [];

  for (let i = 0; i < data.length; i++) {
    const result = schema.safeParse(data[i]);
    if (result.success) {
      valid.push(result.data);
    } else {
      invalid.push({ index: i, error: result.error });
      if (!options?.skipInvalid) {
        break;
      }
    }
  }

  return { valid, invalid };
}
