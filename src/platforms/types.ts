/**
 * 広告プラットフォームアダプター型定義
 *
 * プラットフォームごとの分岐をやめ、共通の能力セットを
 * プラットフォーム単位で1回だけ実装する
 */

// =============================================================================
// 基本型
// =============================================================================

export type Platform = "meta" | "google" | "tiktok";

export const VALID_PLATFORMS: readonly Platform[] = ["meta", "google", "tiktok"] as const;

export function isValidPlatform(value: unknown): value is Platform {
  return typeof value === "string" && VALID_PLATFORMS.some((p) => p === value);
}

/**
 * 操作対象の階層
 * - campaign: キャンペーン
 * - adset: 広告セット（TikTokでは広告グループ）
 */
export type EntityLevel = "campaign" | "adset";

export interface PlatformEntityRef {
  level: EntityLevel;
  externalId: string;
}

/**
 * 広告単位の累積カウンター
 */
export interface InsightCounters {
  impressions: number;
  clicks: number;
}

// =============================================================================
// アダプター
// =============================================================================

/**
 * 全プラットフォーム共通の能力
 *
 * 失敗時は例外を投げる。結果の記録は ActionExecutor が行う。
 * 予算はすべて最小通貨単位（セント）
 */
export interface AdPlatformAdapter {
  readonly platform: Platform;
  pause(entity: PlatformEntityRef): Promise<void>;
  setBudget(entity: PlatformEntityRef, cents: number): Promise<void>;
  getAdInsights(adId: string, since: Date, until: Date): Promise<InsightCounters>;
  getAdSetBudget(adSetId: string): Promise<number>;
}

/**
 * クリエイティブ差し替え対象のフィールド
 */
export interface CreativeFields {
  headline?: string;
  imageHash?: string;
  callToAction?: string;
}

export interface AdDetails {
  adId: string;
  name: string;
  adSetId: string;
  campaignId: string;
  creativeId: string;
  creative: CreativeFields;
}

export interface CreateVariantAdInput {
  sourceAd: AdDetails;
  adSetId: string;
  name: string;
  creative: CreativeFields;
}

/**
 * クリエイティブA/Bテストを作成できるプラットフォームの追加能力
 */
export interface CreativeExperimentAdapter extends AdPlatformAdapter {
  getAd(adId: string): Promise<AdDetails>;
  duplicateAdSet(adSetId: string, nameSuffix: string): Promise<string>;
  createVariantAd(input: CreateVariantAdInput): Promise<string>;
}

export function supportsCreativeExperiments(
  adapter: AdPlatformAdapter
): adapter is CreativeExperimentAdapter {
  return "getAd" in adapter && "duplicateAdSet" in adapter && "createVariantAd" in adapter;
}
