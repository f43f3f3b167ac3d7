/**
 * Meta Marketing API（Graph API）クライアント
 *
 * - キャンペーン / 広告セットの停止と日予算変更
 * - 広告インサイト取得
 * - クリエイティブA/Bテスト用の広告セット複製と変種広告作成
 *
 * Graph API の予算は最小通貨単位（セント）なので変換しない
 */

import { z } from "zod";
import { META_GRAPH_API } from "../constants";
import { ConfigurationError, PlatformApiError } from "../errors";
import { withRetry, RetryConfig } from "../utils/retry";
import {
  MetaAdSchema,
  MetaAdSetSchema,
  MetaCopyResultSchema,
  MetaCreateResultSchema,
  MetaErrorResponseSchema,
  MetaInsightsResponseSchema,
  MetaMutationResultSchema,
  MetaAd,
  MetaObjectStorySpec,
} from "../schemas/external-api";
import { FetchFn, formatDate, parseResponse, requestJson } from "./http";
import {
  AdDetails,
  CreateVariantAdInput,
  CreativeExperimentAdapter,
  CreativeFields,
  InsightCounters,
  PlatformEntityRef,
} from "./types";

export interface MetaClientOptions {
  accessToken: string;
  apiVersion?: string;
  /** act_ プレフィックスなしの広告アカウントID */
  adAccountId?: string;
  baseUrl?: string;
  fetchFn?: FetchFn;
  retryConfig?: Partial<RetryConfig>;
}

export const META_CIRCUIT_NAME = "meta-graph-api";

const AD_FIELDS = "id,name,adset_id,campaign_id,creative{id,object_story_spec}";

function extractMetaError(body: unknown): string | undefined {
  const parsed = MetaErrorResponseSchema.safeParse(body);
  return parsed.success ? parsed.data.error.message : undefined;
}

function toCreativeFields(ad: MetaAd): CreativeFields {
  const linkData = ad.creative.object_story_spec?.link_data;
  return {
    headline: linkData?.name,
    imageHash: linkData?.image_hash,
    callToAction: linkData?.call_to_action?.type,
  };
}

export class MetaGraphClient implements CreativeExperimentAdapter {
  readonly platform = "meta" as const;

  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: MetaClientOptions) {
    const version = options.apiVersion ?? META_GRAPH_API.DEFAULT_VERSION;
    this.baseUrl = `${options.baseUrl ?? META_GRAPH_API.BASE_URL}/${version}`;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  // ===========================================================================
  // 共通
  // ===========================================================================

  private async call<T>(
    operation: string,
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: Record<string, unknown> = {}
  ): Promise<T> {
    return withRetry(
      async () => {
        let url = `${this.baseUrl}/${path}`;
        if (method === "GET") {
          const query = new URLSearchParams();
          for (const [key, value] of Object.entries(params)) {
            query.set(key, typeof value === "string" ? value : JSON.stringify(value));
          }
          const queryString = query.toString();
          if (queryString) {
            url = `${url}?${queryString}`;
          }
        }

        const body = await requestJson(
          this.fetchFn,
          {
            platform: this.platform,
            method,
            url,
            headers: { Authorization: `Bearer ${this.options.accessToken}` },
            body: method === "POST" ? params : undefined,
            timeoutMs: META_GRAPH_API.REQUEST_TIMEOUT_MS,
          },
          extractMetaError
        );
        return parseResponse(this.platform, schema, body, operation);
      },
      {
        name: META_CIRCUIT_NAME,
        retryConfig: this.options.retryConfig,
      }
    );
  }

  private async mutate(operation: string, id: string, fields: Record<string, unknown>): Promise<void> {
    const result = await this.call(operation, "POST", id, MetaMutationResultSchema, fields);
    if (!result.success) {
      throw new PlatformApiError({
        platform: this.platform,
        message: `meta ${operation} returned success=false for ${id}`,
      });
    }
  }

  private requireAdAccountId(): string {
    if (!this.options.adAccountId) {
      throw new ConfigurationError(
        "META_AD_ACCOUNT_ID is required to create variant ads",
        ["META_AD_ACCOUNT_ID"]
      );
    }
    return this.options.adAccountId;
  }

  // ===========================================================================
  // AdPlatformAdapter
  // ===========================================================================

  /**
   * キャンペーン・広告セットとも同じ status 更新で停止する
   */
  async pause(entity: PlatformEntityRef): Promise<void> {
    await this.mutate(`pause ${entity.level}`, entity.externalId, { status: "PAUSED" });
  }

  async setBudget(entity: PlatformEntityRef, cents: number): Promise<void> {
    await this.mutate(`set ${entity.level} budget`, entity.externalId, {
      daily_budget: Math.round(cents),
    });
  }

  async getAdInsights(adId: string, since: Date, until: Date): Promise<InsightCounters> {
    const response = await this.call(
      "get ad insights",
      "GET",
      `${adId}/insights`,
      MetaInsightsResponseSchema,
      {
        fields: "impressions,clicks",
        time_range: { since: formatDate(since), until: formatDate(until) },
      }
    );
    // 配信実績がない期間は data が空配列
    const row = response.data[0];
    return {
      impressions: row?.impressions ?? 0,
      clicks: row?.clicks ?? 0,
    };
  }

  async getAdSetBudget(adSetId: string): Promise<number> {
    const adSet = await this.call("get ad set budget", "GET", adSetId, MetaAdSetSchema, {
      fields: "daily_budget",
    });
    if (adSet.daily_budget === undefined) {
      throw new PlatformApiError({
        platform: this.platform,
        message: `meta ad set ${adSetId} has no daily budget`,
      });
    }
    return adSet.daily_budget;
  }

  // ===========================================================================
  // CreativeExperimentAdapter
  // ===========================================================================

  private async fetchAd(adId: string): Promise<MetaAd> {
    return this.call("get ad", "GET", adId, MetaAdSchema, { fields: AD_FIELDS });
  }

  async getAd(adId: string): Promise<AdDetails> {
    const ad = await this.fetchAd(adId);
    return {
      adId: ad.id,
      name: ad.name,
      adSetId: ad.adset_id,
      campaignId: ad.campaign_id,
      creativeId: ad.creative.id,
      creative: toCreativeFields(ad),
    };
  }

  async duplicateAdSet(adSetId: string, nameSuffix: string): Promise<string> {
    const result = await this.call("duplicate ad set", "POST", `${adSetId}/copies`, MetaCopyResultSchema, {
      deep_copy: false,
      status_option: "ACTIVE",
      rename_options: { rename_suffix: nameSuffix },
    });
    return result.copied_adset_id;
  }

  /**
   * 元広告のストーリー仕様を複製し、指定フィールドだけ差し替えた広告を作成
   */
  async createVariantAd(input: CreateVariantAdInput): Promise<string> {
    const accountId = this.requireAdAccountId();
    const source = await this.fetchAd(input.sourceAd.adId);
    const storySpec = source.creative.object_story_spec;
    if (!storySpec) {
      throw new PlatformApiError({
        platform: this.platform,
        message: `meta ad ${input.sourceAd.adId} has no object_story_spec to copy`,
      });
    }

    const creative = await this.call(
      "create ad creative",
      "POST",
      `act_${accountId}/adcreatives`,
      MetaCreateResultSchema,
      {
        name: `${input.name} creative`,
        object_story_spec: applyCreativeFields(storySpec, input.creative),
      }
    );

    const ad = await this.call("create ad", "POST", `act_${accountId}/ads`, MetaCreateResultSchema, {
      name: input.name,
      adset_id: input.adSetId,
      creative: { creative_id: creative.id },
      status: "ACTIVE",
    });
    return ad.id;
  }
}

/**
 * ストーリー仕様のリンクデータに差し替えフィールドを適用
 */
export function applyCreativeFields(
  spec: MetaObjectStorySpec,
  fields: CreativeFields
): MetaObjectStorySpec {
  const linkData = spec.link_data ?? {};
  const callToAction = fields.callToAction
    ? { ...linkData.call_to_action, type: fields.callToAction }
    : linkData.call_to_action;

  return {
    ...spec,
    link_data: {
      ...linkData,
      name: fields.headline ?? linkData.name,
      image_hash: fields.imageHash ?? linkData.image_hash,
      call_to_action: callToAction,
    },
  };
}
