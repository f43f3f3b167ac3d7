/**
 * TikTok Business API クライアント
 *
 * 広告セットは TikTok の広告グループ（adgroup）に対応する。
 * TikTok の予算は通貨単位の小数なので、セントとの変換はここで行う。
 */

import { z } from "zod";
import { TIKTOK_API } from "../constants";
import { PlatformApiError } from "../errors";
import { withRetry, RetryConfig } from "../utils/retry";
import {
  TikTokAdGroupListSchema,
  TikTokEnvelopeSchema,
  TikTokReportDataSchema,
} from "../schemas/external-api";
import { FetchFn, formatDate, parseResponse, requestJson } from "./http";
import { AdPlatformAdapter, InsightCounters, PlatformEntityRef } from "./types";

export interface TikTokClientOptions {
  accessToken: string;
  advertiserId: string;
  baseUrl?: string;
  fetchFn?: FetchFn;
  retryConfig?: Partial<RetryConfig>;
}

export const TIKTOK_CIRCUIT_NAME = "tiktok-business-api";

/** レート制限 */
const TIKTOK_RATE_LIMIT_CODE = 40100;

const EmptyDataSchema = z.unknown();

export class TikTokClient implements AdPlatformAdapter {
  readonly platform = "tiktok" as const;

  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: TikTokClientOptions) {
    this.baseUrl = options.baseUrl ?? TIKTOK_API.BASE_URL;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  private async call<T>(
    operation: string,
    method: "GET" | "POST",
    path: string,
    dataSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: Record<string, unknown>
  ): Promise<T> {
    return withRetry(
      async () => {
        const payload = { advertiser_id: this.options.advertiserId, ...params };
        let url = `${this.baseUrl}${path}`;
        if (method === "GET") {
          const query = new URLSearchParams();
          for (const [key, value] of Object.entries(payload)) {
            query.set(key, typeof value === "string" ? value : JSON.stringify(value));
          }
          url = `${url}?${query.toString()}`;
        }

        const body = await requestJson(this.fetchFn, {
          platform: this.platform,
          method,
          url,
          headers: { "Access-Token": this.options.accessToken },
          body: method === "POST" ? payload : undefined,
          timeoutMs: TIKTOK_API.REQUEST_TIMEOUT_MS,
        });

        // HTTP 200 でもエンベロープの code でエラーを返す
        const envelope = parseResponse(this.platform, TikTokEnvelopeSchema, body, operation);
        if (envelope.code !== 0) {
          throw new PlatformApiError({
            platform: this.platform,
            message: `tiktok ${operation} failed: ${envelope.message}`,
            platformErrorCode: String(envelope.code),
            retryable: envelope.code === TIKTOK_RATE_LIMIT_CODE || envelope.code >= 50000,
            retryAfterMs: envelope.code === TIKTOK_RATE_LIMIT_CODE ? 60000 : undefined,
          });
        }
        return parseResponse(this.platform, dataSchema, envelope.data, operation);
      },
      {
        name: TIKTOK_CIRCUIT_NAME,
        retryConfig: this.options.retryConfig,
      }
    );
  }

  async pause(entity: PlatformEntityRef): Promise<void> {
    if (entity.level === "campaign") {
      await this.call("pause campaign", "POST", "/campaign/status/update/", EmptyDataSchema, {
        campaign_ids: [entity.externalId],
        operation_status: "DISABLE",
      });
      return;
    }
    await this.call("pause ad group", "POST", "/adgroup/status/update/", EmptyDataSchema, {
      adgroup_ids: [entity.externalId],
      operation_status: "DISABLE",
    });
  }

  async setBudget(entity: PlatformEntityRef, cents: number): Promise<void> {
    const budget = Math.round(cents) / 100;
    if (entity.level === "campaign") {
      await this.call("set campaign budget", "POST", "/campaign/update/", EmptyDataSchema, {
        campaign_id: entity.externalId,
        budget,
      });
      return;
    }
    await this.call("set ad group budget", "POST", "/adgroup/update/", EmptyDataSchema, {
      adgroup_id: entity.externalId,
      budget,
    });
  }

  async getAdInsights(adId: string, since: Date, until: Date): Promise<InsightCounters> {
    const report = await this.call(
      "get ad insights",
      "GET",
      "/report/integrated/get/",
      TikTokReportDataSchema,
      {
        report_type: "BASIC",
        data_level: "AUCTION_AD",
        dimensions: ["ad_id"],
        metrics: ["impressions", "clicks"],
        filtering: [{ field_name: "ad_ids", filter_type: "IN", filter_value: JSON.stringify([adId]) }],
        start_date: formatDate(since),
        end_date: formatDate(until),
      }
    );
    return report.list.reduce<InsightCounters>(
      (sum, row) => ({
        impressions: sum.impressions + (row.metrics.impressions ?? 0),
        clicks: sum.clicks + (row.metrics.clicks ?? 0),
      }),
      { impressions: 0, clicks: 0 }
    );
  }

  async getAdSetBudget(adSetId: string): Promise<number> {
    const adGroups = await this.call("get ad group budget", "GET", "/adgroup/get/", TikTokAdGroupListSchema, {
      filtering: { adgroup_ids: [adSetId] },
      fields: ["adgroup_id", "budget"],
    });
    const adGroup = adGroups.list.find((row) => row.adgroup_id === adSetId);
    if (!adGroup || adGroup.budget === undefined) {
      throw new PlatformApiError({
        platform: this.platform,
        message: `tiktok ad group ${adSetId} has no budget`,
      });
    }
    return Math.round(adGroup.budget * 100);
  }
}
