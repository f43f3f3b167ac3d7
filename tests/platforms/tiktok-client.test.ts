/**
 * TikTok Business APIクライアントのテスト
 */

import { TIKTOK_CIRCUIT_NAME, TikTokClient } from "../../src/platforms/tiktok-client";
import { resetCircuitBreaker } from "../../src/utils/retry";
import { fakeFetch, jsonResponse } from "./fake-fetch";

function createClient(responses: Response[]) {
  const { fetchFn, requests } = fakeFetch(responses);
  const client = new TikTokClient({
    accessToken: "test-token",
    advertiserId: "adv-1",
    baseUrl: "https://tiktok.test/v1.3",
    fetchFn,
    retryConfig: { maxRetries: 0 },
  });
  return { client, requests };
}

function ok(data: unknown = {}): Response {
  return jsonResponse({ code: 0, message: "OK", request_id: "req-1", data });
}

describe("TikTokClient", () => {
  afterEach(() => {
    resetCircuitBreaker(TIKTOK_CIRCUIT_NAME);
  });

  describe("pause", () => {
    it("キャンペーンは campaign/status/update で DISABLE", async () => {
      const { client, requests } = createClient([ok()]);

      await client.pause({ level: "campaign", externalId: "tt-1" });

      expect(requests).toEqual([
        {
          url: "https://tiktok.test/v1.3/campaign/status/update/",
          method: "POST",
          headers: { "Content-Type": "application/json", "Access-Token": "test-token" },
          body: { advertiser_id: "adv-1", campaign_ids: ["tt-1"], operation_status: "DISABLE" },
        },
      ]);
    });

    it("広告セットは広告グループとして停止する", async () => {
      const { client, requests } = createClient([ok()]);

      await client.pause({ level: "adset", externalId: "ag-1" });

      expect(requests[0].url).toBe("https://tiktok.test/v1.3/adgroup/status/update/");
      expect(requests[0].body).toEqual({
        advertiser_id: "adv-1",
        adgroup_ids: ["ag-1"],
        operation_status: "DISABLE",
      });
    });
  });

  describe("setBudget", () => {
    it("セントを通貨単位に変換する", async () => {
      const { client, requests } = createClient([ok(), ok()]);

      await client.setBudget({ level: "campaign", externalId: "tt-1" }, 1250);
      await client.setBudget({ level: "adset", externalId: "ag-1" }, 999);

      expect(requests[0].url).toBe("https://tiktok.test/v1.3/campaign/update/");
      expect(requests[0].body).toEqual({ advertiser_id: "adv-1", campaign_id: "tt-1", budget: 12.5 });
      expect(requests[1].url).toBe("https://tiktok.test/v1.3/adgroup/update/");
      expect(requests[1].body).toEqual({ advertiser_id: "adv-1", adgroup_id: "ag-1", budget: 9.99 });
    });
  });

  describe("エンベロープのエラー", () => {
    it("HTTP 200 でも code != 0 はエラー", async () => {
      const { client } = createClient([
        jsonResponse({ code: 40001, message: "Invalid advertiser", data: {} }),
      ]);

      await expect(client.pause({ level: "campaign", externalId: "tt-1" })).rejects.toMatchObject({
        message: "tiktok pause campaign failed: Invalid advertiser",
        platformErrorCode: "40001",
        retryable: false,
      });
    });

    it("レート制限コードはリトライ可能", async () => {
      const { client } = createClient([jsonResponse({ code: 40100, message: "Too many requests" })]);

      await expect(client.setBudget({ level: "campaign", externalId: "tt-1" }, 500)).rejects.toMatchObject({
        retryable: true,
        retryAfterMs: 60000,
      });
    });
  });

  describe("getAdInsights", () => {
    it("レポート行を合計する", async () => {
      const { client, requests } = createClient([
        ok({
          list: [
            { metrics: { impressions: "700", clicks: "20" } },
            { metrics: { impressions: "500", clicks: "10" } },
          ],
        }),
      ]);

      const counters = await client.getAdInsights(
        "ad-9",
        new Date("2026-03-01T00:00:00.000Z"),
        new Date("2026-03-10T00:00:00.000Z")
      );

      expect(counters).toEqual({ impressions: 1200, clicks: 30 });
      const url = new URL(requests[0].url);
      expect(url.pathname).toBe("/v1.3/report/integrated/get/");
      expect(url.searchParams.get("advertiser_id")).toBe("adv-1");
      expect(url.searchParams.get("dimensions")).toBe('["ad_id"]');
      expect(url.searchParams.get("start_date")).toBe("2026-03-01");
      expect(url.searchParams.get("end_date")).toBe("2026-03-10");
    });

    it("行がなければ0", async () => {
      const { client } = createClient([ok({ list: [] })]);

      await expect(client.getAdInsights("ad-9", new Date(), new Date())).resolves.toEqual({
        impressions: 0,
        clicks: 0,
      });
    });
  });

  describe("getAdSetBudget", () => {
    it("通貨単位の予算をセントにする", async () => {
      const { client } = createClient([ok({ list: [{ adgroup_id: "ag-1", budget: "20.5" }] })]);

      await expect(client.getAdSetBudget("ag-1")).resolves.toBe(2050);
    });

    it("該当する広告グループがなければエラー", async () => {
      const { client } = createClient([ok({ list: [{ adgroup_id: "ag-2", budget: 10 }] })]);

      await expect(client.getAdSetBudget("ag-1")).rejects.toThrow("tiktok ad group ag-1 has no budget");
    });
  });
});
