/**
 * ABTestManagerのテスト
 */

import { ABTestManager } from "../../src/ab-test/ab-test-manager";
import { ActionExecutor } from "../../src/apply/action-executor";
import { NotFoundError, ValidationError } from "../../src/errors";
import { AuditRecorder } from "../../src/logging/auditLog";
import { PlatformRegistry } from "../../src/platforms/registry";
import {
  FakeCreativeAdapter,
  FakePlatformAdapter,
  InMemoryABTestRepository,
  InMemoryAuditLog,
  InMemoryCampaignRepository,
  RecordingNotifier,
  makeCampaign,
  silentLogger,
} from "../helpers/fakes";
import { makeABTest } from "./fixtures";
import { ABTest } from "../../src/ab-test/types";

const NOW = new Date("2026-03-10T00:00:00.000Z");

function setup(tests: ABTest[] = [makeABTest()]) {
  const log = silentLogger();
  const meta = new FakeCreativeAdapter("meta");
  const tiktok = new FakePlatformAdapter("tiktok");
  const registry = new PlatformRegistry([meta, tiktok]);
  const repo = new InMemoryABTestRepository(tests);
  const campaigns = new InMemoryCampaignRepository([
    makeCampaign(),
    makeCampaign({ id: "c-2", name: "TikTok Push", platform: "tiktok", externalId: "tt-1" }),
  ]);
  const auditLog = new InMemoryAuditLog();
  const notifier = new RecordingNotifier();
  const manager = new ABTestManager({
    tests: repo,
    campaigns,
    registry,
    executor: new ActionExecutor(registry, log),
    audit: new AuditRecorder(auditLog, log, () => NOW),
    notifier,
    log,
    clock: () => NOW,
  });
  return { meta, repo, auditLog, notifier, manager };
}

describe("ABTestManager", () => {
  // ===========================================================================
  // 自動最適化
  // ===========================================================================

  describe("autoOptimizeABTests", () => {
    it("変種が有意に勝てば元の広告セットを停止し、変種に分割前の予算を戻す", async () => {
      const { meta, repo, auditLog, notifier, manager } = setup();
      meta.insights.set("ad-1", { impressions: 1200, clicks: 30 });
      meta.insights.set("ad-1-variant", { impressions: 1200, clicks: 55 });

      const result = await manager.autoOptimizeABTests("APPLY");

      expect(result).toEqual({
        optimizedCount: 1,
        optimized: [
          {
            testId: "t-1",
            testName: "Headline test",
            winner: "variant",
            confidence: 99.42,
            pauseLoser: { executed: true, detail: "paused adset as-1" },
            restoreWinner: { executed: true, detail: "adset as-1-copy budget set to 2000 cents" },
            syncStatus: "synced",
          },
        ],
        skipped: [],
      });
      expect(meta.calls).toEqual(["pause adset as-1", "setBudget adset as-1-copy 2000"]);
      expect(repo.tests.get("t-1")).toMatchObject({
        status: "winner_variant",
        winner: "variant",
        confidenceLevel: 99.42,
        syncStatus: "synced",
        completedAt: NOW,
      });
      expect(auditLog.actions()).toEqual([
        "ab_test_pause_loser",
        "ab_test_restore_winner",
        "ab_test_completed",
      ]);
      expect(notifier.winners).toEqual([
        { testId: "t-1", testName: "Headline test", winner: "variant", confidence: 99.42, synced: true },
      ]);
    });

    it("元広告が勝てば変種の広告セットを停止する", async () => {
      const { meta, repo, manager } = setup();
      meta.insights.set("ad-1", { impressions: 1200, clicks: 55 });
      meta.insights.set("ad-1-variant", { impressions: 1200, clicks: 30 });

      await manager.autoOptimizeABTests("APPLY");

      expect(meta.calls).toEqual(["pause adset as-1-copy", "setBudget adset as-1 2000"]);
      expect(repo.tests.get("t-1")?.status).toBe("winner_original");
    });

    it("反映に失敗しても統計的判定は保存し syncStatus=failed", async () => {
      const { meta, repo, auditLog, notifier, manager } = setup();
      meta.insights.set("ad-1", { impressions: 1200, clicks: 30 });
      meta.insights.set("ad-1-variant", { impressions: 1200, clicks: 55 });
      meta.failingIds.add("as-1");

      const result = await manager.autoOptimizeABTests("APPLY");

      expect(result.optimized[0].pauseLoser).toEqual({
        executed: false,
        detail: "pause failed: rejected as-1",
      });
      expect(result.optimized[0].syncStatus).toBe("failed");
      expect(repo.tests.get("t-1")).toMatchObject({ status: "winner_variant", syncStatus: "failed" });
      expect(auditLog.entries[2]).toMatchObject({ action: "ab_test_completed", severity: "warning" });
      expect(notifier.winners[0].synced).toBe(false);
    });

    it("SHADOW モードでは判定のみ記録し、テストは running のまま", async () => {
      const { meta, repo, auditLog, notifier, manager } = setup();
      meta.insights.set("ad-1", { impressions: 1200, clicks: 30 });
      meta.insights.set("ad-1-variant", { impressions: 1200, clicks: 55 });

      const result = await manager.autoOptimizeABTests("SHADOW");

      expect(result.optimized[0]).toMatchObject({
        syncStatus: "pending",
        pauseLoser: { executed: false, detail: "shadow mode" },
        restoreWinner: { executed: false, detail: "shadow mode" },
      });
      expect(meta.calls).toEqual([]);
      expect(repo.tests.get("t-1")).toMatchObject({
        status: "running",
        winner: "variant",
        confidenceLevel: 99.42,
        completedAt: null,
      });
      expect(auditLog.actions()).toEqual(["ab_test_pause_loser", "ab_test_restore_winner"]);
      expect(notifier.winners).toEqual([]);
    });

    it("インプレッション不足はスキップし、信頼度だけ保存する", async () => {
      const { meta, repo, manager } = setup();
      meta.insights.set("ad-1", { impressions: 400, clicks: 10 });
      meta.insights.set("ad-1-variant", { impressions: 400, clicks: 20 });

      const result = await manager.autoOptimizeABTests("APPLY");

      expect(result).toEqual({
        optimizedCount: 0,
        optimized: [],
        skipped: [{ testId: "t-1", testName: "Headline test", reason: "need 1000+ impressions each" }],
      });
      expect(meta.calls).toEqual([]);
      expect(repo.tests.get("t-1")).toMatchObject({ status: "running", confidenceLevel: 93.73, winner: null });
    });

    it("信頼度不足の理由", async () => {
      const { meta, manager } = setup();
      meta.insights.set("ad-1", { impressions: 1200, clicks: 30 });
      meta.insights.set("ad-1-variant", { impressions: 1200, clicks: 36 });

      const result = await manager.autoOptimizeABTests("APPLY");

      expect(result.skipped[0].reason).toBe("confidence 54.61% < 95%");
    });

    it("実績取得の失敗はそのテストだけスキップする", async () => {
      const { meta, manager } = setup([
        makeABTest(),
        makeABTest({ id: "t-2", testName: "Image test", originalAdId: "ad-2", variantAdId: "ad-2-variant" }),
      ]);
      meta.insights.set("ad-1", { impressions: 1200, clicks: 30 });
      meta.insights.set("ad-2", { impressions: 1200, clicks: 30 });
      meta.insights.set("ad-2-variant", { impressions: 1200, clicks: 55 });

      const result = await manager.autoOptimizeABTests("APPLY");

      expect(result.skipped).toEqual([
        { testId: "t-1", testName: "Headline test", reason: "evaluation failed: no insights for ad-1-variant" },
      ]);
      expect(result.optimized.map((t) => t.testId)).toEqual(["t-2"]);
    });

    it("アダプター未登録のプラットフォームはスキップ理由に残る", async () => {
      const { manager } = setup([makeABTest({ platform: "google" })]);

      const result = await manager.autoOptimizeABTests("APPLY");

      expect(result.skipped[0].reason).toBe("evaluation failed: no adapter registered for platform google");
    });
  });

  // ===========================================================================
  // 評価
  // ===========================================================================

  describe("evaluateABTests", () => {
    it("running のテストだけを評価する", async () => {
      const { meta, manager } = setup([
        makeABTest(),
        makeABTest({ id: "t-2", status: "winner_original" }),
      ]);
      meta.insights.set("ad-1", { impressions: 1200, clicks: 30 });
      meta.insights.set("ad-1-variant", { impressions: 1200, clicks: 55 });

      const results = await manager.evaluateABTests();

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({
        kind: "evaluated",
        testId: "t-1",
        confidence: 99.42,
        winner: "variant",
        winnerPersisted: true,
      });
    });

    it("終了済みのテストを ID 指定で評価しても判定は書き換えない", async () => {
      const completed = makeABTest({
        id: "t-2",
        status: "winner_variant",
        winner: "variant",
        confidenceLevel: 99.42,
        completedAt: new Date("2026-03-08T00:00:00.000Z"),
      });
      const { meta, repo, manager } = setup([completed]);
      meta.insights.set("ad-1", { impressions: 1200, clicks: 55 });
      meta.insights.set("ad-1-variant", { impressions: 1200, clicks: 30 });

      const results = await manager.evaluateABTests("t-2");

      expect(results[0]).toMatchObject({ kind: "evaluated", testId: "t-2", winner: "original" });
      expect(repo.updates).toEqual([]);
      expect(repo.tests.get("t-2")).toEqual(completed);
    });

    it("評価の失敗は kind=failed で返す", async () => {
      const { manager } = setup();

      const results = await manager.evaluateABTests();

      expect(results).toEqual([
        { kind: "failed", testId: "t-1", testName: "Headline test", error: "no insights for ad-1" },
      ]);
    });

    it("存在しない testId は NotFoundError", async () => {
      const { manager } = setup();

      await expect(manager.evaluateABTests("missing")).rejects.toThrow(NotFoundError);
      await expect(manager.evaluateABTests("missing")).rejects.toThrow("ABTest not found: missing");
    });
  });

  // ===========================================================================
  // 作成
  // ===========================================================================

  describe("createABTest", () => {
    function withSourceAd(meta: FakeCreativeAdapter): void {
      meta.ads.set("ad-1", {
        adId: "ad-1",
        name: "Spring ad",
        adSetId: "as-1",
        campaignId: "ext-1",
        creativeId: "cr-1",
        creative: { headline: "Old headline" },
      });
      meta.budgets.set("as-1", 2001);
    }

    it("広告セットを複製し、変種広告を作って予算を半分ずつに分ける", async () => {
      const { meta, repo, auditLog, manager } = setup([]);
      withSourceAd(meta);

      const created = await manager.createABTest({
        campaignId: "c-1",
        originalAdId: "ad-1",
        variantType: "headline",
        variantValue: "New headline",
      });

      expect(created).toEqual({
        id: "test-1",
        testName: "Spring Sale headline test",
        campaignId: "c-1",
        platform: "meta",
        originalAdId: "ad-1",
        originalAdsetId: "as-1",
        variantAdId: "ad-1-variant",
        variantAdsetId: "as-1-copy",
        variantType: "headline",
        variantValue: "New headline",
        status: "running",
        confidenceLevel: 0,
        winner: null,
        originalBudgetCents: 2001,
        syncStatus: "synced",
        errorMessage: null,
        createdAt: NOW,
        completedAt: null,
      });
      expect(meta.calls).toEqual([
        "duplicate as-1 - headline variant",
        "setBudget adset as-1 1000",
        "setBudget adset as-1-copy 1000",
      ]);
      expect(meta.variantInputs[0]).toMatchObject({
        adSetId: "as-1-copy",
        name: "Spring ad - headline variant",
        creative: { headline: "New headline" },
      });
      expect(repo.tests.get("test-1")).toEqual(created);
      expect(auditLog.actions()).toEqual(["ab_test_created"]);
    });

    it("テスト名の指定と CTA の差し替え", async () => {
      const { meta, manager } = setup([]);
      withSourceAd(meta);

      const created = await manager.createABTest({
        campaignId: "c-1",
        originalAdId: "ad-1",
        variantType: "cta",
        variantValue: "SHOP_NOW",
        testName: "CTA check",
      });

      expect(created.testName).toBe("CTA check");
      expect(meta.variantInputs[0].creative).toEqual({ callToAction: "SHOP_NOW" });
    });

    it("予算分割に失敗しても作成し syncStatus=failed", async () => {
      const { meta, manager } = setup([]);
      withSourceAd(meta);
      meta.failingIds.add("as-1-copy");

      const created = await manager.createABTest({
        campaignId: "c-1",
        originalAdId: "ad-1",
        variantType: "image",
        variantValue: "hash-1",
      });

      expect(created.status).toBe("running");
      expect(created.syncStatus).toBe("failed");
    });

    it("変種広告の作成に失敗したら status=error で記録して例外を投げる", async () => {
      const { meta, repo, auditLog, manager } = setup([]);
      withSourceAd(meta);
      meta.createVariantError = new Error("creative rejected");

      await expect(
        manager.createABTest({
          campaignId: "c-1",
          originalAdId: "ad-1",
          variantType: "headline",
          variantValue: "New headline",
        })
      ).rejects.toThrow("creative rejected");

      expect(repo.tests.get("test-1")).toMatchObject({
        status: "error",
        variantAdId: null,
        variantAdsetId: "as-1-copy",
        errorMessage: "creative rejected",
        completedAt: NOW,
      });
      expect(meta.calls).toEqual(["duplicate as-1 - headline variant"]);
      expect(auditLog.entries).toHaveLength(1);
      expect(auditLog.entries[0]).toMatchObject({ action: "ab_test_create_failed", severity: "warning" });
    });

    it("広告セット複製の失敗では何も記録しない", async () => {
      const { meta, repo, manager } = setup([]);
      withSourceAd(meta);
      meta.duplicateError = new Error("quota exceeded");

      await expect(
        manager.createABTest({
          campaignId: "c-1",
          originalAdId: "ad-1",
          variantType: "headline",
          variantValue: "New headline",
        })
      ).rejects.toThrow("quota exceeded");
      expect(repo.tests.size).toBe(0);
    });

    it("存在しないキャンペーンは NotFoundError", async () => {
      const { manager } = setup([]);

      await expect(
        manager.createABTest({ campaignId: "nope", originalAdId: "ad-1", variantType: "headline", variantValue: "x" })
      ).rejects.toThrow("Campaign not found: nope");
    });

    it("クリエイティブ実験に対応しないプラットフォームは ValidationError", async () => {
      const { manager } = setup([]);

      const promise = manager.createABTest({
        campaignId: "c-2",
        originalAdId: "ad-9",
        variantType: "headline",
        variantValue: "x",
      });

      await expect(promise).rejects.toThrow(ValidationError);
      await expect(promise).rejects.toThrow("Creative experiments are not supported on tiktok");
    });
  });
});
