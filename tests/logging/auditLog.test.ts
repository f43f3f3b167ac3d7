/**
 * 監査ログのテスト
 */

import { AuditRecorder, auditEntryToRow } from "../../src/logging/auditLog";
import { StructuredLogger } from "../../src/logger";
import { InMemoryAuditLog } from "../helpers/fakes";

const FIXED_NOW = new Date("2026-03-02T09:00:00.000Z");

describe("AuditRecorder", () => {
  it("severity 省略時は info、details オブジェクトは JSON 文字列にする", async () => {
    const sink = new InMemoryAuditLog();
    const recorder = new AuditRecorder(sink, new StructuredLogger(), () => FIXED_NOW);

    await recorder.record({
      action: "budget_increase",
      entityType: "campaign",
      entityId: 42,
      details: { oldBudgetCents: 1000, newBudgetCents: 1250 },
    });

    expect(sink.entries).toEqual([
      {
        action: "budget_increase",
        entityType: "campaign",
        entityId: "42",
        details: '{"oldBudgetCents":1000,"newBudgetCents":1250}',
        severity: "info",
        timestamp: FIXED_NOW,
      },
    ]);
  });

  it("entityId 省略時は null", async () => {
    const sink = new InMemoryAuditLog();
    const recorder = new AuditRecorder(sink, new StructuredLogger(), () => FIXED_NOW);

    await recorder.record({
      action: "emergency_pause_all",
      entityType: "account",
      details: "net loss",
      severity: "critical",
    });

    expect(sink.entries[0]).toMatchObject({ entityId: null, details: "net loss", severity: "critical" });
  });

  it("書き込み失敗はエラーログに残し、呼び出し元へ伝播しない", async () => {
    const log = new StructuredLogger();
    const errorSpy = jest.spyOn(log, "error").mockImplementation(() => undefined);
    const recorder = new AuditRecorder(
      { append: () => Promise.reject(new Error("table not found")) },
      log,
      () => FIXED_NOW
    );

    await expect(
      recorder.record({ action: "paused", entityType: "campaign", entityId: "c-1", details: "x" })
    ).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledWith("Failed to write audit log entry", {
      action: "paused",
      entityType: "campaign",
      entityId: "c-1",
      error: "table not found",
    });
  });
});

describe("auditEntryToRow", () => {
  it("snake_case の行に変換し timestamp を ISO 文字列にする", () => {
    expect(
      auditEntryToRow({
        action: "ab_test_created",
        entityType: "ab_test",
        entityId: "t-1",
        details: "{}",
        severity: "info",
        timestamp: FIXED_NOW,
      })
    ).toEqual({
      action: "ab_test_created",
      entity_type: "ab_test",
      entity_id: "t-1",
      details: "{}",
      severity: "info",
      timestamp: "2026-03-02T09:00:00.000Z",
    });
  });
});
