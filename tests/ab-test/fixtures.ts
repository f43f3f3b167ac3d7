/**
 * A/Bテストのテストデータ
 */

import { ABTest } from "../../src/ab-test/types";

export const TEST_CREATED_AT = new Date("2026-03-01T00:00:00.000Z");

export function makeABTest(overrides: Partial<ABTest> = {}): ABTest {
  return {
    id: "t-1",
    testName: "Headline test",
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
    originalBudgetCents: 2000,
    syncStatus: "synced",
    errorMessage: null,
    createdAt: TEST_CREATED_AT,
    completedAt: null,
    ...overrides,
  };
}
