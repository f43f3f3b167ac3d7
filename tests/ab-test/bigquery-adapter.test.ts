/**
 * A/Bテスト BigQueryアダプターのテスト
 */

import { BigQuery } from "@google-cloud/bigquery";
import { BigQueryABTestRepository, recordToTest, testToRecord } from "../../src/ab-test/bigquery-adapter";
import { BigQueryTarget } from "../../src/bigquery/client";
import { logger } from "../../src/logger";
import { ABTestRowSchema } from "../../src/schemas/external-api";
import { TEST_CREATED_AT, makeABTest } from "./fixtures";

const mockQuery = jest.fn();
const mockCreateQueryJob = jest.fn();

jest.mock("@google-cloud/bigquery", () => ({
  BigQuery: jest.fn().mockImplementation(() => ({
    query: mockQuery,
    createQueryJob: mockCreateQueryJob,
  })),
}));

jest.mock("uuid", () => ({
  v4: jest.fn().mockReturnValue("uuid-1"),
}));

const target: BigQueryTarget = {
  client: new BigQuery(),
  projectId: "test-project",
  datasetId: "test_dataset",
};

const NULLABLE_TYPES = {
  variant_ad_id: "STRING",
  variant_adset_id: "STRING",
  winner: "STRING",
  error_message: "STRING",
  completed_at: "STRING",
};

function dmlJob() {
  return {
    getQueryResults: jest.fn().mockResolvedValue([[]]),
    getMetadata: jest.fn().mockResolvedValue([{ statistics: { query: { numDmlAffectedRows: "1" } } }]),
  };
}

describe("行変換", () => {
  it("testToRecord は snake_case と ISO 日時", () => {
    const record = testToRecord(
      makeABTest({ winner: "variant", completedAt: new Date("2026-03-10T00:00:00.000Z") })
    );

    expect(record).toMatchObject({
      id: "t-1",
      test_name: "Headline test",
      variant_ad_id: "ad-1-variant",
      confidence_level: 0,
      winner: "variant",
      original_budget_cents: 2000,
      sync_status: "synced",
      error_message: null,
      created_at: "2026-03-01T00:00:00.000Z",
      completed_at: "2026-03-10T00:00:00.000Z",
    });
  });

  it("recordToTest は BigQuery の値を正規化する", () => {
    const row = ABTestRowSchema.parse({
      id: 12,
      test_name: "Headline test",
      campaign_id: "c-1",
      original_ad_id: "ad-1",
      original_adset_id: "as-1",
      variant_ad_id: null,
      variant_type: "headline",
      variant_value: "New headline",
      status: "error",
      confidence_level: "0",
      original_budget_cents: "2000",
      error_message: "creative rejected",
      created_at: { value: "2026-03-01T00:00:00.000Z" },
    });

    expect(recordToTest(row)).toEqual({
      id: "12",
      testName: "Headline test",
      campaignId: "c-1",
      platform: "meta",
      originalAdId: "ad-1",
      originalAdsetId: "as-1",
      variantAdId: null,
      variantAdsetId: null,
      variantType: "headline",
      variantValue: "New headline",
      status: "error",
      confidenceLevel: 0,
      winner: null,
      originalBudgetCents: 2000,
      syncStatus: "pending",
      errorMessage: "creative rejected",
      createdAt: TEST_CREATED_AT,
      completedAt: null,
    });
  });
});

describe("BigQueryABTestRepository", () => {
  beforeEach(() => {
    mockQuery.mockReset();
    mockCreateQueryJob.mockReset().mockResolvedValue([dmlJob()]);
    jest.spyOn(logger, "debug").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("getRunningTests は running を作成順に読む", async () => {
    mockQuery.mockResolvedValue([[testToRecord(makeABTest())]]);

    const tests = await new BigQueryABTestRepository(target).getRunningTests();

    expect(tests).toEqual([makeABTest()]);
    expect(mockQuery).toHaveBeenCalledWith({
      query: "SELECT * FROM `test-project.test_dataset.ab_tests` WHERE status = 'running' ORDER BY created_at",
      params: undefined,
    });
  });

  it("getTest は見つからなければ null", async () => {
    mockQuery.mockResolvedValue([[]]);

    await expect(new BigQueryABTestRepository(target).getTest("missing")).resolves.toBeNull();
  });

  it("createTest は UUID を採番して DML で挿入する", async () => {
    const { id: _id, ...fields } = makeABTest();

    const created = await new BigQueryABTestRepository(target).createTest(fields);

    expect(created).toEqual(makeABTest({ id: "uuid-1" }));
    const options = mockCreateQueryJob.mock.calls[0][0];
    expect(options.query).toContain("INSERT INTO `test-project.test_dataset.ab_tests`");
    expect(options.params).toEqual(testToRecord(created));
    expect(options.types).toEqual(NULLABLE_TYPES);
  });

  it("updateTest は判定と反映状況を書き戻す", async () => {
    const test = makeABTest({
      status: "winner_variant",
      winner: "variant",
      confidenceLevel: 99.42,
      completedAt: new Date("2026-03-10T00:00:00.000Z"),
    });

    await new BigQueryABTestRepository(target).updateTest(test);

    const options = mockCreateQueryJob.mock.calls[0][0];
    expect(options.query).toContain("WHERE id = @id");
    expect(options.params).toMatchObject({
      id: "t-1",
      status: "winner_variant",
      winner: "variant",
      confidence_level: 99.42,
      completed_at: "2026-03-10T00:00:00.000Z",
    });
  });
});
