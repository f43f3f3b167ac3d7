/**
 * A/Bテスト結果評価
 *
 * CTRの2標本比率z検定で有意性を判定する
 */

import { AB_TEST } from "../constants";
import { roundTo } from "../optimizer/metrics";
import { ABTest, ArmCounts, ArmStats, TestResult, ZTestResult } from "./types";

// =============================================================================
// 統計関数
// =============================================================================

/**
 * 正規分布のCDF（累積分布関数）の近似計算
 *
 * Abramowitz and Stegun approximation
 */
export function normalCdf(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  x = Math.abs(x) / Math.sqrt(2);

  const t = 1.0 / (1.0 + p * x);
  const y =
    1.0 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-x * x);

  return 0.5 * (1.0 + sign * y);
}

const INCONCLUSIVE: ZTestResult = {
  zScore: null,
  pValue: null,
  confidence: 0,
  significant: false,
  winner: "inconclusive",
};

/**
 * 2標本比率z検定（両側）
 *
 * z > 0 は変種のCTRが高いことを示す
 */
export function twoProportionZTest(original: ArmCounts, variant: ArmCounts): ZTestResult {
  if (original.impressions === 0 || variant.impressions === 0) {
    return INCONCLUSIVE;
  }

  const p1 = original.clicks / original.impressions;
  const p2 = variant.clicks / variant.impressions;
  const pooled =
    (original.clicks + variant.clicks) / (original.impressions + variant.impressions);

  // プール比率が 0 または 1 では標準誤差が定義できない
  if (pooled <= 0 || pooled >= 1) {
    return INCONCLUSIVE;
  }

  const se = Math.sqrt(
    pooled * (1 - pooled) * (1 / original.impressions + 1 / variant.impressions)
  );
  const zScore = (p2 - p1) / se;
  const pValue = 2 * (1 - normalCdf(Math.abs(zScore)));
  const confidence = roundTo((1 - pValue) * 100, 2);
  const significant = confidence >= AB_TEST.CONFIDENCE_THRESHOLD;

  let winner: ZTestResult["winner"] = "inconclusive";
  if (significant && zScore > 0) {
    winner = "variant";
  } else if (significant && zScore < 0) {
    winner = "original";
  }

  return { zScore, pValue, confidence, significant, winner };
}

// =============================================================================
// テスト評価
// =============================================================================

export function toArmStats(counts: ArmCounts): ArmStats {
  return {
    ...counts,
    ctr: counts.impressions > 0 ? counts.clicks / counts.impressions : 0,
  };
}

export function minImpressionsMet(original: ArmCounts, variant: ArmCounts): boolean {
  return (
    original.impressions >= AB_TEST.MIN_IMPRESSIONS_PER_VARIANT &&
    variant.impressions >= AB_TEST.MIN_IMPRESSIONS_PER_VARIANT
  );
}

/**
 * テストと両アームの実績から評価結果を組み立てる
 */
export function buildTestResult(test: ABTest, original: ArmCounts, variant: ArmCounts): TestResult {
  const stats = twoProportionZTest(original, variant);
  const met = minImpressionsMet(original, variant);
  return {
    kind: "evaluated",
    testId: test.id,
    testName: test.testName,
    status: test.status,
    original: toArmStats(original),
    variant: toArmStats(variant),
    ...stats,
    minImpressionsMet: met,
    winnerPersisted: stats.significant && met,
  };
}

/**
 * 自動最適化でスキップする理由（対象なら null）
 */
export function skipReason(result: TestResult): string | null {
  if (!result.minImpressionsMet) {
    return `need ${AB_TEST.MIN_IMPRESSIONS_PER_VARIANT}+ impressions each`;
  }
  if (result.confidence < AB_TEST.CONFIDENCE_THRESHOLD) {
    return `confidence ${result.confidence}% < ${AB_TEST.CONFIDENCE_THRESHOLD}%`;
  }
  if (result.winner === "inconclusive") {
    return "no decisive winner";
  }
  return null;
}
