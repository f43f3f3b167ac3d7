/**
 * 派生指標と予算計算
 */

import { OPTIMIZER_RULES } from "../constants";
import { Campaign, CampaignMetrics } from "./types";

/**
 * 分母が0の場合は0
 */
function safeRatio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function computeMetrics(campaign: Campaign): CampaignMetrics {
  return {
    ctr: safeRatio(campaign.clicks, campaign.impressions),
    conversionRate: safeRatio(campaign.conversions, campaign.clicks),
    roas: safeRatio(campaign.revenueCents, campaign.spendCents),
    cpcCents: safeRatio(campaign.spendCents, campaign.clicks),
  };
}

export function effectiveBudgetCents(campaign: Campaign): number {
  return campaign.dailyBudgetCents ?? OPTIMIZER_RULES.DEFAULT_DAILY_BUDGET_CENTS;
}

/**
 * 日予算を [MIN, MAX] に収める
 */
export function clampBudget(cents: number): number {
  return Math.min(
    Math.max(Math.round(cents), OPTIMIZER_RULES.MIN_DAILY_BUDGET_CENTS),
    OPTIMIZER_RULES.MAX_DAILY_BUDGET_CENTS
  );
}

export function scaleCents(cents: number, factor: number): number {
  return Math.round(cents * factor);
}

export function roundTo(value: number, digits: number): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}

export function formatCents(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

export function formatPercent(ratio: number, digits: number = 2): string {
  return `${(ratio * 100).toFixed(digits)}%`;
}
