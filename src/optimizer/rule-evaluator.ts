/**
 * ルールインタープリター
 *
 * ルールを順に適用し、terminal な結果が出た時点で打ち切る。
 * プラットフォーム呼び出しや永続化は行わない純粋関数。
 */

import { computeMetrics, effectiveBudgetCents, formatPercent } from "./metrics";
import { DEFAULT_RULES } from "./rules";
import {
  Campaign,
  CampaignEvaluation,
  Decision,
  Mutation,
  OptimizationRule,
  OptimizerSettings,
  RuleState,
} from "./types";

function applyMutation(state: RuleState, mutation: Mutation | undefined): void {
  if (!mutation) {
    return;
  }
  if (mutation.type === "pause") {
    state.paused = true;
  } else {
    state.budgetCents = mutation.toCents;
  }
}

export function evaluateCampaign(
  campaign: Campaign,
  settings: OptimizerSettings,
  rules: readonly OptimizationRule[] = DEFAULT_RULES
): CampaignEvaluation {
  const state: RuleState = {
    campaign,
    settings,
    metrics: computeMetrics(campaign),
    budgetCents: effectiveBudgetCents(campaign),
    paused: false,
  };

  const decisions: Decision[] = [];
  let budgetChanged = false;
  let terminatedBy: string | null = null;

  for (const rule of rules) {
    const outcome = rule.apply(state);
    if (!outcome) {
      continue;
    }
    for (const decision of outcome.decisions) {
      decisions.push(decision);
      applyMutation(state, decision.mutation);
      if (decision.mutation?.type === "set_budget") {
        budgetChanged = true;
      }
    }
    if (outcome.terminal) {
      terminatedBy = rule.name;
      break;
    }
  }

  if (decisions.length === 0) {
    decisions.push({
      action: "no_change",
      reason: `Performance within targets (ROAS: ${state.metrics.roas.toFixed(2)}x, CTR: ${formatPercent(state.metrics.ctr)})`,
    });
  }

  return {
    campaignId: campaign.id,
    metrics: state.metrics,
    decisions,
    finalBudgetCents: budgetChanged ? state.budgetCents : campaign.dailyBudgetCents,
    paused: state.paused,
    terminatedBy,
  };
}

export function hasMutations(evaluation: CampaignEvaluation): boolean {
  return evaluation.decisions.some((decision) => decision.mutation !== undefined);
}
