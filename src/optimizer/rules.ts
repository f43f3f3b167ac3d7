/**
 * キャンペーン最適化ルール
 *
 * 評価順に並べたルール一覧。各ルールは判定のみを返し、
 * 状態への反映は rule-evaluator のインタープリターが行う。
 */

import { OPTIMIZER_RULES as R } from "../constants";
import { clampBudget, formatCents, formatPercent, scaleCents } from "./metrics";
import { Decision, OptimizationRule, RuleOutcome, RuleState } from "./types";

function terminal(decision: Decision): RuleOutcome {
  return { decisions: [decision], terminal: true };
}

function continuing(decisions: Decision[]): RuleOutcome | null {
  return decisions.length > 0 ? { decisions, terminal: false } : null;
}

/**
 * 認知目的モードでは ROAS による停止を行わない
 */
function isAwarenessMode(state: Readonly<RuleState>): boolean {
  return state.settings.minRoasThreshold === 0;
}

function budgetChange(
  state: Readonly<RuleState>,
  action: Decision["action"],
  toCents: number,
  reasonPrefix: string
): Decision {
  return {
    action,
    reason: `${reasonPrefix}, budget ${formatCents(state.budgetCents)} -> ${formatCents(toCents)}`,
    mutation: { type: "set_budget", fromCents: state.budgetCents, toCents },
  };
}

/**
 * 下限に達していて減額できない場合の判定（状態は変えない）
 */
function budgetAtFloor(state: Readonly<RuleState>, action: Decision["action"], reasonPrefix: string): Decision {
  return {
    action,
    reason: `${reasonPrefix}, budget already at minimum ${formatCents(state.budgetCents)}`,
  };
}

// =============================================================================
// ルール定義
// =============================================================================

/**
 * 0. データ不足
 */
export const insufficientDataRule: OptimizationRule = {
  name: "insufficient_data",
  apply(state) {
    const { impressions } = state.campaign;
    if (impressions >= R.MIN_IMPRESSIONS_FOR_DECISION) {
      return null;
    }
    return terminal({
      action: "waiting",
      reason: `Insufficient data (${impressions} impressions)`,
    });
  },
};

/**
 * 1. 不振キャンペーンの停止
 */
export const pauseUnderperformerRule: OptimizationRule = {
  name: "pause_underperformer",
  apply(state) {
    const { spendCents } = state.campaign;
    const { roas } = state.metrics;
    if (
      isAwarenessMode(state) ||
      spendCents < R.UNDERPERFORMER_MIN_SPEND_CENTS ||
      roas >= R.UNDERPERFORMER_MAX_ROAS
    ) {
      return null;
    }
    return terminal({
      action: "pause_underperformer",
      reason: `ROAS ${roas.toFixed(2)}x below ${R.UNDERPERFORMER_MAX_ROAS} after ${formatCents(spendCents)} spend`,
      mutation: { type: "pause" },
    });
  },
};

/**
 * 2. LP問題（クリックされるがコンバージョンしない）
 *
 * CPC が高い場合のみ停止して打ち切る。予算削減は後続ルールへ続く。
 */
export const landingPageProblemRule: OptimizationRule = {
  name: "landing_page_problem",
  apply(state) {
    const { clicks } = state.campaign;
    const { ctr, conversionRate, cpcCents } = state.metrics;
    if (
      clicks < R.MIN_CLICKS_FOR_DECISION ||
      ctr <= R.HIGH_CTR_THRESHOLD ||
      conversionRate >= R.LOW_CONVERSION_RATE
    ) {
      return null;
    }

    const symptom =
      `CTR ${formatPercent(ctr)} but conversion rate ${formatPercent(conversionRate)} ` +
      `at ${formatCents(cpcCents)} CPC`;

    if (cpcCents > R.LANDING_PAGE_PAUSE_CPC_CENTS) {
      return terminal({
        action: "landing_page_pause",
        reason: `Landing page problem: ${symptom}`,
        mutation: { type: "pause" },
      });
    }

    if (cpcCents > R.LANDING_PAGE_REDUCE_CPC_CENTS) {
      const toCents = clampBudget(scaleCents(state.budgetCents, R.BUDGET_DECREASE_FACTOR));
      const reason = `Landing page problem: ${symptom}`;
      return continuing([
        toCents >= state.budgetCents
          ? budgetAtFloor(state, "landing_page_budget_decrease", reason)
          : budgetChange(state, "landing_page_budget_decrease", toCents, reason),
      ]);
    }

    return null;
  },
};

/**
 * 3. 好調キャンペーンの拡大（増額のみ）
 */
export const scaleWinnerRule: OptimizationRule = {
  name: "scale_winner",
  apply(state) {
    const { clicks } = state.campaign;
    const { ctr, cpcCents } = state.metrics;
    if (
      clicks < R.MIN_CLICKS_FOR_DECISION ||
      ctr <= R.HIGH_CTR_THRESHOLD ||
      cpcCents >= R.SCALE_WINNER_MAX_CPC_CENTS
    ) {
      return null;
    }

    const toCents = clampBudget(
      Math.min(scaleCents(state.budgetCents, R.SCALE_WINNER_FACTOR), R.SCALE_WINNER_MAX_BUDGET_CENTS)
    );
    if (toCents <= state.budgetCents) {
      return null;
    }
    return continuing([
      budgetChange(
        state,
        "scale_winner",
        toCents,
        `Winner: CTR ${formatPercent(ctr)} at ${formatCents(cpcCents)} CPC`
      ),
    ]);
  },
};

/**
 * 4. ROASに基づく予算調整（先に一致した分岐のみ）
 *
 * 停止分岐は消化額の条件上、減額分岐とルール1に先取りされるため
 * 通常の閾値では発火しない
 */
export const roasBudgetAdjustmentRule: OptimizationRule = {
  name: "roas_budget_adjustment",
  apply(state) {
    const { spendCents } = state.campaign;
    const { roas } = state.metrics;
    const minRoas = state.settings.minRoasThreshold;
    if (spendCents <= R.ROAS_ADJUSTMENT_MIN_SPEND_CENTS) {
      return null;
    }

    if (roas >= minRoas * R.ROAS_STRONG_MULTIPLIER) {
      const toCents = clampBudget(
        Math.min(scaleCents(state.budgetCents, R.BUDGET_INCREASE_FACTOR), R.MAX_DAILY_BUDGET_CENTS)
      );
      return toCents === state.budgetCents
        ? null
        : continuing([budgetChange(state, "budget_increase", toCents, `Strong ROAS (${roas.toFixed(2)}x)`)]);
    }

    if (roas < minRoas && spendCents > R.ROAS_DECREASE_MIN_SPEND_CENTS) {
      const toCents = clampBudget(
        Math.max(scaleCents(state.budgetCents, R.BUDGET_DECREASE_FACTOR), R.MIN_DAILY_BUDGET_CENTS)
      );
      const reason = `Low ROAS (${roas.toFixed(2)}x)`;
      return continuing([
        toCents >= state.budgetCents
          ? budgetAtFloor(state, "budget_decrease", reason)
          : budgetChange(state, "budget_decrease", toCents, reason),
      ]);
    }

    if (
      !isAwarenessMode(state) &&
      roas < R.ROAS_PAUSE_MAX_ROAS &&
      spendCents > R.ROAS_PAUSE_MIN_SPEND_CENTS
    ) {
      // 停止してもフラグ判定は続ける
      return continuing([
        {
          action: "paused",
          reason: `Very low ROAS (${roas.toFixed(2)}x) after ${formatCents(spendCents)} spend`,
          mutation: { type: "pause" },
        },
      ]);
    }

    return null;
  },
};

/**
 * 5. 情報フラグ（状態は変更しない）
 */
export const informationalFlagsRule: OptimizationRule = {
  name: "informational_flags",
  apply(state) {
    const { clicks } = state.campaign;
    const { ctr, cpcCents } = state.metrics;
    const flags: Decision[] = [];

    if (clicks >= R.MIN_CLICKS_FOR_DECISION && ctr < R.LOW_CTR_THRESHOLD) {
      flags.push({
        action: "flag_low_ctr",
        reason: `CTR ${formatPercent(ctr, 3)} below threshold, consider refreshing creative`,
      });
    }

    if (cpcCents > state.budgetCents * R.HIGH_CPC_BUDGET_RATIO) {
      flags.push({
        action: "flag_high_cpc",
        reason: `CPC ${formatCents(cpcCents)} exceeds half of daily budget ${formatCents(state.budgetCents)}, review bids`,
      });
    }

    return continuing(flags);
  },
};

/**
 * 評価順のルール一覧
 */
export const DEFAULT_RULES: readonly OptimizationRule[] = [
  insufficientDataRule,
  pauseUnderperformerRule,
  landingPageProblemRule,
  scaleWinnerRule,
  roasBudgetAdjustmentRule,
  informationalFlagsRule,
];
