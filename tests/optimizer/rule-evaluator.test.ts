/**
 * ルール評価のテスト
 */

import { evaluateCampaign, hasMutations } from "../../src/optimizer/rule-evaluator";
import {
  clampBudget,
  computeMetrics,
  effectiveBudgetCents,
  formatCents,
  formatPercent,
} from "../../src/optimizer/metrics";
import { informationalFlagsRule, roasBudgetAdjustmentRule } from "../../src/optimizer/rules";
import { OptimizationRule } from "../../src/optimizer/types";
import { makeCampaign, makeSettings } from "../helpers/fakes";

const settings = makeSettings();

describe("computeMetrics", () => {
  it("CTR・CVR・ROAS・CPC を計算する", () => {
    const metrics = computeMetrics(
      makeCampaign({ impressions: 2000, clicks: 50, conversions: 5, spendCents: 2500, revenueCents: 5000 })
    );

    expect(metrics).toEqual({ ctr: 0.025, conversionRate: 0.1, roas: 2, cpcCents: 50 });
  });

  it("分母が0の指標は0", () => {
    const metrics = computeMetrics(
      makeCampaign({ impressions: 0, clicks: 0, conversions: 0, spendCents: 0, revenueCents: 0 })
    );

    expect(metrics).toEqual({ ctr: 0, conversionRate: 0, roas: 0, cpcCents: 0 });
  });
});

describe("予算ヘルパー", () => {
  it("clampBudget は [300, 5000] に収める", () => {
    expect(clampBudget(120)).toBe(300);
    expect(clampBudget(1234.4)).toBe(1234);
    expect(clampBudget(9000)).toBe(5000);
  });

  it("予算未設定は 1000 セントとして扱う", () => {
    expect(effectiveBudgetCents(makeCampaign({ dailyBudgetCents: null }))).toBe(1000);
    expect(effectiveBudgetCents(makeCampaign({ dailyBudgetCents: 700 }))).toBe(700);
  });

  it("表示用フォーマット", () => {
    expect(formatCents(1250)).toBe("$12.50");
    expect(formatPercent(0.04)).toBe("4.00%");
    expect(formatPercent(0.004, 3)).toBe("0.400%");
  });
});

describe("evaluateCampaign", () => {
  describe("データ不足", () => {
    it("100インプレッション未満は waiting のみで打ち切る", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({ impressions: 99, spendCents: 5000, revenueCents: 0 }),
        settings
      );

      expect(evaluation.decisions).toEqual([
        { action: "waiting", reason: "Insufficient data (99 impressions)" },
      ]);
      expect(evaluation.terminatedBy).toBe("insufficient_data");
      expect(evaluation.paused).toBe(false);
      expect(evaluation.finalBudgetCents).toBe(1000);
      expect(hasMutations(evaluation)).toBe(false);
    });

    it("予算未設定のまま変更がなければ finalBudgetCents は null", () => {
      const evaluation = evaluateCampaign(makeCampaign({ impressions: 10, dailyBudgetCents: null }), settings);

      expect(evaluation.finalBudgetCents).toBeNull();
    });
  });

  describe("不振キャンペーンの停止", () => {
    it("消化 $25・ROAS 0.2 は停止して以降のルールを評価しない", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({ impressions: 500, clicks: 10, conversions: 0, spendCents: 2500, revenueCents: 500 }),
        settings
      );

      expect(evaluation.decisions).toEqual([
        {
          action: "pause_underperformer",
          reason: "ROAS 0.20x below 0.5 after $25.00 spend",
          mutation: { type: "pause" },
        },
      ]);
      expect(evaluation.paused).toBe(true);
      expect(evaluation.terminatedBy).toBe("pause_underperformer");
    });

    it("認知目的モードでは停止せず ROAS 増額分岐に進む", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({ impressions: 500, clicks: 10, conversions: 0, spendCents: 2500, revenueCents: 500 }),
        makeSettings({ minRoasThreshold: 0 })
      );

      expect(evaluation.decisions).toEqual([
        {
          action: "budget_increase",
          reason: "Strong ROAS (0.20x), budget $10.00 -> $12.50",
          mutation: { type: "set_budget", fromCents: 1000, toCents: 1250 },
        },
      ]);
      expect(evaluation.paused).toBe(false);
      expect(evaluation.finalBudgetCents).toBe(1250);
    });
  });

  describe("LP問題", () => {
    it("CPC $1 超は停止して打ち切る", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({ impressions: 1000, clicks: 40, conversions: 0, spendCents: 5000, revenueCents: 5000 }),
        settings
      );

      expect(evaluation.decisions).toEqual([
        {
          action: "landing_page_pause",
          reason: "Landing page problem: CTR 4.00% but conversion rate 0.00% at $1.25 CPC",
          mutation: { type: "pause" },
        },
      ]);
      expect(evaluation.terminatedBy).toBe("landing_page_problem");
    });

    it("CPC $0.50 超は25%減額して評価を続ける", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({ impressions: 1000, clicks: 40, conversions: 0, spendCents: 3000, revenueCents: 3000 }),
        settings
      );

      expect(evaluation.decisions).toEqual([
        {
          action: "landing_page_budget_decrease",
          reason:
            "Landing page problem: CTR 4.00% but conversion rate 0.00% at $0.75 CPC, budget $10.00 -> $7.50",
          mutation: { type: "set_budget", fromCents: 1000, toCents: 750 },
        },
      ]);
      expect(evaluation.terminatedBy).toBeNull();
      expect(evaluation.finalBudgetCents).toBe(750);
    });
  });

  describe("好調キャンペーンの拡大", () => {
    const winner = { impressions: 3000, clicks: 120, conversions: 6, spendCents: 1800, revenueCents: 2700 };

    it("CTR 4%・CPC $0.15 は20%増額", () => {
      const evaluation = evaluateCampaign(makeCampaign(winner), settings);

      expect(evaluation.decisions).toEqual([
        {
          action: "scale_winner",
          reason: "Winner: CTR 4.00% at $0.15 CPC, budget $10.00 -> $12.00",
          mutation: { type: "set_budget", fromCents: 1000, toCents: 1200 },
        },
      ]);
    });

    it("増額後の上限は $25", () => {
      const evaluation = evaluateCampaign(makeCampaign({ ...winner, dailyBudgetCents: 2400 }), settings);

      expect(evaluation.finalBudgetCents).toBe(2500);
      expect(evaluation.decisions[0].reason).toBe("Winner: CTR 4.00% at $0.15 CPC, budget $24.00 -> $25.00");
    });

    it("既に $25 を超えている予算は減額しない", () => {
      const evaluation = evaluateCampaign(makeCampaign({ ...winner, dailyBudgetCents: 2600 }), settings);

      expect(evaluation.decisions).toEqual([
        { action: "no_change", reason: "Performance within targets (ROAS: 1.50x, CTR: 4.00%)" },
      ]);
      expect(evaluation.finalBudgetCents).toBe(2600);
    });
  });

  describe("ROASによる予算調整", () => {
    const strong = { impressions: 5000, clicks: 50, conversions: 5, spendCents: 3000, revenueCents: 9000 };

    it("ROAS が閾値の1.5倍以上なら25%増額（予算未設定は $10 基準）", () => {
      const evaluation = evaluateCampaign(makeCampaign({ ...strong, dailyBudgetCents: null }), settings);

      expect(evaluation.decisions).toEqual([
        {
          action: "budget_increase",
          reason: "Strong ROAS (3.00x), budget $10.00 -> $12.50",
          mutation: { type: "set_budget", fromCents: 1000, toCents: 1250 },
        },
      ]);
      expect(evaluation.finalBudgetCents).toBe(1250);
    });

    it("増額は $50 で頭打ち、変化がなければ判定しない", () => {
      expect(evaluateCampaign(makeCampaign({ ...strong, dailyBudgetCents: 4500 }), settings).finalBudgetCents).toBe(5000);

      const atMax = evaluateCampaign(makeCampaign({ ...strong, dailyBudgetCents: 5000 }), settings);
      expect(atMax.decisions.map((d) => d.action)).toEqual(["no_change"]);
    });

    it("ROAS が閾値未満かつ消化 $50 超なら25%減額", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({ impressions: 10000, clicks: 200, conversions: 10, spendCents: 6000, revenueCents: 6000 }),
        settings
      );

      expect(evaluation.decisions).toEqual([
        {
          action: "budget_decrease",
          reason: "Low ROAS (1.00x), budget $10.00 -> $7.50",
          mutation: { type: "set_budget", fromCents: 1000, toCents: 750 },
        },
      ]);
    });

    it("減額が下限 $3 で変化しない場合も減額判定を残し、停止分岐には進まない", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({
          impressions: 10000,
          clicks: 200,
          conversions: 10,
          spendCents: 6000,
          revenueCents: 6000,
          dailyBudgetCents: 300,
        }),
        settings
      );

      expect(evaluation.decisions).toEqual([
        { action: "budget_decrease", reason: "Low ROAS (1.00x), budget already at minimum $3.00" },
      ]);
      expect(hasMutations(evaluation)).toBe(false);
      expect(evaluation.finalBudgetCents).toBe(300);
      expect(evaluation.paused).toBe(false);
    });

    it("停止分岐は停止したうえで後続のフラグも付ける", () => {
      const rules = [roasBudgetAdjustmentRule, informationalFlagsRule];
      const evaluation = evaluateCampaign(
        makeCampaign({
          impressions: 10000,
          clicks: 20,
          conversions: 0,
          spendCents: 12000,
          revenueCents: 3600,
          dailyBudgetCents: 1000,
        }),
        makeSettings({ minRoasThreshold: 0.25 }),
        rules
      );

      expect(evaluation.decisions).toEqual([
        {
          action: "paused",
          reason: "Very low ROAS (0.30x) after $120.00 spend",
          mutation: { type: "pause" },
        },
        { action: "flag_low_ctr", reason: "CTR 0.200% below threshold, consider refreshing creative" },
        { action: "flag_high_cpc", reason: "CPC $6.00 exceeds half of daily budget $10.00, review bids" },
      ]);
      expect(evaluation.paused).toBe(true);
      expect(evaluation.terminatedBy).toBeNull();
    });
  });

  describe("情報フラグ", () => {
    it("CTR 0.5% 未満は低CTRフラグ（状態は変えない）", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({ impressions: 10000, clicks: 40, conversions: 2, spendCents: 1000, revenueCents: 2000 }),
        settings
      );

      expect(evaluation.decisions).toEqual([
        { action: "flag_low_ctr", reason: "CTR 0.400% below threshold, consider refreshing creative" },
      ]);
      expect(hasMutations(evaluation)).toBe(false);
    });

    it("CPC が日予算の半分を超えたら入札見直しフラグ", () => {
      const evaluation = evaluateCampaign(
        makeCampaign({
          impressions: 1000,
          clicks: 10,
          conversions: 0,
          spendCents: 1900,
          revenueCents: 0,
          dailyBudgetCents: 300,
        }),
        settings
      );

      expect(evaluation.decisions).toEqual([
        { action: "flag_high_cpc", reason: "CPC $1.90 exceeds half of daily budget $3.00, review bids" },
      ]);
    });
  });

  describe("ルールインタープリター", () => {
    it("terminal な結果のあとのルールは呼ばない", () => {
      const later = jest.fn().mockReturnValue(null);
      const rules: OptimizationRule[] = [
        {
          name: "stop",
          apply: () => ({ decisions: [{ action: "waiting", reason: "stop here" }], terminal: true }),
        },
        { name: "later", apply: later },
      ];

      const evaluation = evaluateCampaign(makeCampaign(), settings, rules);

      expect(later).not.toHaveBeenCalled();
      expect(evaluation.terminatedBy).toBe("stop");
    });

    it("前のルールの予算変更を後続ルールが参照する", () => {
      const seen: number[] = [];
      const rules: OptimizationRule[] = [
        {
          name: "raise",
          apply: (state) => ({
            decisions: [
              {
                action: "budget_increase",
                reason: "raise",
                mutation: { type: "set_budget", fromCents: state.budgetCents, toCents: 2000 },
              },
            ],
            terminal: false,
          }),
        },
        {
          name: "observe",
          apply: (state) => {
            seen.push(state.budgetCents);
            return null;
          },
        },
      ];

      const evaluation = evaluateCampaign(makeCampaign(), settings, rules);

      expect(seen).toEqual([2000]);
      expect(evaluation.finalBudgetCents).toBe(2000);
    });
  });
});
