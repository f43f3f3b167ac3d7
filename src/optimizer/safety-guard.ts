/**
 * セーフティガード
 *
 * 全キャンペーン評価後に1回だけ実行するアカウント全体のチェック
 * - 日予算合計が上限を超えたら全体を比例縮小（下限なし）
 * - 累積損失が閾値以上なら稼働中の全キャンペーンを緊急停止
 */

import { Campaign, OptimizerSettings, SafetyOutcome, BudgetAdjustment } from "./types";

export interface SafetyInput {
  /** ルール適用後の状態 */
  campaign: Campaign;
  /** 同じパスのルールで停止済み */
  pausedThisPass: boolean;
}

export function evaluateSafetyLimits(
  entries: SafetyInput[],
  settings: OptimizerSettings
): SafetyOutcome {
  // 同一パスで停止したキャンペーンは予算合計から除外する
  const stillActive = entries.filter((entry) => !entry.pausedThisPass);

  const totalBudgetCents = stillActive.reduce(
    (sum, entry) => sum + (entry.campaign.dailyBudgetCents ?? 0),
    0
  );

  let scaleDown: SafetyOutcome["scaleDown"] = null;
  if (totalBudgetCents > settings.dailySpendLimitCents) {
    const factor = settings.dailySpendLimitCents / totalBudgetCents;
    const adjustments: BudgetAdjustment[] = [];
    for (const { campaign } of stillActive) {
      if (!campaign.dailyBudgetCents) {
        continue;
      }
      const toCents = Math.round(campaign.dailyBudgetCents * factor);
      if (toCents !== campaign.dailyBudgetCents) {
        adjustments.push({ campaignId: campaign.id, fromCents: campaign.dailyBudgetCents, toCents });
      }
    }
    scaleDown = {
      totalBudgetCents,
      limitCents: settings.dailySpendLimitCents,
      factor,
      adjustments,
    };
  }

  // 損失は停止済みキャンペーンの消化分も含む
  const netLossCents = entries.reduce(
    (sum, { campaign }) => sum + campaign.spendCents - campaign.revenueCents,
    0
  );

  let emergency: SafetyOutcome["emergency"] = null;
  if (netLossCents >= settings.emergencyPauseLossCents) {
    emergency = {
      netLossCents,
      thresholdCents: settings.emergencyPauseLossCents,
      pausedCampaignIds: stillActive.map((entry) => entry.campaign.id),
    };
  }

  return { scaleDown, emergency };
}
