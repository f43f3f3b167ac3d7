/**
 * アカウント設定の読み込み
 *
 * 設定はドル建ての文字列で保存されている。欠落・不正な値はデフォルトに戻す。
 */

import { DEFAULT_SETTINGS } from "../constants";
import { logger, StructuredLogger } from "../logger";
import { SettingValueSchema } from "../schemas";
import { OptimizerSettings } from "./types";

export type SettingKey = keyof typeof DEFAULT_SETTINGS;

export type RawSettings = Partial<Record<string, string | null>>;

export interface SettingsStore {
  /** デフォルト適用済みの設定スナップショット */
  getSettings(): Promise<OptimizerSettings>;
}

function readNumber(raw: RawSettings, key: SettingKey, log: StructuredLogger): number {
  const fallback = Number(DEFAULT_SETTINGS[key]);
  const value = raw[key];
  if (value === undefined || value === null) {
    return fallback;
  }

  const parsed = SettingValueSchema.safeParse(value);
  if (!parsed.success) {
    log.warn("Invalid setting value, using default", { key, value, fallback });
    return fallback;
  }
  return parsed.data;
}

function dollarsToCents(dollars: number): number {
  return Math.round(dollars * 100);
}

export function parseSettings(raw: RawSettings, log: StructuredLogger = logger): OptimizerSettings {
  return {
    dailySpendLimitCents: dollarsToCents(readNumber(raw, "daily_spend_limit", log)),
    monthlySpendLimitCents: dollarsToCents(readNumber(raw, "monthly_spend_limit", log)),
    minRoasThreshold: readNumber(raw, "min_roas_threshold", log),
    emergencyPauseLossCents: dollarsToCents(readNumber(raw, "emergency_pause_loss", log)),
  };
}

export const DEFAULT_OPTIMIZER_SETTINGS: OptimizerSettings = parseSettings({});
