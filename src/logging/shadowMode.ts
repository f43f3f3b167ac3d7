/**
 * シャドーモード
 *
 * SHADOWモードでは判定を計算・記録するが、プラットフォームAPIは呼び出さない。
 * モードはプロセス全体の状態ではなく、最適化コンテキストごとに渡す。
 */

import { logger } from "../logger";
import { ExecutionMode } from "./types";

/**
 * リクエストで指定されたモードと環境既定値から実行モードを決定
 */
export function resolveExecutionMode(
  requested: ExecutionMode | undefined,
  fallback: ExecutionMode
): ExecutionMode {
  return requested ?? fallback;
}

export function isShadowMode(mode: ExecutionMode): boolean {
  return mode === "SHADOW";
}

/**
 * 起動時に実行モードをログ出力
 */
export function logExecutionModeOnStartup(mode: ExecutionMode): void {
  if (mode === "SHADOW") {
    logger.info("Optimizer starting in SHADOW mode", {
      mode,
      description: "Decisions will be calculated and logged but NOT sent to ad platforms",
      tip: "Set OPTIMIZER_EXECUTION_MODE=APPLY to enable actual pauses and budget changes",
    });
  } else {
    logger.info("Optimizer starting in APPLY mode", {
      mode,
      description: "Decisions WILL be applied through ad platform APIs",
      warning: "This will pause campaigns and modify live budgets",
    });
  }
}
