/**
 * 判定の適用モジュール
 *
 * 主要エクスポート:
 * - ActionExecutor: 停止・予算変更をプラットフォームへ送る（例外を投げない）
 */

export {
  ActionExecutor,
  ActionTarget,
  ExecutionResult,
  SHADOW_MODE_DETAIL,
} from "./action-executor";
