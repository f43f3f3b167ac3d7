/**
 * ルート共通のレスポンスヘルパー
 */

import { Response } from "express";
import { logger } from "../logger";
import { ApiResponseBuilder, ErrorCode, toAppError } from "../errors";

function traceIdOf(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === "string" ? traceId : undefined;
}

export function sendSuccess<T>(res: Response, data: T, statusCode = 200): Response {
  return res
    .status(statusCode)
    .json(ApiResponseBuilder.success(data, { statusCode, requestId: traceIdOf(res) }));
}

/**
 * エラーを AppError に正規化して返す
 *
 * 5xx は error、それ以外は warn でログ出力
 */
export function sendError(res: Response, error: unknown, context: string): Response {
  const appError = toAppError(error);
  const data = { context, code: appError.code, error: appError.message };
  if (appError.statusCode >= 500) {
    logger.error("Request failed", data);
  } else {
    logger.warn("Request rejected", data);
  }
  return res.status(appError.statusCode).json(ApiResponseBuilder.error(appError, traceIdOf(res)));
}

/**
 * zod バリデーション失敗（"path: message" の一覧）を 400 で返す
 */
export function sendValidationErrors(res: Response, errors: string[]): Response {
  return res.status(400).json({
    success: false,
    statusCode: 400,
    error: {
      code: ErrorCode.VALIDATION_ERROR,
      message: "Invalid request",
      details: { errors },
    },
    meta: { requestId: traceIdOf(res), timestamp: new Date().toISOString() },
  });
}
