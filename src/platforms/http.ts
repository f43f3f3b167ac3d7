/**
 * プラットフォームAPI共通のHTTP送信
 */

import { z } from "zod";
import { logger } from "../logger";
import { PlatformApiError, toError } from "../errors";
import { Platform } from "./types";

export type FetchFn = typeof fetch;

export interface JsonRequest {
  platform: Platform;
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

/**
 * エラー応答から人が読めるメッセージを取り出す
 */
export type ErrorMessageExtractor = (body: unknown) => string | undefined;

/**
 * リクエストを送信してJSON本文を返す
 *
 * 非2xxは PlatformApiError.fromHttpStatus で分類して投げる
 */
export async function requestJson(
  fetchFn: FetchFn,
  request: JsonRequest,
  extractErrorMessage?: ErrorMessageExtractor
): Promise<unknown> {
  const init: RequestInit = {
    method: request.method,
    headers: {
      "Content-Type": "application/json",
      ...request.headers,
    },
    signal: AbortSignal.timeout(request.timeoutMs),
  };
  if (request.body !== undefined && request.method === "POST") {
    init.body = JSON.stringify(request.body);
  }

  logger.debug("Making platform API request", {
    platform: request.platform,
    method: request.method,
    url: request.url.split("?")[0],
  });

  let response: Response;
  try {
    response = await fetchFn(request.url, init);
  } catch (error) {
    const cause = toError(error);
    throw new PlatformApiError({
      platform: request.platform,
      message: `${request.platform} API network error: ${cause.message}`,
      retryable: true,
      cause,
    });
  }

  if (!response.ok) {
    const errorText = await response.text();
    let detail = errorText;
    if (extractErrorMessage) {
      try {
        detail = extractErrorMessage(JSON.parse(errorText)) ?? errorText;
      } catch (parseError) {
        logger.debug("Platform error body is not JSON", {
          platform: request.platform,
          error: toError(parseError).message,
        });
      }
    }
    logger.error("Platform API request failed", {
      platform: request.platform,
      method: request.method,
      status: response.status,
      error: detail,
    });
    throw PlatformApiError.fromHttpStatus(request.platform, response.status, detail);
  }

  return response.json();
}

/**
 * 応答本文をスキーマで検証
 */
export function parseResponse<T>(
  platform: Platform,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  operation: string
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new PlatformApiError({
      platform,
      message: `Unexpected ${platform} response for ${operation}: ${result.error.issues[0]?.message ?? "invalid body"}`,
      retryable: false,
    });
  }
  return result.data;
}

/**
 * YYYY-MM-DD 形式（UTC）
 */
export function formatDate(date: Date): string {
  return date.toISOString().split("T")[0];
}
