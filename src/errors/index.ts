/**
 * カスタムエラークラスと統一レスポンス形式
 *
 * エラーハンドリングを統一し、適切なリトライ戦略を可能にする
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // 認証・認可エラー (4xx)
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",

  // バリデーションエラー (400)
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // リソースエラー (404)
  NOT_FOUND: "NOT_FOUND",

  // 競合 (409)
  CONCURRENT_MODIFICATION: "CONCURRENT_MODIFICATION",

  // 外部サービスエラー (5xx)
  PLATFORM_API_ERROR: "PLATFORM_API_ERROR",
  BIGQUERY_ERROR: "BIGQUERY_ERROR",

  // サーバーエラー (500)
  INTERNAL_ERROR: "INTERNAL_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  OPTIMIZATION_PRECONDITION_FAILED: "OPTIMIZATION_PRECONDITION_FAILED",

  // サーキットブレーカー
  CIRCUIT_OPEN: "CIRCUIT_OPEN",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
  retryable?: boolean;
  retryAfterMs?: number;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// バリデーション・リソースエラー
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * バリデーションエラー（400）
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details: { errors },
      retryable: false,
    });
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * リソース未検出エラー（404）
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super({
      code: ErrorCode.NOT_FOUND,
      message: identifier ? `${resource} not found: ${identifier}` : `${resource} not found`,
      statusCode: 404,
      details: { resource, identifier },
      retryable: false,
    });
    this.name = "NotFoundError";
  }
}

/**
 * 楽観的ロック競合エラー（409）
 *
 * 同一キャンペーンを別の最適化パスが先に更新した場合
 */
export class ConcurrentModificationError extends AppError {
  public readonly entityId: string;

  constructor(entityType: string, entityId: string, expectedVersion: number) {
    super({
      code: ErrorCode.CONCURRENT_MODIFICATION,
      message: `${entityType} ${entityId} modified by a concurrent optimization pass`,
      statusCode: 409,
      details: { entityType, entityId, expectedVersion },
      retryable: false,
    });
    this.name = "ConcurrentModificationError";
    this.entityId = entityId;
  }
}

// =============================================================================
// 外部サービスエラー
// =============================================================================

/**
 * 広告プラットフォームAPIエラー
 */
export class PlatformApiError extends AppError {
  public readonly platform: string;
  public readonly platformErrorCode?: string;

  constructor(options: {
    platform: string;
    message: string;
    statusCode?: number;
    platformErrorCode?: string;
    retryable?: boolean;
    retryAfterMs?: number;
    cause?: Error;
  }) {
    super({
      code: ErrorCode.PLATFORM_API_ERROR,
      message: options.message,
      statusCode: options.statusCode ?? 502,
      details: {
        platform: options.platform,
        platformErrorCode: options.platformErrorCode,
      },
      retryable: options.retryable ?? false,
      retryAfterMs: options.retryAfterMs,
      cause: options.cause,
    });
    this.name = "PlatformApiError";
    this.platform = options.platform;
    this.platformErrorCode = options.platformErrorCode;
  }

  /**
   * HTTPステータスコードからエラーを生成
   */
  static fromHttpStatus(
    platform: string,
    status: number,
    responseBody: string
  ): PlatformApiError {
    switch (status) {
      case 401:
      case 403:
        return new PlatformApiError({
          platform,
          message: `${platform} API authorization failed: ${status}`,
          statusCode: status,
          retryable: false,
        });
      case 429:
        return new PlatformApiError({
          platform,
          message: `${platform} API rate limit exceeded`,
          statusCode: 429,
          retryable: true,
          retryAfterMs: 60000,
        });
      case 500:
      case 502:
      case 503:
      case 504:
        return new PlatformApiError({
          platform,
          message: `${platform} API server error: ${status}`,
          statusCode: status,
          retryable: true,
          retryAfterMs: 5000,
        });
      default:
        return new PlatformApiError({
          platform,
          message: `${platform} API error: ${responseBody}`,
          statusCode: status,
          retryable: false,
        });
    }
  }
}

/**
 * BigQueryエラー
 */
export class BigQueryError extends AppError {
  constructor(
    message: string,
    options?: {
      cause?: Error;
      retryable?: boolean;
      retryAfterMs?: number;
    }
  ) {
    super({
      code: ErrorCode.BIGQUERY_ERROR,
      message,
      statusCode: 500,
      retryable: options?.retryable ?? false,
      retryAfterMs: options?.retryAfterMs,
      cause: options?.cause,
    });
    this.name = "BigQueryError";
  }

  static isRetryableMessage(message: string): boolean {
    const retryablePatterns = [
      /rate limit/i,
      /quota exceeded/i,
      /temporarily unavailable/i,
      /service unavailable/i,
      /backendError/i,
    ];
    return retryablePatterns.some((pattern) => pattern.test(message));
  }

  static fromError(error: Error): BigQueryError {
    const retryable = BigQueryError.isRetryableMessage(error.message);
    return new BigQueryError(error.message, {
      cause: error,
      retryable,
      retryAfterMs: retryable ? 5000 : undefined,
    });
  }
}

/**
 * サーキットオープンエラー
 */
export class CircuitOpenError extends AppError {
  public readonly serviceName: string;

  constructor(serviceName: string, retryAfterMs: number = 30000) {
    super({
      code: ErrorCode.CIRCUIT_OPEN,
      message: `Circuit breaker is open for ${serviceName}`,
      statusCode: 503,
      details: { serviceName },
      retryable: true,
      retryAfterMs,
    });
    this.name = "CircuitOpenError";
    this.serviceName = serviceName;
  }
}

// =============================================================================
// 設定・前提条件エラー
// =============================================================================

export class ConfigurationError extends AppError {
  constructor(message: string, missingConfig?: string[]) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      statusCode: 500,
      details: missingConfig ? { missingConfig } : undefined,
      retryable: false,
    });
    this.name = "ConfigurationError";
  }
}

/**
 * 最適化パスの前提条件エラー
 *
 * キャンペーン一覧・アカウント設定の読み込みに失敗した場合のみ
 * パス全体を中断する
 */
export class OptimizationPreconditionError extends AppError {
  constructor(stage: "campaigns" | "settings" | "tests", cause: Error) {
    super({
      code: ErrorCode.OPTIMIZATION_PRECONDITION_FAILED,
      message: `Failed to load ${stage}: ${cause.message}`,
      statusCode: 503,
      details: { stage },
      retryable: true,
      cause,
    });
    this.name = "OptimizationPreconditionError";
  }
}

// =============================================================================
// 統一レスポンス形式
// =============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    retryable?: boolean;
    retryAfterMs?: number;
  };
  meta: {
    requestId?: string;
    timestamp: string;
  };
}

export class ApiResponseBuilder {
  static success<T>(
    data: T,
    options?: { statusCode?: number; requestId?: string }
  ): ApiResponse<T> {
    return {
      success: true,
      statusCode: options?.statusCode ?? 200,
      data,
      meta: {
        requestId: options?.requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  static error(error: unknown, requestId?: string): ApiResponse<never> {
    const appError = toAppError(error);
    return {
      success: false,
      statusCode: appError.statusCode,
      error: {
        code: appError.code,
        message: appError.message,
        details: appError.details,
        retryable: appError.retryable,
        retryAfterMs: appError.retryAfterMs,
      },
      meta: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }
}

// =============================================================================
// エラーハンドリングユーティリティ
// =============================================================================

/**
 * エラーがリトライ可能か判定
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("network") ||
      message.includes("fetch failed")
    );
  }
  return false;
}

/**
 * unknownをErrorに正規化
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * エラーをAppErrorに変換
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const normalized = toError(error);
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: normalized.message || "An unexpected error occurred",
    cause: normalized,
    retryable: isRetryableError(normalized),
  });
}
