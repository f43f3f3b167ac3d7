/**
 * リトライ・サーキットブレーカーユーティリティ
 *
 * 広告プラットフォームAPI（Meta, TikTok）への呼び出しを
 * 安全にリトライし、障害時にサーキットブレーカーで保護する
 *
 * 最適化エンジン本体（ActionExecutor）はリトライしない。
 * リトライはプラットフォームクライアント層でのみ行う。
 */

import { logger } from "../logger";
import { AppError, CircuitOpenError, isRetryableError, toError } from "../errors";

// =============================================================================
// 設定
// =============================================================================

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface CircuitBreakerConfig {
  failureThreshold: number; // オープンになる連続失敗回数
  resetTimeoutMs: number; // ハーフオープンまでの時間
  halfOpenRequests: number; // ハーフオープン時の試行回数
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 60000,
  halfOpenRequests: 3,
};

// =============================================================================
// サーキットブレーカー
// =============================================================================

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

interface CircuitBreakerState {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  halfOpenAttempts: number;
}

const circuitBreakers = new Map<string, CircuitBreakerState>();

function getCircuitBreaker(name: string): CircuitBreakerState {
  const existing = circuitBreakers.get(name);
  if (existing) {
    return existing;
  }
  const created: CircuitBreakerState = {
    state: "CLOSED",
    failures: 0,
    successes: 0,
    lastFailureTime: null,
    halfOpenAttempts: 0,
  };
  circuitBreakers.set(name, created);
  return created;
}

function shouldAllowRequest(name: string, config: CircuitBreakerConfig): boolean {
  const breaker = getCircuitBreaker(name);

  switch (breaker.state) {
    case "CLOSED":
      return true;

    case "OPEN":
      if (
        breaker.lastFailureTime !== null &&
        Date.now() - breaker.lastFailureTime >= config.resetTimeoutMs
      ) {
        breaker.state = "HALF_OPEN";
        breaker.halfOpenAttempts = 1;
        logger.info("Circuit breaker transitioning to HALF_OPEN", { name });
        return true;
      }
      return false;

    case "HALF_OPEN":
      if (breaker.halfOpenAttempts < config.halfOpenRequests) {
        breaker.halfOpenAttempts++;
        return true;
      }
      return false;
  }
}

function recordSuccess(name: string, config: CircuitBreakerConfig): void {
  const breaker = getCircuitBreaker(name);

  if (breaker.state === "HALF_OPEN") {
    breaker.successes++;
    if (breaker.successes >= config.halfOpenRequests) {
      breaker.state = "CLOSED";
      breaker.failures = 0;
      breaker.successes = 0;
      breaker.halfOpenAttempts = 0;
      logger.info("Circuit breaker CLOSED (recovered)", { name });
    }
  } else {
    breaker.failures = 0;
  }
}

function recordFailure(name: string, config: CircuitBreakerConfig): void {
  const breaker = getCircuitBreaker(name);
  breaker.failures++;
  breaker.lastFailureTime = Date.now();

  if (breaker.state === "HALF_OPEN") {
    breaker.state = "OPEN";
    breaker.successes = 0;
    logger.warn("Circuit breaker OPEN (half-open failure)", { name });
  } else if (breaker.failures >= config.failureThreshold) {
    breaker.state = "OPEN";
    logger.warn("Circuit breaker OPEN", {
      name,
      failures: breaker.failures,
      threshold: config.failureThreshold,
    });
  }
}

// =============================================================================
// リトライ関数
// =============================================================================

/**
 * 指数バックオフでリトライを実行
 *
 * AppErrorは retryable / retryAfterMs を優先する
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    name: string;
    retryConfig?: Partial<RetryConfig>;
    circuitBreakerConfig?: Partial<CircuitBreakerConfig>;
  }
): Promise<T> {
  const retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retryConfig };
  const cbConfig = {
    ...DEFAULT_CIRCUIT_BREAKER_CONFIG,
    ...options.circuitBreakerConfig,
  };

  if (!shouldAllowRequest(options.name, cbConfig)) {
    throw new CircuitOpenError(options.name, cbConfig.resetTimeoutMs);
  }

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await fn();
      recordSuccess(options.name, cbConfig);
      return result;
    } catch (error) {
      const lastError = toError(error);
      const canRetry = isRetryableError(error);

      if (!canRetry || attempt >= retryConfig.maxRetries) {
        recordFailure(options.name, cbConfig);
        logger.error("Request failed (no more retries)", {
          name: options.name,
          attempt,
          error: lastError.message,
          retryable: canRetry,
        });
        throw lastError;
      }

      const delay =
        error instanceof AppError && error.retryAfterMs
          ? Math.min(error.retryAfterMs, retryConfig.maxDelayMs)
          : Math.min(
              retryConfig.baseDelayMs * Math.pow(retryConfig.backoffMultiplier, attempt),
              retryConfig.maxDelayMs
            );

      // ジッター（0-20%）
      const waitTime = Math.round(delay + delay * Math.random() * 0.2);

      logger.warn("Retrying request", {
        name: options.name,
        attempt: attempt + 1,
        maxRetries: retryConfig.maxRetries,
        waitMs: waitTime,
        error: lastError.message,
      });

      await sleep(waitTime);
    }
  }
}

// =============================================================================
// サーキットブレーカー状態取得
// =============================================================================

export function getCircuitBreakerStatus(name: string): {
  state: CircuitState;
  failures: number;
  lastFailureTime: number | null;
} {
  const breaker = getCircuitBreaker(name);
  return {
    state: breaker.state,
    failures: breaker.failures,
    lastFailureTime: breaker.lastFailureTime,
  };
}

export function getAllCircuitBreakerStatuses(): Map<
  string,
  { state: CircuitState; failures: number }
> {
  const statuses = new Map<string, { state: CircuitState; failures: number }>();
  circuitBreakers.forEach((breaker, name) => {
    statuses.set(name, { state: breaker.state, failures: breaker.failures });
  });
  return statuses;
}

export function resetCircuitBreaker(name: string): void {
  circuitBreakers.delete(name);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
