/**
 * 広告キャンペーン自動最適化エンジン - 環境変数設定
 */

import { SERVER, BIGQUERY, META_GRAPH_API } from "./constants";
import { ExecutionMode, isValidExecutionMode } from "./logging/types";
import { ConfigurationError } from "./errors";

/**
 * 環境変数の設定インターフェース
 */
export interface EnvConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;

  // BigQuery設定
  bigqueryProjectId: string;
  bigqueryDatasetId: string;

  // 認証設定
  apiKey?: string;
  enableOidcAuth: boolean;
  googleCloudProjectId?: string;

  // Meta Marketing API設定
  metaAccessToken: string;
  metaApiVersion: string;
  /** A/Bテストの変種クリエイティブ作成先（act_ プレフィックスなし） */
  metaAdAccountId?: string;

  // TikTok Business API設定（両方揃った場合のみアダプターを登録）
  tiktokAccessToken?: string;
  tiktokAdvertiserId?: string;

  // Slack通知
  slackWebhookUrl?: string;
  slackChannel: string;

  /** 既定のローカル開発オリジンに追加で許可する CORS オリジン */
  corsAllowedOrigins: string[];

  /**
   * 最適化の実行モード
   * - 環境変数 OPTIMIZER_EXECUTION_MODE で設定
   * - APPLY: プラットフォームAPIを呼び出して変更を適用
   * - SHADOW: 判定・記録のみ（デフォルト）
   * - 不正な値や未設定の場合は "SHADOW" にフォールバック
   */
  executionMode: ExecutionMode;
}

/**
 * 必須環境変数のリスト
 */
const REQUIRED_ENV_VARS = ["META_ACCESS_TOKEN"] as const;

/**
 * 環境変数を検証し、設定オブジェクトを返す
 * @throws {ConfigurationError} 必須環境変数が設定されていない場合
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const missingVars = REQUIRED_ENV_VARS.filter((varName) => !env[varName]);

  if (missingVars.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missingVars.join(", ")}`,
      [...missingVars]
    );
  }

  return {
    port: parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10),
    nodeEnv: env.NODE_ENV || "development",

    bigqueryProjectId: env.BIGQUERY_PROJECT_ID || BIGQUERY.PROJECT_ID,
    bigqueryDatasetId: env.BIGQUERY_DATASET_ID || BIGQUERY.DATASET_ID,

    apiKey: env.API_KEY,
    enableOidcAuth: env.ENABLE_OIDC_AUTH === "true",
    googleCloudProjectId: env.GOOGLE_CLOUD_PROJECT_ID,

    metaAccessToken: env.META_ACCESS_TOKEN ?? "",
    metaApiVersion: env.META_API_VERSION || META_GRAPH_API.DEFAULT_VERSION,
    metaAdAccountId: env.META_AD_ACCOUNT_ID?.replace(/^act_/, ""),

    tiktokAccessToken: env.TIKTOK_ACCESS_TOKEN,
    tiktokAdvertiserId: env.TIKTOK_ADVERTISER_ID,

    slackWebhookUrl: env.SLACK_WEBHOOK_URL,
    slackChannel: env.SLACK_CHANNEL || "#ad-optimizer-alerts",

    corsAllowedOrigins: (env.CORS_ALLOWED_ORIGINS ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),

    executionMode: parseExecutionMode(env.OPTIMIZER_EXECUTION_MODE),
  };
}

/**
 * OPTIMIZER_EXECUTION_MODE をパース
 * 不正な値や未設定の場合は "SHADOW" を返す（安全デフォルト）
 */
export function parseExecutionMode(value: string | undefined): ExecutionMode {
  const normalized = value?.toUpperCase().trim();
  if (normalized && isValidExecutionMode(normalized)) {
    return normalized;
  }
  return "SHADOW";
}

/**
 * 環境変数を検証のみ行う（起動時チェック用）
 */
export function validateEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const varName of REQUIRED_ENV_VARS) {
    if (!env[varName]) {
      errors.push(`Missing required environment variable: ${varName}`);
    }
  }

  const port = parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    errors.push(`Invalid PORT value: ${env.PORT}`);
  }

  if (env.ENABLE_OIDC_AUTH === "true" && !env.GOOGLE_CLOUD_PROJECT_ID) {
    errors.push("GOOGLE_CLOUD_PROJECT_ID is required when ENABLE_OIDC_AUTH is true");
  }

  // TikTokはトークンと広告主IDの両方が必要
  if (Boolean(env.TIKTOK_ACCESS_TOKEN) !== Boolean(env.TIKTOK_ADVERTISER_ID)) {
    errors.push("TIKTOK_ACCESS_TOKEN and TIKTOK_ADVERTISER_ID must be set together");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
