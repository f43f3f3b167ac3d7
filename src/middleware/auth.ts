/**
 * 認証ミドルウェア
 *
 * 手動実行エンドポイントは API Key、スケジューラー用エンドポイントは
 * API Key または Cloud Scheduler の OIDC トークンで認証する
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import { logger } from "../logger";
import { errorMessage } from "../errors";

interface AuthErrorResponse {
  success: false;
  error: string;
  message: string;
}

const GOOGLE_TOKEN_INFO_URL = "https://oauth2.googleapis.com/tokeninfo";
const GOOGLE_ISSUERS = ["https://accounts.google.com", "accounts.google.com"];

const TokenInfoSchema = z.object({
  iss: z.string().optional(),
  exp: z.coerce.number().optional(),
  email: z.string().optional(),
});

/**
 * OIDCトークン検証関数（テストで差し替え可能）
 */
export type TokenVerifier = (token: string, projectId: string) => Promise<boolean>;

function unauthorized(res: Response, message: string): void {
  const body: AuthErrorResponse = { success: false, error: "Unauthorized", message };
  res.status(401).json(body);
}

/**
 * X-API-Key または Authorization: Bearer から API Key を取り出す
 */
function extractApiKey(req: Request): string | null {
  const header = req.headers["x-api-key"];
  if (typeof header === "string" && header.length > 0) {
    return header;
  }
  return extractBearerToken(req.headers.authorization);
}

function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.substring(7);
}

// =============================================================================
// API Key 認証
// =============================================================================

export function apiKeyAuth(apiKey: string | undefined): RequestHandler {
  if (!apiKey) {
    logger.warn("API Key authentication is disabled (API_KEY not set)");
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const providedKey = extractApiKey(req);
    if (!providedKey) {
      unauthorized(res, "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>");
      return;
    }

    if (providedKey !== apiKey) {
      logger.warn("Invalid API key attempt", { ip: req.ip, path: req.path });
      unauthorized(res, "Invalid API key");
      return;
    }

    next();
  };
}

// =============================================================================
// Cloud Scheduler OIDC 認証
// =============================================================================

/**
 * Google のトークン情報エンドポイントで ID トークンを検証
 */
export function createGoogleTokenVerifier(fetchFn: typeof fetch = fetch): TokenVerifier {
  return async (token: string, projectId: string): Promise<boolean> => {
    const response = await fetchFn(
      `${GOOGLE_TOKEN_INFO_URL}?id_token=${encodeURIComponent(token)}`
    );
    if (!response.ok) {
      logger.warn("Google token info request failed", { status: response.status });
      return false;
    }

    const parsed = TokenInfoSchema.safeParse(await response.json());
    if (!parsed.success) {
      logger.warn("Unexpected token info response");
      return false;
    }
    const info = parsed.data;

    if (!info.iss || !GOOGLE_ISSUERS.includes(info.iss)) {
      logger.warn("Invalid token issuer", { iss: info.iss });
      return false;
    }

    if ((info.exp ?? 0) * 1000 < Date.now()) {
      logger.warn("Token has expired", { exp: info.exp });
      return false;
    }

    // <name>@<project-id>.iam.gserviceaccount.com または <number>-compute@developer.gserviceaccount.com
    if (
      info.email &&
      !info.email.includes(projectId) &&
      !info.email.endsWith(".gserviceaccount.com")
    ) {
      logger.warn("Invalid service account", { email: info.email });
      return false;
    }

    return true;
  };
}

export interface InternalAuthOptions {
  apiKey?: string;
  projectId?: string;
  oidcEnabled: boolean;
  verifyToken?: TokenVerifier;
}

/**
 * 内部エンドポイント用の複合認証
 * API Key または OIDC のいずれかが通れば許可
 */
export function internalAuth(options: InternalAuthOptions): RequestHandler {
  const verifyToken = options.verifyToken ?? createGoogleTokenVerifier();

  return (req: Request, res: Response, next: NextFunction): void => {
    const providedKey = extractApiKey(req);
    if (providedKey && options.apiKey && providedKey === options.apiKey) {
      next();
      return;
    }

    const token = extractBearerToken(req.headers.authorization);
    const { projectId } = options;
    if (!options.oidcEnabled || !projectId || !token) {
      unauthorized(res, "Valid API key or OIDC token is required");
      return;
    }

    verifyToken(token, projectId)
      .then((valid) => {
        if (valid) {
          next();
          return;
        }
        unauthorized(res, "Valid API key or OIDC token is required");
      })
      .catch((error: unknown) => {
        logger.error("OIDC token verification failed", { error: errorMessage(error) });
        unauthorized(res, "Token verification failed");
      });
  };
}
