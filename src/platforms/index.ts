/**
 * 広告プラットフォームモジュール
 */

export {
  Platform,
  VALID_PLATFORMS,
  isValidPlatform,
  EntityLevel,
  PlatformEntityRef,
  InsightCounters,
  AdPlatformAdapter,
  CreativeFields,
  AdDetails,
  CreateVariantAdInput,
  CreativeExperimentAdapter,
  supportsCreativeExperiments,
} from "./types";

export { PlatformRegistry } from "./registry";
export { MetaGraphClient, MetaClientOptions, META_CIRCUIT_NAME, applyCreativeFields } from "./meta-client";
export { TikTokClient, TikTokClientOptions, TIKTOK_CIRCUIT_NAME } from "./tiktok-client";
export { FetchFn } from "./http";

import { EnvConfig } from "../config";
import { logger } from "../logger";
import { PlatformRegistry } from "./registry";
import { MetaGraphClient } from "./meta-client";
import { TikTokClient } from "./tiktok-client";

/**
 * 環境設定からレジストリを構築
 *
 * Google Ads は未実装のため登録しない（操作は executed=false になる）
 */
export function createPlatformRegistry(config: EnvConfig): PlatformRegistry {
  const registry = new PlatformRegistry();

  registry.register(
    new MetaGraphClient({
      accessToken: config.metaAccessToken,
      apiVersion: config.metaApiVersion,
      adAccountId: config.metaAdAccountId,
    })
  );

  if (config.tiktokAccessToken && config.tiktokAdvertiserId) {
    registry.register(
      new TikTokClient({
        accessToken: config.tiktokAccessToken,
        advertiserId: config.tiktokAdvertiserId,
      })
    );
  }

  logger.info("Platform registry initialized", { platforms: registry.platforms() });
  return registry;
}
