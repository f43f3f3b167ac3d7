/**
 * ActionExecutor
 *
 * 判定をプラットフォームアダプターへの呼び出しに変換し、結果を返す。
 * 例外は投げない。失敗は executed=false として呼び出し元が記録する。
 * リトライはプラットフォームクライアント側でのみ行う。
 */

import { logger, StructuredLogger } from "../logger";
import { errorMessage } from "../errors";
import { ExecutionMode } from "../logging/types";
import { isShadowMode } from "../logging/shadowMode";
import { PlatformRegistry } from "../platforms/registry";
import { AdPlatformAdapter, EntityLevel, Platform, PlatformEntityRef } from "../platforms/types";

export interface ExecutionResult {
  executed: boolean;
  detail: string;
}

/**
 * 実行対象（外部IDは未公開キャンペーンでは null）
 */
export interface ActionTarget {
  platform: Platform;
  level: EntityLevel;
  externalId: string | null;
}

export const SHADOW_MODE_DETAIL = "shadow mode";

export class ActionExecutor {
  constructor(
    private readonly registry: PlatformRegistry,
    private readonly log: StructuredLogger = logger
  ) {}

  async pause(mode: ExecutionMode, target: ActionTarget): Promise<ExecutionResult> {
    return this.run(mode, target, "pause", async (adapter, entity) => {
      await adapter.pause(entity);
      return `paused ${entity.level} ${entity.externalId}`;
    });
  }

  async setBudget(mode: ExecutionMode, target: ActionTarget, cents: number): Promise<ExecutionResult> {
    return this.run(mode, target, "set_budget", async (adapter, entity) => {
      await adapter.setBudget(entity, cents);
      return `${entity.level} ${entity.externalId} budget set to ${cents} cents`;
    });
  }

  private async run(
    mode: ExecutionMode,
    target: ActionTarget,
    operation: string,
    call: (adapter: AdPlatformAdapter, entity: PlatformEntityRef) => Promise<string>
  ): Promise<ExecutionResult> {
    if (isShadowMode(mode)) {
      return { executed: false, detail: SHADOW_MODE_DETAIL };
    }

    if (!target.externalId) {
      return { executed: false, detail: `no external id for ${target.platform} ${target.level}` };
    }

    const adapter = this.registry.get(target.platform);
    if (!adapter) {
      return { executed: false, detail: `no adapter registered for platform ${target.platform}` };
    }

    const entity: PlatformEntityRef = { level: target.level, externalId: target.externalId };
    try {
      const detail = await call(adapter, entity);
      this.log.info("Platform action executed", {
        platform: target.platform,
        operation,
        level: entity.level,
        externalId: entity.externalId,
      });
      return { executed: true, detail };
    } catch (error) {
      const message = errorMessage(error);
      this.log.warn("Platform action failed", {
        platform: target.platform,
        operation,
        level: entity.level,
        externalId: entity.externalId,
        error: message,
      });
      return { executed: false, detail: `${operation} failed: ${message}` };
    }
  }
}
