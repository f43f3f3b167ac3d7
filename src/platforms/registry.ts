/**
 * プラットフォームレジストリ
 *
 * Platform列挙値をキーにアダプターを引く
 */

import { AdPlatformAdapter, Platform } from "./types";

export class PlatformRegistry {
  private readonly adapters = new Map<Platform, AdPlatformAdapter>();

  constructor(adapters: AdPlatformAdapter[] = []) {
    adapters.forEach((adapter) => this.register(adapter));
  }

  register(adapter: AdPlatformAdapter): this {
    this.adapters.set(adapter.platform, adapter);
    return this;
  }

  get(platform: Platform): AdPlatformAdapter | undefined {
    return this.adapters.get(platform);
  }

  has(platform: Platform): boolean {
    return this.adapters.has(platform);
  }

  platforms(): Platform[] {
    return Array.from(this.adapters.keys());
  }
}
