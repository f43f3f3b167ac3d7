/**
 * 通知システム
 *
 * 緊急停止やA/Bテストの勝者決定などの重要イベントをSlackに通知
 * 送信失敗はログに残すのみで、呼び出し元へは伝播しない
 */

import { logger, StructuredLogger } from "../logger";
import { errorMessage } from "../errors";
import { FetchFn } from "../platforms/http";

// =============================================================================
// 設定
// =============================================================================

export interface NotificationConfig {
  enabled: boolean;
  slackWebhookUrl: string | null;
  channel: string;
  username: string;
  iconEmoji: string;
}

export const DEFAULT_NOTIFICATION_CONFIG: NotificationConfig = {
  enabled: false,
  slackWebhookUrl: null,
  channel: "#ad-optimizer-alerts",
  username: "Campaign Optimizer",
  iconEmoji: ":robot_face:",
};

// =============================================================================
// 通知インターフェース
// =============================================================================

export interface EmergencyPauseNotice {
  netLossCents: number;
  thresholdCents: number;
  pausedCount: number;
  executionId: string;
}

export interface ABTestWinnerNotice {
  testId: string;
  testName: string;
  winner: "original" | "variant";
  confidence: number;
  synced: boolean;
}

export interface Notifier {
  emergencyPause(notice: EmergencyPauseNotice): Promise<boolean>;
  abTestWinner(notice: ABTestWinnerNotice): Promise<boolean>;
}

// =============================================================================
// Slack通知
// =============================================================================

interface SlackMessage {
  channel?: string;
  username?: string;
  icon_emoji?: string;
  text?: string;
  attachments?: SlackAttachment[];
}

interface SlackAttachment {
  color: string;
  title: string;
  text: string;
  fields?: { title: string; value: string; short?: boolean }[];
  footer?: string;
  ts?: number;
}

function formatDollars(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

export class SlackNotifier implements Notifier {
  private readonly config: NotificationConfig;

  constructor(
    config: Partial<NotificationConfig>,
    private readonly fetchFn: FetchFn = fetch,
    private readonly log: StructuredLogger = logger
  ) {
    this.config = { ...DEFAULT_NOTIFICATION_CONFIG, ...config };
  }

  private async send(message: SlackMessage): Promise<boolean> {
    if (!this.config.enabled || !this.config.slackWebhookUrl) {
      this.log.debug("Slack notification skipped (disabled or no webhook)", {
        enabled: this.config.enabled,
      });
      return false;
    }

    try {
      const response = await this.fetchFn(this.config.slackWebhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          channel: this.config.channel,
          username: this.config.username,
          icon_emoji: this.config.iconEmoji,
          ...message,
        }),
      });

      if (!response.ok) {
        this.log.error("Slack notification failed", {
          status: response.status,
          statusText: response.statusText,
        });
        return false;
      }

      this.log.info("Slack notification sent");
      return true;
    } catch (error) {
      this.log.error("Slack notification error", { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * 緊急停止アラート
   */
  async emergencyPause(notice: EmergencyPauseNotice): Promise<boolean> {
    return this.send({
      attachments: [
        {
          color: "danger",
          title: "🚨 緊急停止: 全キャンペーンを停止しました",
          text: `累積損失 ${formatDollars(notice.netLossCents)} が閾値 ${formatDollars(notice.thresholdCents)} に達しました`,
          fields: [
            { title: "停止キャンペーン数", value: String(notice.pausedCount), short: true },
            { title: "実行ID", value: notice.executionId, short: true },
          ],
          footer: "Campaign Optimizer",
          ts: Math.floor(Date.now() / 1000),
        },
      ],
    });
  }

  /**
   * A/Bテスト勝者決定
   */
  async abTestWinner(notice: ABTestWinnerNotice): Promise<boolean> {
    return this.send({
      attachments: [
        {
          color: notice.synced ? "good" : "warning",
          title: `🏆 A/Bテスト「${notice.testName}」の勝者が決定`,
          text: notice.synced
            ? "敗者の広告セットを停止し、勝者に元の予算を戻しました"
            : "プラットフォームへの反映に失敗した操作があります。監査ログを確認してください",
          fields: [
            { title: "テストID", value: notice.testId, short: true },
            { title: "勝者", value: notice.winner, short: true },
            { title: "信頼度", value: `${notice.confidence.toFixed(2)}%`, short: true },
          ],
          footer: "Campaign Optimizer",
          ts: Math.floor(Date.now() / 1000),
        },
      ],
    });
  }
}

/**
 * 通知しない実装（Slack未設定時）
 */
export const NOOP_NOTIFIER: Notifier = {
  emergencyPause: async () => false,
  abTestWinner: async () => false,
};
