import { Notifier } from "@/lib/domain/models";
import { errorMessage, logger as defaultLogger, type Logger } from "@/lib/infra/logger";
import { formatSlackMessage } from "@/lib/output/slack-formatter";

export class SlackNotifier implements Notifier {
  private readonly webhookUrl: string;

  private readonly timeoutMs: number;

  private readonly logger: Logger;

  constructor(webhookUrl = process.env.SLACK_WEBHOOK_URL || "", options: { timeoutSeconds?: number; logger?: Logger } = {}) {
    this.webhookUrl = String(webhookUrl || "").trim();
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 30) * 1_000));
    this.logger = options.logger ?? defaultLogger;
  }

  get configured(): boolean {
    return Boolean(this.webhookUrl);
  }

  /** Posts the digest summary; delivery problems are logged, never thrown. */
  async send(text: string, date: string): Promise<void> {
    if (!this.webhookUrl) return;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(this.webhookUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(formatSlackMessage(text, date)),
        signal: controller.signal,
      });
      if (!response.ok) {
        const body = await response.text();
        this.logger.warn({ status: response.status, body: body.slice(0, 200) }, "slack webhook rejected digest");
        return;
      }
      this.logger.info("digest sent to slack");
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, "slack webhook request failed");
    } finally {
      clearTimeout(timer);
    }
  }
}
