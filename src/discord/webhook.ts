import { logger } from '../observability/logger.js';
import { NotifyDeliveryError, errorMessage } from '../ingestion/errors.js';
import type { FetchLike } from '../ingestion/providers/usajobs.js';
import { truncate } from './messages.js';

const log = logger.child({ module: 'discord:webhook' });

export const WEBHOOK_TIMEOUT_MS = 15_000;
const ERROR_BODY_LIMIT = 200;

export type DeliveryStatus = 'sent' | 'disabled' | 'failed';

export interface Notifier {
  send(message: string): Promise<DeliveryStatus>;
}

/**
 * Posts `{ content }` to a Discord webhook. Delivery problems are logged
 * and reported as 'failed'; they never throw. Without a URL, messages are
 * only logged.
 */
export class DiscordWebhookNotifier implements Notifier {
  private webhookUrl?: string;
  private fetchImpl: FetchLike;
  private timeoutMs: number;

  constructor(webhookUrl?: string, fetchImpl: FetchLike = fetch, timeoutMs: number = WEBHOOK_TIMEOUT_MS) {
    this.webhookUrl = webhookUrl;
    this.fetchImpl = fetchImpl;
    this.timeoutMs = timeoutMs;
  }

  async send(message: string): Promise<DeliveryStatus> {
    if (!this.webhookUrl) {
      log.info(`[Discord disabled] ${message}`);
      return 'disabled';
    }

    try {
      const status = await this.post(this.webhookUrl, truncate(message));
      if (status === 204) {
        log.info('Discord accepted message (204)');
      } else {
        log.info({ status }, 'Discord accepted message');
      }
      return 'sent';
    } catch (err) {
      const status = err instanceof NotifyDeliveryError ? err.status : undefined;
      log.warn({ status, err: errorMessage(err) }, 'Discord delivery failed');
      return 'failed';
    }
  }

  private async post(url: string, content: string): Promise<number> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ content }),
        signal: controller.signal,
      });

      if (response.status < 200 || response.status >= 300) {
        const body = await response.text().catch((err: unknown) => `<unreadable body: ${errorMessage(err)}>`);
        throw new NotifyDeliveryError(
          `Webhook HTTP ${response.status}: ${body.slice(0, ERROR_BODY_LIMIT)}`,
          response.status,
        );
      }
      return response.status;
    } catch (err) {
      if (err instanceof NotifyDeliveryError) throw err;
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
      throw new NotifyDeliveryError(`Webhook request failed: ${reason}`, undefined, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}
