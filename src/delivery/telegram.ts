/**
 * Telegram Bot API channel.
 *
 * Posts one message per course (the bare URL, so Telegram renders its own
 * preview card in the channel) and paces messages to stay under the Bot
 * API's per-chat rate limit.
 */

import { z } from 'zod';
import { getLogger } from '../shared/logger.js';
import { isTransientNetworkError, retry } from '../shared/retry.js';
import { sleep } from '../shared/timing.js';
import { DEFAULT_LIMITS } from '../shared/constants.js';
import { AppError, HttpRequestError, errorMessage } from '../shared/errors.js';
import type { HttpClient } from '../discovery/http-client.js';
import type { ConfirmedCourse } from '../pipeline/types.js';
import type { DeliveryChannel, DeliveryFailure, DeliveryReport } from './types.js';

const log = getLogger('delivery', { channel: 'telegram' });

const TELEGRAM_API_BASE = 'https://api.telegram.org';
const SEND_TIMEOUT_MS = 20_000;

const sendMessageResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export interface TelegramChannelOptions {
  botToken: string;
  /** Numeric chat id or `@channelname`. */
  channelId: string;
  /** Pause between consecutive messages. Default: 3000 */
  messageDelayMs?: number;
  /** Initial retry backoff. Default: 1000 */
  retryBaseDelayMs?: number;
  maxAttempts?: number;
}

export class TelegramChannel implements DeliveryChannel {
  readonly name = 'telegram';
  private readonly endpoint: string;
  private readonly botToken: string;
  private readonly channelId: string;
  private readonly messageDelayMs: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxAttempts: number;

  constructor(
    private readonly http: HttpClient,
    options: TelegramChannelOptions,
  ) {
    this.botToken = options.botToken;
    this.endpoint = `${TELEGRAM_API_BASE}/bot${options.botToken}/sendMessage`;
    this.channelId = options.channelId;
    this.messageDelayMs = options.messageDelayMs ?? DEFAULT_LIMITS.DELIVERY_DELAY_MS;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.maxAttempts = options.maxAttempts ?? 3;
  }

  async deliver(courses: readonly ConfirmedCourse[]): Promise<DeliveryReport> {
    let delivered = 0;
    const failed: DeliveryFailure[] = [];

    for (const [index, course] of courses.entries()) {
      if (index > 0 && this.messageDelayMs > 0) {
        await sleep(this.messageDelayMs);
      }

      try {
        await this.send(course.url);
        delivered++;
        log.debug({ url: course.url }, 'Course posted to channel');
      } catch (error) {
        const message = errorMessage(error);
        failed.push({ url: course.url, error: message });
        log.error({ url: course.url, error: message }, 'Failed to post course to channel');
      }
    }

    log.info({ delivered, failed: failed.length }, 'Telegram delivery finished');
    return { channel: this.name, delivered, failed };
  }

  /** Transport errors quote the request URL, which embeds the token. */
  private async post(payload: Record<string, unknown>): Promise<unknown> {
    try {
      return await this.http.postJson(this.endpoint, payload, { timeoutMs: SEND_TIMEOUT_MS });
    } catch (error) {
      if (error instanceof HttpRequestError) {
        throw new HttpRequestError(
          this.redact(error.message),
          error.code,
          this.redact(error.url),
          error.status,
        );
      }
      throw error;
    }
  }

  private redact(text: string): string {
    return text.split(this.botToken).join('<redacted>');
  }

  private async send(text: string): Promise<void> {
    const body = await retry(
      () =>
        this.post({
          chat_id: this.channelId,
          text,
          disable_web_page_preview: true,
        }),
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        shouldRetry: isTransientNetworkError,
      },
    );

    const parsed = sendMessageResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AppError('Unexpected sendMessage response', 'TELEGRAM_BAD_RESPONSE', 502);
    }
    if (!parsed.data.ok) {
      throw new AppError(
        `Telegram rejected message: ${parsed.data.description ?? 'no description'}`,
        'TELEGRAM_REJECTED',
        502,
      );
    }
  }
}
