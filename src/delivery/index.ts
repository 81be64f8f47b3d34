import type { Env } from '../env.js';
import type { HttpClient } from '../discovery/http-client.js';
import { LogChannel } from './log-channel.js';
import { TelegramChannel } from './telegram.js';
import type { DeliveryChannel } from './types.js';

export { LogChannel } from './log-channel.js';
export { TelegramChannel } from './telegram.js';
export type { TelegramChannelOptions } from './telegram.js';
export type { DeliveryChannel, DeliveryFailure, DeliveryReport } from './types.js';

/** Telegram when both credentials are configured, the log otherwise. */
export function createDeliveryChannel(
  env: Pick<Env, 'TELEGRAM_BOT_TOKEN' | 'TELEGRAM_CHANNEL_ID' | 'DELIVERY_DELAY_MS'>,
  http: HttpClient,
): DeliveryChannel {
  if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHANNEL_ID) {
    return new TelegramChannel(http, {
      botToken: env.TELEGRAM_BOT_TOKEN,
      channelId: env.TELEGRAM_CHANNEL_ID,
      messageDelayMs: env.DELIVERY_DELAY_MS,
    });
  }
  return new LogChannel();
}
