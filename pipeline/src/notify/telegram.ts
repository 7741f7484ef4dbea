/**
 * Telegram Bot API delivery
 */

import { z } from 'zod';
import { describeError } from '../errors.js';
import { postJson, type HttpOptions } from '../http/fetch-json.js';
import { withRetry } from '../http/retry.js';
import { chunkMessage } from './format.js';

export const TELEGRAM_API_URL = 'https://api.telegram.org';

export type ParseMode = 'MarkdownV2' | 'plain';

const sendResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export interface TelegramOptions {
  botToken: string;
  chatId: string;
  http: HttpOptions;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
  };
  baseUrl?: string;
}

export interface DeliveryReport {
  sent: number;
  failed: number;
  errors: string[];
}

export class TelegramNotifier {
  private readonly options: TelegramOptions;

  constructor(options: TelegramOptions) {
    this.options = options;
  }

  private get endpoint(): string {
    const base = this.options.baseUrl ?? TELEGRAM_API_URL;
    return `${base}/bot${this.options.botToken}/sendMessage`;
  }

  /**
   * Hide the bot token, which the request URL embeds, from log text
   */
  redact(text: string): string {
    return text.split(this.options.botToken).join('<token>');
  }

  /**
   * Send one message, split into chunks Telegram accepts. Throws when a
   * chunk cannot be delivered; the error message never contains the token.
   */
  async send(text: string, parseMode: ParseMode = 'MarkdownV2'): Promise<number> {
    const chunks = chunkMessage(text);
    for (const chunk of chunks) {
      const body: Record<string, string> = { chat_id: this.options.chatId, text: chunk };
      if (parseMode === 'MarkdownV2') body.parse_mode = 'MarkdownV2';

      try {
        await withRetry(
          async () => {
            const response = sendResponseSchema.parse(await postJson(this.endpoint, body, this.options.http));
            if (!response.ok) {
              throw new Error(`Telegram rejected the message: ${response.description ?? 'no description'}`);
            }
          },
          { ...this.options.retry, label: 'telegram sendMessage' }
        );
      } catch (error) {
        throw new Error(this.redact(describeError(error)));
      }
    }
    return chunks.length;
  }

  /**
   * Send every message, logging failures instead of throwing
   */
  async sendAll(messages: string[], parseMode: ParseMode = 'MarkdownV2'): Promise<DeliveryReport> {
    const report: DeliveryReport = { sent: 0, failed: 0, errors: [] };
    for (const message of messages) {
      try {
        await this.send(message, parseMode);
        report.sent++;
      } catch (error) {
        const detail = describeError(error);
        report.failed++;
        report.errors.push(detail);
        console.error(`  ❌ [Telegram] Send failed: ${detail}`);
      }
    }
    return report;
  }
}
