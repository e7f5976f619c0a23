/**
 * TELEGRAM TRANSPORT
 * ==================
 *
 * Posts text to a chat through the Bot API sendMessage method.
 */

import axios from 'axios';
import { errorMessage } from '../../../common/errors.js';
import { noopLogger, type Logger } from '../../../common/logger.js';
import type { NotificationTransport, SendResult } from '../contracts/notify.types.js';

const TELEGRAM_API = 'https://api.telegram.org';

interface TelegramResponse {
  ok: boolean;
  result?: { message_id: number };
  description?: string;
}

export interface TelegramTransportOptions {
  enabled: boolean;
  botToken: string;
  chatId: string;
  parseMode: 'Markdown' | 'plain';
  timeoutMs: number;
  apiBase?: string;
  logger?: Logger;
}

export class TelegramTransport implements NotificationTransport {
  readonly name = 'telegram';
  private readonly logger: Logger;

  constructor(private readonly options: TelegramTransportOptions) {
    this.logger = options.logger ?? noopLogger;
  }

  isConfigured(): boolean {
    return this.options.enabled && this.options.botToken.length > 0 && this.options.chatId.length > 0;
  }

  async send(text: string): Promise<SendResult> {
    const { botToken, chatId, parseMode, timeoutMs } = this.options;
    const url = `${this.options.apiBase ?? TELEGRAM_API}/bot${botToken}/sendMessage`;

    try {
      const response = await axios.post<TelegramResponse>(
        url,
        {
          chat_id: chatId,
          text,
          ...(parseMode === 'plain' ? {} : { parse_mode: parseMode }),
          disable_web_page_preview: true,
        },
        { timeout: timeoutMs }
      );

      if (!response.data.ok) {
        const error = response.data.description ?? 'Telegram rejected the message';
        this.logger.error({ error }, '[Telegram] Send failed');
        return { ok: false, error };
      }

      return { ok: true, messageId: response.data.result?.message_id };
    } catch (err) {
      const error = axios.isAxiosError<TelegramResponse>(err)
        ? (err.response?.data?.description ?? err.message)
        : errorMessage(err);
      this.logger.error({ error }, '[Telegram] Send failed');
      return { ok: false, error };
    }
  }
}

/**
 * Escape characters that legacy Markdown treats as markup.
 */
export function escapeMarkdown(text: string): string {
  return text
    .replace(/\*/g, '\\*')
    .replace(/_/g, '\\_')
    .replace(/`/g, '\\`')
    .replace(/\[/g, '\\[');
}
