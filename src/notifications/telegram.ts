/**
 * Telegram Bot API client and the notifier that delivers digests to the configured chat
 */

import got, { HTTPError, type Got } from 'got';

import { logger } from '../logger.js';
import { asNumber, asString, isRecord } from '../subsonic/decode.js';
import { splitMessage, TELEGRAM_MESSAGE_LIMIT } from './split-message.js';

const TELEGRAM_API_BASE = 'https://api.telegram.org';
const DEFAULT_TIMEOUT_MS = 30000;

export type ParseMode = 'HTML' | 'MarkdownV2';

export interface TelegramConfig {
  token: string;
  apiBase?: string;
  timeoutMs?: number;
}

export interface SendOptions {
  parseMode?: ParseMode;
  replyToMessageId?: number;
}

export interface IncomingMessage {
  messageId: number;
  chatId: string;
  text: string;
  username?: string;
}

export interface TelegramUpdate {
  updateId: number;
  message?: IncomingMessage;
}

export class TelegramError extends Error {
  constructor(
    readonly method: string,
    message: string,
    readonly statusCode?: number,
    options?: ErrorOptions
  ) {
    super(`telegram ${method}: ${message}`, options);
    this.name = 'TelegramError';
  }
}

const decodeMessage = (raw: unknown): IncomingMessage | undefined => {
  if (!isRecord(raw) || !isRecord(raw.chat)) {
    return undefined;
  }

  const messageId = asNumber(raw.message_id);
  const chatId = asString(raw.chat.id);
  if (messageId === undefined || chatId === undefined) {
    return undefined;
  }

  const message: IncomingMessage = { messageId, chatId, text: asString(raw.text) ?? '' };
  const username = isRecord(raw.from) ? asString(raw.from.username) : undefined;
  if (username) message.username = username;
  return message;
};

export const decodeUpdate = (raw: unknown): TelegramUpdate | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const updateId = asNumber(raw.update_id);
  if (updateId === undefined) {
    return null;
  }

  const update: TelegramUpdate = { updateId };
  const message = decodeMessage(raw.message);
  if (message) update.message = message;
  return update;
};

/** Telegram explains rejected calls in a JSON `description` */
const describeHttpError = (error: HTTPError): string => {
  const body: unknown = error.response.body;
  if (typeof body !== 'string') {
    return error.message;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return (isRecord(parsed) ? asString(parsed.description) : undefined) ?? error.message;
  } catch {
    return error.message;
  }
};

export class TelegramClient {
  private readonly http: Got;
  private readonly timeoutMs: number;

  constructor(config: TelegramConfig) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = got.extend({
      prefixUrl: `${config.apiBase ?? TELEGRAM_API_BASE}/bot${config.token}`,
      timeout: { request: this.timeoutMs },
      retry: { limit: 0 }
    });
  }

  private async call(method: string, request: () => Promise<unknown>): Promise<unknown> {
    let payload: unknown;
    try {
      payload = await request();
    } catch (error) {
      if (error instanceof HTTPError) {
        const description = describeHttpError(error);
        throw new TelegramError(method, description, error.response.statusCode, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TelegramError(method, message, undefined, { cause: error });
    }

    if (!isRecord(payload) || payload.ok !== true) {
      const description = isRecord(payload) ? asString(payload.description) : undefined;
      throw new TelegramError(method, description ?? 'request was not ok');
    }
    return payload.result;
  }

  async sendMessage(chatId: string, text: string, options: SendOptions = {}): Promise<void> {
    const json: Record<string, unknown> = {
      chat_id: chatId,
      text,
      parse_mode: options.parseMode ?? 'HTML',
      disable_web_page_preview: true
    };
    if (options.replyToMessageId !== undefined) {
      json.reply_to_message_id = options.replyToMessageId;
    }

    await this.call('sendMessage', () => this.http.post('sendMessage', { json }).json<unknown>());
  }

  /**
   * Upload an image as multipart form data
   */
  async sendPhoto(
    chatId: string,
    photo: Buffer,
    options: SendOptions & { caption?: string } = {}
  ): Promise<void> {
    const form = new FormData();
    form.append('chat_id', chatId);
    form.append('photo', new Blob([photo]), 'cover.jpg');
    if (options.caption) {
      form.append('caption', options.caption);
      form.append('parse_mode', options.parseMode ?? 'HTML');
    }
    if (options.replyToMessageId !== undefined) {
      form.append('reply_to_message_id', String(options.replyToMessageId));
    }

    await this.call('sendPhoto', () => this.http.post('sendPhoto', { body: form }).json<unknown>());
  }

  /**
   * Long-poll for updates after `offset`. The HTTP timeout is stretched past
   * the poll timeout so an idle poll is not reported as a failure.
   */
  async getUpdates(offset: number, timeoutSeconds: number): Promise<TelegramUpdate[]> {
    const result = await this.call('getUpdates', () =>
      this.http
        .get('getUpdates', {
          searchParams: { offset, timeout: timeoutSeconds, allowed_updates: JSON.stringify(['message']) },
          timeout: { request: timeoutSeconds * 1000 + this.timeoutMs }
        })
        .json<unknown>()
    );

    if (!Array.isArray(result)) {
      throw new TelegramError('getUpdates', 'result is not a list of updates');
    }

    return result.map(decodeUpdate).filter((update): update is TelegramUpdate => update !== null);
  }
}

export type MessageSender = Pick<TelegramClient, 'sendMessage'>;

export interface DeliveryReport {
  parts: number;
  sent: number;
  failed: number;
}

/**
 * Sends possibly long HTML messages to one chat, split on album boundaries
 */
export class TelegramNotifier {
  constructor(
    private readonly client: MessageSender,
    private readonly chatId: string,
    private readonly maxLength = TELEGRAM_MESSAGE_LIMIT
  ) {}

  async send(text: string): Promise<DeliveryReport> {
    if (!this.chatId) {
      logger.error('telegram chat id not configured, notification not sent');
      return { parts: 0, sent: 0, failed: 0 };
    }

    const parts = splitMessage(text, this.maxLength);
    let sent = 0;
    let failed = 0;

    for (const [index, part] of parts.entries()) {
      try {
        await this.client.sendMessage(this.chatId, part);
        sent++;
      } catch (error) {
        failed++;
        logger.error({ err: error, part: index + 1, parts: parts.length }, 'failed to send notification part');
      }
    }

    logger.info({ parts: parts.length, sent, failed }, 'notification delivered');
    return { parts: parts.length, sent, failed };
  }
}
