import { openAsBlob } from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { TransportError, TransportErrorKind } from '../errors';
import { logger } from '../observability/logger';
import { BotIdentity, ChatTransport, Keyboard, MessageRef, SendOptions } from './types';

const REQUEST_TIMEOUT_MS = 10_000;

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function classify(statusCode: number | undefined): TransportErrorKind {
  if (statusCode === 403) return 'forbidden';
  if (statusCode === 400) return 'bad_request';
  return 'unknown';
}

/** Bot API wire shape of a Keyboard */
export function toReplyMarkup(keyboard: Keyboard): Json {
  switch (keyboard.kind) {
    case 'inline':
      return {
        inline_keyboard: keyboard.rows.map((row) =>
          row.map((b) => (b.url ? { text: b.text, url: b.url } : { text: b.text, callback_data: b.callbackData ?? '' })),
        ),
      };
    case 'reply':
      return {
        keyboard: keyboard.rows.map((row) =>
          row.map((b) => (b.requestContact ? { text: b.text, request_contact: true } : { text: b.text })),
        ),
        resize_keyboard: true,
        one_time_keyboard: keyboard.oneTime ?? true,
      };
    case 'remove':
      return { remove_keyboard: true };
  }
}

/**
 * Telegram Bot API adapter over fetch.
 * Non-ok responses become TransportError: 403 → forbidden, 400 → bad_request.
 */
export class TelegramTransport implements ChatTransport {
  private identity?: Promise<BotIdentity>;
  private readonly log: Logger;

  constructor(
    private readonly token: string,
    private readonly baseUrl: string,
    botName: string,
  ) {
    this.log = logger.child({ adapter: 'telegram', bot: botName });
  }

  private async apiCall(method: string, body: Json | FormData): Promise<unknown> {
    const url = `${this.baseUrl}/bot${this.token}/${method}`;
    const isForm = body instanceof FormData;

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: isForm ? undefined : { 'Content-Type': 'application/json' },
        body: isForm ? body : JSON.stringify(body),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (err) {
      this.log.error({ err, method }, 'Telegram API call failed');
      throw new TransportError('unknown', method, err instanceof Error ? err.message : String(err));
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      this.log.error({ err, method, status: res.status }, 'Telegram API returned a non-JSON body');
      throw new TransportError(classify(res.status), method, `HTTP ${res.status}`, res.status);
    }

    if (!isRecord(payload) || payload.ok !== true) {
      const statusCode = isRecord(payload) && typeof payload.error_code === 'number' ? payload.error_code : res.status;
      const description =
        isRecord(payload) && typeof payload.description === 'string' ? payload.description : `HTTP ${res.status}`;
      this.log.warn({ method, statusCode, description }, 'Telegram API error');
      throw new TransportError(classify(statusCode), method, description, statusCode);
    }

    return payload.result;
  }

  private async messageCall(method: string, body: Json | FormData, chatId: number): Promise<MessageRef> {
    const result = await this.apiCall(method, body);
    if (!isRecord(result) || typeof result.message_id !== 'number') {
      throw new TransportError('unknown', method, 'Response carries no message_id');
    }
    return { chatId, messageId: result.message_id };
  }

  getIdentity(): Promise<BotIdentity> {
    if (!this.identity) {
      this.identity = this.apiCall('getMe', {}).then((result) => {
        if (!isRecord(result) || typeof result.id !== 'number' || typeof result.username !== 'string') {
          throw new TransportError('unknown', 'getMe', 'Unexpected getMe response');
        }
        return { id: result.id, username: result.username };
      });
      // A failed lookup is retried on the next call
      this.identity.catch(() => {
        this.identity = undefined;
      });
    }
    return this.identity;
  }

  async sendText(chatId: number, text: string, options: SendOptions = {}): Promise<MessageRef> {
    return this.messageCall(
      'sendMessage',
      {
        chat_id: chatId,
        text,
        ...(options.threadId !== undefined ? { message_thread_id: options.threadId } : {}),
        ...(options.keyboard ? { reply_markup: toReplyMarkup(options.keyboard) } : {}),
        ...(options.html ? { parse_mode: 'HTML' } : {}),
        ...(options.disablePreview ? { link_preview_options: { is_disabled: true } } : {}),
      },
      chatId,
    );
  }

  async forwardMessage(toChatId: number, from: MessageRef, options: { threadId?: number } = {}): Promise<MessageRef> {
    return this.messageCall(
      'forwardMessage',
      {
        chat_id: toChatId,
        from_chat_id: from.chatId,
        message_id: from.messageId,
        ...(options.threadId !== undefined ? { message_thread_id: options.threadId } : {}),
      },
      toChatId,
    );
  }

  async copyMessage(toChatId: number, from: MessageRef, options: { threadId?: number } = {}): Promise<MessageRef> {
    return this.messageCall(
      'copyMessage',
      {
        chat_id: toChatId,
        from_chat_id: from.chatId,
        message_id: from.messageId,
        ...(options.threadId !== undefined ? { message_thread_id: options.threadId } : {}),
      },
      toChatId,
    );
  }

  async editText(target: MessageRef, text: string, options: { keyboard?: Keyboard; html?: boolean } = {}): Promise<void> {
    await this.apiCall('editMessageText', {
      chat_id: target.chatId,
      message_id: target.messageId,
      text,
      ...(options.keyboard ? { reply_markup: toReplyMarkup(options.keyboard) } : {}),
      ...(options.html ? { parse_mode: 'HTML' } : {}),
    });
  }

  async sendDocument(chatId: number, filePath: string, options: { caption?: string } = {}): Promise<MessageRef> {
    const form = new FormData();
    form.append('chat_id', String(chatId));
    form.append('document', await openAsBlob(filePath), path.basename(filePath));
    if (options.caption) form.append('caption', options.caption);
    return this.messageCall('sendDocument', form, chatId);
  }

  async answerCallback(callbackId: string, text?: string): Promise<void> {
    await this.apiCall('answerCallbackQuery', {
      callback_query_id: callbackId,
      ...(text ? { text } : {}),
    });
  }

  async createDiscussionThread(groupId: number, title: string): Promise<{ threadId: number }> {
    const result = await this.apiCall('createForumTopic', { chat_id: groupId, name: title });
    if (!isRecord(result) || typeof result.message_thread_id !== 'number') {
      throw new TransportError('unknown', 'createForumTopic', 'Response carries no message_thread_id');
    }
    return { threadId: result.message_thread_id };
  }

  async closeDiscussionThread(groupId: number, threadId: number): Promise<void> {
    await this.apiCall('closeForumTopic', { chat_id: groupId, message_thread_id: threadId });
  }

  async reopenDiscussionThread(groupId: number, threadId: number): Promise<void> {
    await this.apiCall('reopenForumTopic', { chat_id: groupId, message_thread_id: threadId });
  }

  async registerWebhook(url: string, secret: string): Promise<void> {
    await this.apiCall('setWebhook', {
      url,
      allowed_updates: ['message', 'callback_query'],
      ...(secret ? { secret_token: secret } : {}),
    });
    this.log.info({ url }, 'Webhook registered');
  }
}
