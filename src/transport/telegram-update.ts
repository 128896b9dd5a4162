import { CallbackEvent, ChatMessage, ChatType, ChatUser, InboundEvent } from './types';

export type UpdateParseResult =
  | { ok: true; updateId: number; event: InboundEvent }
  | { ok: false; updateId?: number; reason: string };

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

const CHAT_TYPES: readonly ChatType[] = ['private', 'group', 'supergroup', 'channel'];

function chatType(value: unknown): ChatType | undefined {
  return CHAT_TYPES.find((t) => t === value);
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s|$)/;

/** `/close@support_bot now` → `close` */
export function extractCommand(text: string | undefined): string | undefined {
  if (!text) return undefined;
  const match = COMMAND_PATTERN.exec(text);
  return match ? match[1].toLowerCase() : undefined;
}

export function parseUser(raw: unknown): ChatUser | undefined {
  if (!isRecord(raw)) return undefined;
  const id = num(raw.id);
  const firstName = str(raw.first_name);
  if (id === undefined || firstName === undefined) return undefined;
  return {
    id,
    isBot: raw.is_bot === true,
    firstName,
    lastName: str(raw.last_name),
    username: str(raw.username),
  };
}

function parseMessage(raw: unknown, depth = 0): ChatMessage | undefined {
  if (!isRecord(raw) || !isRecord(raw.chat)) return undefined;
  const messageId = num(raw.message_id);
  const chatId = num(raw.chat.id);
  const type = chatType(raw.chat.type);
  if (messageId === undefined || chatId === undefined || type === undefined) return undefined;

  const text = str(raw.text);
  const members = Array.isArray(raw.new_chat_members) ? raw.new_chat_members : [];

  let contact: ChatMessage['contact'];
  if (isRecord(raw.contact)) {
    const phoneNumber = str(raw.contact.phone_number);
    if (phoneNumber !== undefined) contact = { phoneNumber, userId: num(raw.contact.user_id) };
  }

  return {
    messageId,
    chatId,
    chatType: type,
    // General-topic messages carry no thread id; only topic messages do
    threadId: raw.is_topic_message === true ? num(raw.message_thread_id) : undefined,
    isForum: raw.chat.is_forum === true,
    from: parseUser(raw.from),
    text,
    caption: str(raw.caption),
    command: extractCommand(text),
    contact,
    replyTo: depth === 0 ? parseMessage(raw.reply_to_message, depth + 1) : undefined,
    newChatMembers: members.map((m) => parseUser(m)).filter((m): m is ChatUser => m !== undefined),
    groupChatCreated: raw.group_chat_created === true || raw.supergroup_chat_created === true,
  };
}

function parseCallback(raw: Json): CallbackEvent | undefined {
  const id = str(raw.id);
  const from = parseUser(raw.from);
  if (id === undefined || from === undefined) return undefined;
  return {
    id,
    from,
    message: parseMessage(raw.message),
    data: str(raw.data) ?? '',
  };
}

/**
 * Parse a raw Bot API update into an InboundEvent.
 * Update kinds the relay does not handle are reported as not ok.
 */
export function parseTelegramUpdate(payload: unknown): UpdateParseResult {
  if (!isRecord(payload)) return { ok: false, reason: 'Update is not an object' };
  const updateId = num(payload.update_id);
  if (updateId === undefined) return { ok: false, reason: 'Missing update_id' };

  if (isRecord(payload.message)) {
    const message = parseMessage(payload.message);
    if (!message) return { ok: false, updateId, reason: 'Malformed message' };
    return { ok: true, updateId, event: { kind: 'message', message } };
  }

  if (isRecord(payload.callback_query)) {
    const callback = parseCallback(payload.callback_query);
    if (!callback) return { ok: false, updateId, reason: 'Malformed callback_query' };
    return { ok: true, updateId, event: { kind: 'callback', callback } };
  }

  return { ok: false, updateId, reason: 'Unsupported update type' };
}
