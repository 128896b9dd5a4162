// ───── Inbound ─────

export interface ChatUser {
  id: number;
  isBot: boolean;
  firstName: string;
  lastName?: string;
  username?: string;
}

export type ChatType = 'private' | 'group' | 'supergroup' | 'channel';

export interface ChatMessage {
  messageId: number;
  chatId: number;
  chatType: ChatType;
  /** Forum topic the message was posted in */
  threadId?: number;
  isForum: boolean;
  from?: ChatUser;
  text?: string;
  caption?: string;
  /** Bot command name without the slash or @botname suffix */
  command?: string;
  contact?: { phoneNumber: string; userId?: number };
  replyTo?: ChatMessage;
  newChatMembers: ChatUser[];
  groupChatCreated: boolean;
}

export interface CallbackEvent {
  id: string;
  from: ChatUser;
  /** Message the pressed button belongs to */
  message?: ChatMessage;
  data: string;
}

export type InboundEvent =
  | { kind: 'message'; message: ChatMessage }
  | { kind: 'callback'; callback: CallbackEvent };

// ───── Outbound ─────

export interface InlineButton {
  text: string;
  callbackData?: string;
  url?: string;
}

export interface ReplyButton {
  text: string;
  requestContact?: boolean;
}

export type Keyboard =
  | { kind: 'inline'; rows: InlineButton[][] }
  | { kind: 'reply'; rows: ReplyButton[][]; oneTime?: boolean }
  | { kind: 'remove' };

export type InlineKeyboard = Extract<Keyboard, { kind: 'inline' }>;

export interface SendOptions {
  threadId?: number;
  keyboard?: Keyboard;
  html?: boolean;
  disablePreview?: boolean;
}

export interface MessageRef {
  chatId: number;
  messageId: number;
}

export interface BotIdentity {
  id: number;
  username: string;
}

/**
 * Narrow messaging surface the relay needs. Every method rejects with
 * TransportError on failure.
 */
export interface ChatTransport {
  getIdentity(): Promise<BotIdentity>;
  sendText(chatId: number, text: string, options?: SendOptions): Promise<MessageRef>;
  forwardMessage(toChatId: number, from: MessageRef, options?: { threadId?: number }): Promise<MessageRef>;
  copyMessage(toChatId: number, from: MessageRef, options?: { threadId?: number }): Promise<MessageRef>;
  editText(target: MessageRef, text: string, options?: { keyboard?: Keyboard; html?: boolean }): Promise<void>;
  sendDocument(chatId: number, filePath: string, options?: { caption?: string }): Promise<MessageRef>;
  answerCallback(callbackId: string, text?: string): Promise<void>;
  createDiscussionThread(groupId: number, title: string): Promise<{ threadId: number }>;
  closeDiscussionThread(groupId: number, threadId: number): Promise<void>;
  reopenDiscussionThread(groupId: number, threadId: number): Promise<void>;
  /** Point the platform's webhook at this service */
  registerWebhook?(url: string, secret: string): Promise<void>;
}

export function fullName(user: ChatUser): string {
  return user.lastName ? `${user.firstName} ${user.lastName}` : user.firstName;
}

/** Text plus caption, in that order of preference */
export function messageBody(message: ChatMessage): string | undefined {
  return message.text ?? message.caption;
}
