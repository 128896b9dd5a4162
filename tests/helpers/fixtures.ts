import { BotConfig } from '../../src/config/types';
import { CallbackEvent, ChatMessage, ChatTransport, ChatUser } from '../../src/transport/types';

export const GROUP_ID = -1001234;
export const USER_ID = 42;

export const BOT: BotConfig = {
  name: 'support',
  token: 'test-token',
  adminGroupId: GROUP_ID,
  webhookSecret: 'test-secret',
  helloMessage: '',
};

export const BOT_IDENTITY = { id: 999, username: 'support_test_bot' };

export const USER: ChatUser = { id: USER_ID, isBot: false, firstName: 'Иван', lastName: 'Петров', username: 'ivan' };
export const STAFF: ChatUser = { id: 7, isBot: false, firstName: 'Оператор' };

export type MockTransport = jest.Mocked<Required<ChatTransport>>;

/** Recording transport: message ids count up from 1000, thread ids from 500 */
export function createMockTransport(): MockTransport {
  let nextMessageId = 1000;
  let nextThreadId = 500;
  return {
    getIdentity: jest.fn().mockResolvedValue(BOT_IDENTITY),
    sendText: jest.fn().mockImplementation(async (chatId: number) => ({ chatId, messageId: nextMessageId++ })),
    forwardMessage: jest.fn().mockImplementation(async (chatId: number) => ({ chatId, messageId: nextMessageId++ })),
    copyMessage: jest.fn().mockImplementation(async (chatId: number) => ({ chatId, messageId: nextMessageId++ })),
    editText: jest.fn().mockResolvedValue(undefined),
    sendDocument: jest.fn().mockImplementation(async (chatId: number) => ({ chatId, messageId: nextMessageId++ })),
    answerCallback: jest.fn().mockResolvedValue(undefined),
    createDiscussionThread: jest.fn().mockImplementation(async () => ({ threadId: nextThreadId++ })),
    closeDiscussionThread: jest.fn().mockResolvedValue(undefined),
    reopenDiscussionThread: jest.fn().mockResolvedValue(undefined),
    registerWebhook: jest.fn().mockResolvedValue(undefined),
  };
}

export function privateMessage(overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    messageId: 10,
    chatId: USER_ID,
    chatType: 'private',
    isForum: false,
    from: USER,
    newChatMembers: [],
    groupChatCreated: false,
    ...overrides,
  };
}

export function textMessage(text: string, overrides: Partial<ChatMessage> = {}): ChatMessage {
  const command = /^\/(\w+)/.exec(text)?.[1];
  return privateMessage({ text, command, ...overrides });
}

/** A staff message inside a ticket thread; topic messages reply to the topic root */
export function staffMessage(threadId: number, overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    messageId: 300,
    chatId: GROUP_ID,
    chatType: 'supergroup',
    isForum: true,
    threadId,
    from: STAFF,
    text: 'Ответ оператора',
    replyTo: {
      messageId: threadId,
      chatId: GROUP_ID,
      chatType: 'supergroup',
      isForum: true,
      newChatMembers: [],
      groupChatCreated: false,
    },
    newChatMembers: [],
    groupChatCreated: false,
    ...overrides,
  };
}

export function callbackEvent(data: string, messageId = 2000, chatId = USER_ID): CallbackEvent {
  return {
    id: `cb-${messageId}`,
    from: USER,
    data,
    message: {
      messageId,
      chatId,
      chatType: 'private',
      isForum: false,
      newChatMembers: [],
      groupChatCreated: false,
    },
  };
}

/** Texts sent to a chat, in order */
export function textsSentTo(transport: MockTransport, chatId: number): string[] {
  return transport.sendText.mock.calls.filter(([id]) => id === chatId).map(([, text]) => text);
}
