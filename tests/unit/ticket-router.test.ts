import {
  STAFF_COPY,
  USER_COPY,
  alreadyClosedNotice,
  botTargetNotice,
  closedNotice,
  missingTopicRightsNotice,
  reopenedByMessageNotice,
  surveyNotDelivered,
  ticketAcknowledgement,
  userBlockedNotice,
} from '../../src/copy';
import { BotConfig } from '../../src/config/types';
import { REMOVE_KEYBOARD, closureKeyboard } from '../../src/conversation/keyboards';
import { UserDirectory } from '../../src/directory/user-directory';
import { TransportError } from '../../src/errors';
import { InMemoryAccountRepository } from '../../src/persistence/account-repository';
import { InMemoryTicketRepository } from '../../src/persistence/ticket-repository';
import { Account } from '../../src/persistence/types';
import { TicketRequest, TicketRouter } from '../../src/routing/ticket-router';
import { buildTicketSummary, shortUserInfo } from '../../src/routing/ticket-formatting';
import { ChatMessage, ChatUser } from '../../src/transport/types';
import {
  BOT,
  GROUP_ID,
  MockTransport,
  USER,
  USER_ID,
  createMockTransport,
  staffMessage,
  textMessage,
} from '../helpers/fixtures';

const STAFFED = new Date('2025-03-10T03:00:00Z'); // 12:00 in Asia/Yakutsk
const OFF_HOURS = new Date('2025-03-10T17:30:00Z'); // 02:30 in Asia/Yakutsk

const ANNA: Account = { id: 1, name: 'Анна', phone: '79991234567', conversationId: USER_ID };

describe('TicketRouter', () => {
  let transport: MockTransport;
  let tickets: InMemoryTicketRepository;
  let accounts: InMemoryAccountRepository;
  let now: Date;
  let router: TicketRouter;

  beforeEach(() => {
    transport = createMockTransport();
    tickets = new InMemoryTicketRepository();
    accounts = new InMemoryAccountRepository();
    now = STAFFED;
    router = new TicketRouter({
      bot: BOT,
      transport,
      tickets,
      directory: new UserDirectory(accounts),
      staffedHours: { timeZone: 'Asia/Yakutsk', startHour: 8, endHour: 23 },
      clock: () => now,
    });
  });

  async function openTicket(threadId: number | null = 500): Promise<number> {
    const ticket = await tickets.create({
      conversationId: USER_ID,
      accountId: null,
      category: 'Другое',
      orderNumber: null,
      description: 'Не работает',
      branch: 'Неизвестно',
      storeId: null,
    });
    if (threadId !== null) await tickets.assignThread(ticket.id, threadId, 'Тема');
    return ticket.id;
  }

  describe('isStaffedNow', () => {
    it('should follow the clock', () => {
      expect(router.isStaffedNow()).toBe(true);
      now = OFF_HOURS;
      expect(router.isStaffedNow()).toBe(false);
    });
  });

  describe('createTicket', () => {
    it('should open a thread for a guest and acknowledge', async () => {
      const ticket = await router.createTicket({
        message: textMessage('Не приходит код'),
        account: null,
        category: 'Другое',
        orderNumber: null,
        description: 'Не приходит код',
      });

      expect(ticket).toMatchObject({ id: 1, threadId: 500, subject: 'Незарегистрированный: Иван Петров (Другое)' });
      expect(transport.createDiscussionThread).toHaveBeenCalledWith(GROUP_ID, 'Незарегистрированный: Иван Петров (Другое)');
      expect(transport.sendText).toHaveBeenNthCalledWith(
        1,
        GROUP_ID,
        buildTicketSummary({
          ticketId: 1,
          displayName: 'Иван Петров',
          category: 'Другое',
          orderNumber: null,
          storeTitle: null,
          description: 'Не приходит код',
        }),
        { threadId: 500, html: true },
      );
      expect(transport.sendText).toHaveBeenNthCalledWith(2, USER_ID, ticketAcknowledgement(1, true), {
        keyboard: REMOVE_KEYBOARD,
      });
      expect((await tickets.findById(1))?.threadId).toBe(500);
    });

    it('should use the off-hours acknowledgement at night', async () => {
      now = OFF_HOURS;
      await router.createTicket({
        message: textMessage('Вопрос'),
        account: null,
        category: 'Другое',
        orderNumber: null,
        description: 'Вопрос',
      });

      expect(transport.sendText).toHaveBeenLastCalledWith(USER_ID, ticketAcknowledgement(1, false), {
        keyboard: REMOVE_KEYBOARD,
      });
    });

    it('should resolve the store of the chosen order for registered users', async () => {
      accounts.addAccount(ANNA);
      accounts.addOrder({ id: 1, accountId: 1, orderNumber: '5001', storeId: 's1', createdAt: STAFFED });
      accounts.addStore({ id: 's1', title: 'Центральный', kind: null, street: null });

      const ticket = await router.createTicket({
        message: textMessage('Сломан товар'),
        account: ANNA,
        category: 'проблемы с заказом',
        orderNumber: '5001',
        description: 'Сломан товар',
      });

      expect(ticket).toMatchObject({
        accountId: 1,
        storeId: 's1',
        branch: 'Россия',
        orderNumber: '5001',
        subject: 'Центральный: 5001: Анна',
      });
    });

    it('should close the orphan row and tell staff when topics cannot be created', async () => {
      transport.createDiscussionThread.mockRejectedValueOnce(
        new TransportError('bad_request', 'createForumTopic', 'Bad Request: not enough rights to create a topic'),
      );

      const ticket = await router.createTicket({
        message: textMessage('Помогите'),
        account: null,
        category: 'Другое',
        orderNumber: null,
        description: 'Помогите',
      });

      expect(ticket).toBeNull();
      expect((await tickets.findById(1))?.status).toBe('closed');
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, missingTopicRightsNotice(shortUserInfo(USER)), {
        html: true,
      });
      expect(transport.sendText).toHaveBeenLastCalledWith(USER_ID, USER_COPY.ticketCreateFailed);
    });

    it('should keep the stored binding and close the new thread when the ticket is already bound', async () => {
      const assignThread = tickets.assignThread.bind(tickets);
      jest.spyOn(tickets, 'assignThread').mockImplementationOnce(async (id, _threadId, subject) => {
        await assignThread(id, 600, subject);
        return false;
      });

      const ticket = await router.createTicket({
        message: textMessage('Вопрос'),
        account: null,
        category: 'Другое',
        orderNumber: null,
        description: 'Вопрос',
      });

      expect(ticket).toMatchObject({ id: 1, threadId: 600, status: 'open' });
      expect(transport.closeDiscussionThread).toHaveBeenCalledWith(GROUP_ID, 500);
      expect(transport.sendText).not.toHaveBeenCalled();
    });

    it('should close the ticket when the new thread cannot be bound', async () => {
      jest.spyOn(tickets, 'assignThread').mockResolvedValueOnce(false);

      const ticket = await router.createTicket({
        message: textMessage('Вопрос'),
        account: null,
        category: 'Другое',
        orderNumber: null,
        description: 'Вопрос',
      });

      expect(ticket).toBeNull();
      expect((await tickets.findById(1))?.status).toBe('closed');
      expect(transport.closeDiscussionThread).toHaveBeenCalledWith(GROUP_ID, 500);
      expect(transport.sendText).toHaveBeenCalledTimes(1);
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.ticketCreateFailed);
    });
  });

  describe('forwardUserMessage', () => {
    it('should point users without a ticket to /start', async () => {
      await expect(router.forwardUserMessage(textMessage('Привет'))).resolves.toBe('no_ticket');
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.startHint);
    });

    it('should forward into the ticket thread', async () => {
      await openTicket();

      await expect(router.forwardUserMessage(textMessage('Ещё деталь'))).resolves.toBe('forwarded');
      expect(transport.forwardMessage).toHaveBeenCalledWith(GROUP_ID, { chatId: USER_ID, messageId: 10 }, { threadId: 500 });
    });

    it('should reopen a closed, unconfirmed ticket and tell staff', async () => {
      const id = await openTicket();
      await tickets.updateStatus(id, 'closed');

      await expect(router.forwardUserMessage(textMessage('Не помогло'))).resolves.toBe('reopened');
      expect((await tickets.findById(id))?.status).toBe('reopened');
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, reopenedByMessageNotice(id), { threadId: 500, html: false });
      expect(transport.forwardMessage).toHaveBeenCalledTimes(1);
    });

    it('should not reopen a confirmed ticket', async () => {
      const id = await openTicket();
      await tickets.updateStatus(id, 'closed');
      await tickets.confirmResolved(id);

      await expect(router.forwardUserMessage(textMessage('Спасибо'))).resolves.toBe('no_ticket');
      expect((await tickets.findById(id))?.status).toBe('closed');
    });

    it('should close an active ticket that has no thread', async () => {
      const id = await openTicket(null);

      await expect(router.forwardUserMessage(textMessage('Алло'))).resolves.toBe('orphaned');
      expect((await tickets.findById(id))?.status).toBe('closed');
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.ticketWithoutThread);
      expect(transport.forwardMessage).not.toHaveBeenCalled();
    });

    it('should explain forwarding failures', async () => {
      await openTicket();
      transport.forwardMessage.mockRejectedValueOnce(new TransportError('forbidden', 'forwardMessage', 'Forbidden'));

      await expect(router.forwardUserMessage(textMessage('Ещё'))).resolves.toBe('failed');
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.forwardForbidden);
    });
  });

  describe('forwardStaffReply', () => {
    it('should copy the reply to the ticket owner', async () => {
      await openTicket();

      await expect(router.forwardStaffReply(staffMessage(500))).resolves.toBe('delivered');
      expect(transport.copyMessage).toHaveBeenCalledWith(USER_ID, { chatId: GROUP_ID, messageId: 300 });
    });

    it('should ignore messages outside a thread', async () => {
      await expect(router.forwardStaffReply(staffMessage(500, { threadId: undefined }))).resolves.toBe('ignored');
      expect(transport.copyMessage).not.toHaveBeenCalled();
    });

    it('should warn in threads without a ticket', async () => {
      await expect(router.forwardStaffReply(staffMessage(777))).resolves.toBe('no_ticket');
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, STAFF_COPY.threadWithoutTicket, { threadId: 777 });
    });

    it('should report users who blocked the bot', async () => {
      await openTicket();
      transport.copyMessage.mockRejectedValueOnce(
        new TransportError('forbidden', 'copyMessage', 'Forbidden: bot was blocked by the user', 403),
      );

      await expect(router.forwardStaffReply(staffMessage(500))).resolves.toBe('blocked');
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, userBlockedNotice(USER_ID, 'support_test_bot'), {
        threadId: 500,
      });
    });

    it('should report replies addressed to another bot', async () => {
      await openTicket();
      transport.copyMessage.mockRejectedValueOnce(
        new TransportError('forbidden', 'copyMessage', "Forbidden: bots can't send messages to bots", 403),
      );

      await expect(router.forwardStaffReply(staffMessage(500))).resolves.toBe('blocked');
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, botTargetNotice(USER_ID), { threadId: 500 });
    });

    it('should rethrow other failures', async () => {
      await openTicket();
      transport.copyMessage.mockRejectedValueOnce(new TransportError('unknown', 'copyMessage', 'timeout'));

      await expect(router.forwardStaffReply(staffMessage(500))).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('closeFromThread', () => {
    const closeCommand = staffMessage(500, { text: '/close', command: 'close' });

    it('should close the ticket and send the survey', async () => {
      const id = await openTicket();

      await expect(router.closeFromThread(closeCommand)).resolves.toBe('closed');
      expect((await tickets.findById(id))?.status).toBe('closed');
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, closedNotice(id), { threadId: 500 });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.closurePrompt, { keyboard: closureKeyboard(id) });
    });

    it('should not close twice', async () => {
      const id = await openTicket();
      await router.closeFromThread(closeCommand);
      transport.sendText.mockClear();

      await expect(router.closeFromThread(closeCommand)).resolves.toBe('already_closed');
      expect(transport.sendText).toHaveBeenCalledTimes(1);
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, alreadyClosedNotice(id), { threadId: 500 });
    });

    it('should require a thread', async () => {
      await expect(router.closeFromThread(staffMessage(500, { threadId: undefined }))).resolves.toBe('outside_thread');
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, STAFF_COPY.closeOutsideThread);
    });

    it('should report threads without a ticket', async () => {
      await expect(router.closeFromThread(closeCommand)).resolves.toBe('not_found');
      expect(transport.sendText).toHaveBeenCalledWith(GROUP_ID, STAFF_COPY.ticketNotFoundForThread, { threadId: 500 });
    });

    it('should tell staff when the survey cannot be delivered', async () => {
      await openTicket();
      transport.sendText.mockImplementation(async (chatId: number) => {
        if (chatId === USER_ID) throw new TransportError('forbidden', 'sendMessage', 'Forbidden');
        return { chatId, messageId: 1 };
      });

      await expect(router.closeFromThread(closeCommand)).resolves.toBe('closed');
      expect(transport.sendText).toHaveBeenLastCalledWith(GROUP_ID, surveyNotDelivered(USER_ID), { threadId: 500 });
    });
  });
});

describe('TicketRouter with bots sharing one ticket store', () => {
  const SHOP_GROUP_ID = -1005678;
  const SHOP_BOT: BotConfig = { ...BOT, name: 'shop', token: 'test-token-2', adminGroupId: SHOP_GROUP_ID };
  const MARIA: ChatUser = { id: 43, isBot: false, firstName: 'Мария' };

  let store: InMemoryTicketRepository;
  let supportTransport: MockTransport;
  let shopTransport: MockTransport;
  let support: TicketRouter;
  let shop: TicketRouter;

  function routerFor(bot: BotConfig, transport: MockTransport): TicketRouter {
    return new TicketRouter({
      bot,
      transport,
      tickets: store.forBot(bot.name),
      directory: new UserDirectory(new InMemoryAccountRepository()),
      staffedHours: { timeZone: 'Asia/Yakutsk', startHour: 8, endHour: 23 },
      clock: () => STAFFED,
    });
  }

  function request(message: ChatMessage): TicketRequest {
    return { message, account: null, category: 'Другое', orderNumber: null, description: 'Вопрос' };
  }

  beforeEach(() => {
    store = new InMemoryTicketRepository();
    // both staff groups hand out thread 500 first
    supportTransport = createMockTransport();
    shopTransport = createMockTransport();
    support = routerFor(BOT, supportTransport);
    shop = routerFor(SHOP_BOT, shopTransport);
  });

  it('should deliver staff replies to the user of the bot that owns the thread', async () => {
    const first = await support.createTicket(request(textMessage('Вопрос')));
    const second = await shop.createTicket(request(textMessage('Вопрос', { chatId: 43, from: MARIA })));
    expect(first).toMatchObject({ id: 1, bot: 'support', threadId: 500 });
    expect(second).toMatchObject({ id: 2, bot: 'shop', threadId: 500 });

    await expect(support.forwardStaffReply(staffMessage(500))).resolves.toBe('delivered');
    await expect(shop.forwardStaffReply(staffMessage(500, { chatId: SHOP_GROUP_ID }))).resolves.toBe('delivered');

    expect(supportTransport.copyMessage).toHaveBeenCalledTimes(1);
    expect(supportTransport.copyMessage).toHaveBeenCalledWith(USER_ID, { chatId: GROUP_ID, messageId: 300 });
    expect(shopTransport.copyMessage).toHaveBeenCalledTimes(1);
    expect(shopTransport.copyMessage).toHaveBeenCalledWith(43, { chatId: SHOP_GROUP_ID, messageId: 300 });
  });

  it('should keep one active ticket per bot for the same conversation', async () => {
    await support.createTicket(request(textMessage('Вопрос')));
    const second = await shop.createTicket(request(textMessage('Вопрос')));
    expect(second).toMatchObject({ id: 2, bot: 'shop', conversationId: USER_ID, threadId: 500 });

    await expect(shop.forwardUserMessage(textMessage('Ещё'))).resolves.toBe('forwarded');
    expect(shopTransport.forwardMessage).toHaveBeenCalledWith(
      SHOP_GROUP_ID,
      { chatId: USER_ID, messageId: 10 },
      { threadId: 500 },
    );
    expect(supportTransport.forwardMessage).not.toHaveBeenCalled();
  });

  it('should close and reopen only tickets of its own bot', async () => {
    await support.createTicket(request(textMessage('Вопрос')));

    const closeInShop = staffMessage(500, { chatId: SHOP_GROUP_ID, text: '/close', command: 'close' });
    await expect(shop.closeFromThread(closeInShop)).resolves.toBe('not_found');
    expect(store.getAllTickets()[0]).toMatchObject({ bot: 'support', status: 'open' });

    await support.closeFromThread(staffMessage(500, { text: '/close', command: 'close' }));

    await expect(shop.forwardUserMessage(textMessage('Не помогло'))).resolves.toBe('no_ticket');
    expect(shopTransport.sendText).toHaveBeenLastCalledWith(USER_ID, USER_COPY.startHint);
    expect(store.getAllTickets()[0].status).toBe('closed');

    await expect(support.forwardUserMessage(textMessage('Не помогло'))).resolves.toBe('reopened');
  });
});
