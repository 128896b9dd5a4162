import path from 'path';
import { CATEGORY_LABELS, USER_COPY, chooseOrderPrompt, guestCategoryPrompt } from '../../src/copy';
import { IntakeFlow } from '../../src/conversation/intake-flow';
import { REMOVE_KEYBOARD, categoriesKeyboard, ordersKeyboard, sharePhoneKeyboard } from '../../src/conversation/keyboards';
import { InMemoryIntakeStateStore } from '../../src/conversation/state-store';
import { UserDirectory } from '../../src/directory/user-directory';
import { TransportError } from '../../src/errors';
import { MenuHandler } from '../../src/menu/menu-handler';
import { loadMenuTree } from '../../src/menu/menu-tree';
import { InMemoryAccountRepository } from '../../src/persistence/account-repository';
import { InMemoryTicketRepository } from '../../src/persistence/ticket-repository';
import { TicketRouter } from '../../src/routing/ticket-router';
import { BOT, MockTransport, USER_ID, createMockTransport, privateMessage, textMessage } from '../helpers/fixtures';

const STAFFED = new Date('2025-03-10T03:00:00Z');
const LAST_ORDER_LABEL = 'Последний заказ от 05.03.2025 23:30';
const OLDER_ORDER_LABEL = 'Заказ №5001 от 01.03.2025 10:00';

describe('IntakeFlow', () => {
  let transport: MockTransport;
  let accounts: InMemoryAccountRepository;
  let tickets: InMemoryTicketRepository;
  let states: InMemoryIntakeStateStore;
  let flow: IntakeFlow;

  beforeEach(() => {
    transport = createMockTransport();
    accounts = new InMemoryAccountRepository();
    tickets = new InMemoryTicketRepository();
    states = new InMemoryIntakeStateStore(3600);
    const directory = new UserDirectory(accounts);
    const router = new TicketRouter({
      bot: BOT,
      transport,
      tickets,
      directory,
      staffedHours: { timeZone: 'Asia/Yakutsk', startHour: 8, endHour: 23 },
      clock: () => STAFFED,
    });
    const menu = new MenuHandler({
      transport,
      tree: loadMenuTree(path.join(__dirname, '..', '..', 'config', 'menu.json')),
      filesDir: '/srv/menu-files',
    });
    flow = new IntakeFlow({
      bot: BOT,
      transport,
      directory,
      states,
      router,
      menu,
      timeZone: 'Asia/Yakutsk',
      recentOrdersLimit: 3,
    });
  });

  function seedAccountWithOrders(conversationId: number | null = USER_ID): void {
    accounts.addAccount({ id: 1, name: 'Анна', phone: '79991234567', conversationId });
    accounts.addOrder({ id: 1, accountId: 1, orderNumber: '5001', storeId: null, createdAt: new Date('2025-03-01T01:00:00Z') });
    accounts.addOrder({ id: 2, accountId: 1, orderNumber: '5002', storeId: null, createdAt: new Date('2025-03-05T14:30:00Z') });
  }

  describe('start', () => {
    it('should ask unknown users for their phone', async () => {
      await flow.start(textMessage('/start'));

      expect(await states.get(USER_ID)).toEqual({ step: 'awaiting_identity' });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.askPhone, { keyboard: sharePhoneKeyboard() });
    });

    it('should go straight to categories for linked accounts', async () => {
      seedAccountWithOrders();

      await flow.start(textMessage('/start'));

      expect(await states.get(USER_ID)).toEqual({ step: 'category_selection' });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.greeting, { keyboard: categoriesKeyboard() });
    });

    it('should restart an intake in progress', async () => {
      await states.set(USER_ID, { step: 'description_entry', category: 'Другое', orderNumber: 'не указан' });

      await flow.start(textMessage('/start'));

      expect(await states.get(USER_ID)).toEqual({ step: 'awaiting_identity' });
    });
  });

  describe('handleContact', () => {
    const contact = (phoneNumber: string, userId = USER_ID) => privateMessage({ contact: { phoneNumber, userId } });

    beforeEach(async () => {
      await states.set(USER_ID, { step: 'awaiting_identity' });
    });

    it('should link the matching account', async () => {
      seedAccountWithOrders(null);

      await flow.handleContact(contact('+79991234567'));

      expect(accounts.getAccount(1)?.conversationId).toBe(USER_ID);
      expect(await states.get(USER_ID)).toEqual({ step: 'category_selection' });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.greeting, { keyboard: categoriesKeyboard() });
    });

    it('should continue as a guest when no account matches', async () => {
      await flow.handleContact(contact('+79990000000'));

      expect(await states.get(USER_ID)).toEqual({ step: 'category_selection' });
    });

    it("should refuse someone else's contact", async () => {
      await flow.handleContact(contact('+79991234567', 43));

      expect(await states.get(USER_ID)).toBeNull();
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.foreignContact, { keyboard: REMOVE_KEYBOARD });
    });

    it('should refuse a malformed phone number', async () => {
      await flow.handleContact(contact('8 (999) 123-45-67'));

      expect(await states.get(USER_ID)).toBeNull();
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.invalidPhone, { keyboard: REMOVE_KEYBOARD });
    });
  });

  describe('category selection', () => {
    beforeEach(async () => {
      await states.set(USER_ID, { step: 'category_selection' });
    });

    it('should ask guests to describe order problems directly', async () => {
      await flow.handleMessage(textMessage(CATEGORY_LABELS.orderProblem));

      expect(await states.get(USER_ID)).toEqual({
        step: 'description_entry',
        category: 'проблемы с заказом',
        orderNumber: 'не указан',
      });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, guestCategoryPrompt('проблемы с заказом'), {
        keyboard: REMOVE_KEYBOARD,
      });
    });

    it('should offer recent orders to linked accounts', async () => {
      seedAccountWithOrders();

      await flow.handleMessage(textMessage(CATEGORY_LABELS.deliveryProblem));

      expect(await states.get(USER_ID)).toEqual({
        step: 'order_selection',
        category: 'задержки доставки',
        ordersMap: { [LAST_ORDER_LABEL]: '5002', [OLDER_ORDER_LABEL]: '5001' },
      });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, chooseOrderPrompt('задержки доставки', true), {
        keyboard: ordersKeyboard([LAST_ORDER_LABEL, OLDER_ORDER_LABEL]),
      });
    });

    it('should note when a linked account has no orders', async () => {
      accounts.addAccount({ id: 1, name: 'Анна', phone: '79991234567', conversationId: USER_ID });

      await flow.handleMessage(textMessage(CATEGORY_LABELS.orderProblem));

      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, chooseOrderPrompt('проблемы с заказом', false), {
        keyboard: ordersKeyboard([]),
      });
    });

    it('should skip the order step for "Другое"', async () => {
      await flow.handleMessage(textMessage(CATEGORY_LABELS.other));

      expect(await states.get(USER_ID)).toEqual({ step: 'description_entry', category: 'Другое', orderNumber: 'не указан' });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.describeProblem, { keyboard: REMOVE_KEYBOARD });
    });

    it('should open the FAQ menu', async () => {
      await flow.handleMessage(textMessage(CATEGORY_LABELS.faq));

      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, 'Часто задаваемые вопросы:', { disablePreview: true });
      expect(await states.get(USER_ID)).toEqual({ step: 'category_selection' });
    });

    it('should repeat the categories on unknown input', async () => {
      await flow.handleMessage(textMessage('что-то'));

      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.unknownCommand, { keyboard: categoriesKeyboard() });
    });
  });

  describe('order selection', () => {
    const ordersMap = { [LAST_ORDER_LABEL]: '5002', [OLDER_ORDER_LABEL]: '5001' };

    beforeEach(async () => {
      await states.set(USER_ID, { step: 'order_selection', category: 'проблемы с заказом', ordersMap });
    });

    it('should take the order behind a button label', async () => {
      await flow.handleMessage(textMessage(LAST_ORDER_LABEL));

      expect(await states.get(USER_ID)).toEqual({
        step: 'description_entry',
        category: 'проблемы с заказом',
        orderNumber: '5002',
      });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.describeProblem, { keyboard: REMOVE_KEYBOARD });
    });

    it('should parse a typed order label', async () => {
      await flow.handleMessage(textMessage('Заказ №7777'));

      expect((await states.get(USER_ID))?.orderNumber).toBe('7777');
    });

    it('should ask again when the typed label has no number', async () => {
      await flow.handleMessage(textMessage('Заказ №'));

      expect(await states.get(USER_ID)).toMatchObject({ step: 'order_selection' });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.orderNotRecognized, {
        keyboard: ordersKeyboard([LAST_ORDER_LABEL, OLDER_ORDER_LABEL]),
      });
    });

    it('should continue without an order for "Другое"', async () => {
      await flow.handleMessage(textMessage(CATEGORY_LABELS.other));

      expect((await states.get(USER_ID))?.orderNumber).toBe('не указан');
    });

    it('should go back to the categories', async () => {
      await flow.handleMessage(textMessage(CATEGORY_LABELS.back));

      expect(await states.get(USER_ID)).toEqual({ step: 'category_selection' });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.chooseCategory, { keyboard: categoriesKeyboard() });
    });

    it('should reject anything else', async () => {
      await flow.handleMessage(textMessage('привет'));

      expect(await states.get(USER_ID)).toMatchObject({ step: 'order_selection' });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.unknownCommand, {
        keyboard: ordersKeyboard([LAST_ORDER_LABEL, OLDER_ORDER_LABEL]),
      });
    });
  });

  describe('description entry', () => {
    it('should create the ticket and end intake', async () => {
      seedAccountWithOrders();
      await states.set(USER_ID, { step: 'description_entry', category: 'проблемы с заказом', orderNumber: '5002' });

      await flow.handleMessage(textMessage('Товар пришёл разбитым'));

      expect(await states.get(USER_ID)).toBeNull();
      expect(await tickets.findLastOpenByConversation(USER_ID)).toMatchObject({
        accountId: 1,
        category: 'проблемы с заказом',
        orderNumber: '5002',
        description: 'Товар пришёл разбитым',
        threadId: 500,
        subject: '5002: Анна',
      });
    });

    it('should store no order number when none was chosen', async () => {
      await states.set(USER_ID, { step: 'description_entry', category: 'Другое', orderNumber: 'не указан' });

      await flow.handleMessage(privateMessage({ caption: 'Фото чека' }));

      expect(await tickets.findLastOpenByConversation(USER_ID)).toMatchObject({
        orderNumber: null,
        description: 'Фото чека',
      });
    });

    it('should keep the state when the ticket could not be created', async () => {
      transport.createDiscussionThread.mockRejectedValueOnce(new TransportError('unknown', 'createForumTopic', 'timeout'));
      await states.set(USER_ID, { step: 'description_entry', category: 'Другое', orderNumber: 'не указан' });

      await flow.handleMessage(textMessage('Описание'));

      expect(await states.get(USER_ID)).toEqual({ step: 'description_entry', category: 'Другое', orderNumber: 'не указан' });
      expect(transport.sendText).toHaveBeenLastCalledWith(USER_ID, USER_COPY.ticketCreateFailed);
    });

    it('should forward to the existing ticket instead of opening a second one', async () => {
      const existing = await tickets.create({
        conversationId: USER_ID,
        accountId: null,
        category: 'Другое',
        orderNumber: null,
        description: 'Первое',
        branch: 'Неизвестно',
        storeId: null,
      });
      await tickets.assignThread(existing.id, 600, 'Тема');
      await states.set(USER_ID, { step: 'description_entry', category: 'Другое', orderNumber: 'не указан' });

      await flow.handleMessage(textMessage('Второе'));

      expect(await states.get(USER_ID)).toBeNull();
      expect(tickets.getAllTickets()).toHaveLength(1);
      expect(transport.forwardMessage).toHaveBeenCalledWith(expect.any(Number), { chatId: USER_ID, messageId: 10 }, { threadId: 600 });
    });
  });

  describe('outside intake', () => {
    it('should hand messages to the ticket router', async () => {
      await flow.handleMessage(textMessage('Есть кто?'));

      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.startHint);
    });

    it('should repeat the phone request while awaiting identity', async () => {
      await states.set(USER_ID, { step: 'awaiting_identity' });

      await flow.handleMessage(textMessage('мой номер 8999'));

      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, USER_COPY.askPhone, { keyboard: sharePhoneKeyboard() });
    });

    it('should start a preset subject from the menu', async () => {
      await flow.beginSubject(USER_ID, 'возврат товара', 'Опишите товар');

      expect(await states.get(USER_ID)).toEqual({
        step: 'description_entry',
        category: 'возврат товара',
        orderNumber: 'не указан',
      });
      expect(transport.sendText).toHaveBeenCalledWith(USER_ID, 'Опишите товар', { keyboard: REMOVE_KEYBOARD });
    });
  });
});
