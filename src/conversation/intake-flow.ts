import type { Logger } from 'pino';
import { BotConfig, UNSPECIFIED_ORDER } from '../config/types';
import {
  CATEGORY_LABELS,
  NO_TEXT_DESCRIPTION,
  ORDER_CATEGORIES,
  OTHER_CATEGORY,
  USER_COPY,
  chooseOrderPrompt,
  guestCategoryPrompt,
} from '../copy';
import { UserDirectory } from '../directory/user-directory';
import { InvalidFormatError } from '../errors';
import { MenuHandler, SubjectSink } from '../menu/menu-handler';
import { logger } from '../observability/logger';
import { Account } from '../persistence/types';
import { TicketRouter } from '../routing/ticket-router';
import { ChatMessage, ChatTransport, messageBody } from '../transport/types';
import { REMOVE_KEYBOARD, categoriesKeyboard, ordersKeyboard, sharePhoneKeyboard } from './keyboards';
import { buildOrderChoices, parseOrderNumberFromLabel } from './order-labels';
import { StateMachine } from './state-machine';
import { IntakeStateStore } from './state-store';
import { INTAKE_TRANSITIONS, IntakePhase, IntakeState } from './types';

export const intakeMachine = new StateMachine<IntakePhase>('intake', INTAKE_TRANSITIONS);

export interface IntakeFlowDeps {
  bot: BotConfig;
  transport: ChatTransport;
  directory: UserDirectory;
  states: IntakeStateStore;
  router: TicketRouter;
  menu: MenuHandler;
  timeZone: string;
  recentOrdersLimit: number;
}

/**
 * Guided ticket intake in a private chat:
 * identity → category → order → description → ticket.
 * Outside intake, messages go straight to the ticket router.
 */
export class IntakeFlow implements SubjectSink {
  private readonly log: Logger;

  constructor(private readonly deps: IntakeFlowDeps) {
    this.log = logger.child({ component: 'intake', bot: deps.bot.name });
  }

  private async currentPhase(conversationId: number): Promise<{ phase: IntakePhase; state: IntakeState | null }> {
    const state = await this.deps.states.get(conversationId);
    return { phase: state?.step ?? 'idle', state };
  }

  /** Validate the move and persist the new scratch state; refused moves leave state untouched */
  private async enter(conversationId: number, from: IntakePhase, next: IntakeState, reason: string): Promise<boolean> {
    const { newState } = intakeMachine.transition(conversationId, from, next.step, reason);
    if (newState !== next.step) return false;
    await this.deps.states.set(conversationId, next);
    return true;
  }

  private async finish(conversationId: number, from: IntakePhase, reason: string): Promise<void> {
    intakeMachine.transition(conversationId, from, 'idle', reason);
    await this.deps.states.clear(conversationId);
  }

  private async send(chatId: number, text: string, keyboard = REMOVE_KEYBOARD): Promise<void> {
    await this.deps.transport.sendText(chatId, text, { keyboard });
  }

  // ───── Entry points ─────

  async start(message: ChatMessage): Promise<void> {
    const chatId = message.chatId;
    const { phase } = await this.currentPhase(chatId);
    const account = await this.deps.directory.findByConversationId(chatId);

    if (account?.phone) {
      if (await this.enter(chatId, phase, { step: 'category_selection' }, 'start_known_account')) {
        await this.send(chatId, USER_COPY.greeting, categoriesKeyboard());
      }
      return;
    }

    if (await this.enter(chatId, phase, { step: 'awaiting_identity' }, 'start_unknown_identity')) {
      await this.send(chatId, USER_COPY.askPhone, sharePhoneKeyboard());
    }
  }

  async handleContact(message: ChatMessage): Promise<void> {
    const chatId = message.chatId;
    const contact = message.contact;
    if (!contact) return;

    if (!message.from || contact.userId !== message.from.id) {
      await this.deps.states.clear(chatId);
      await this.send(chatId, USER_COPY.foreignContact);
      return;
    }

    let account: Account | null;
    try {
      account = await this.deps.directory.findByPhone(contact.phoneNumber);
    } catch (err) {
      if (!(err instanceof InvalidFormatError)) throw err;
      this.log.info({ conversationId: chatId }, 'Rejected contact with malformed phone');
      await this.deps.states.clear(chatId);
      await this.send(chatId, USER_COPY.invalidPhone);
      return;
    }

    if (account) await this.deps.directory.linkConversationId(account, chatId);

    const { phase } = await this.currentPhase(chatId);
    if (await this.enter(chatId, phase, { step: 'category_selection' }, account ? 'contact_linked' : 'contact_guest')) {
      await this.send(chatId, USER_COPY.greeting, categoriesKeyboard());
    }
  }

  async handleMessage(message: ChatMessage): Promise<void> {
    const chatId = message.chatId;
    const state = await this.deps.states.get(chatId);

    if (!state) {
      await this.deps.router.forwardUserMessage(message);
      return;
    }

    const text = message.text?.trim() ?? '';
    switch (state.step) {
      case 'awaiting_identity':
        await this.send(chatId, USER_COPY.askPhone, sharePhoneKeyboard());
        return;
      case 'category_selection':
        await this.onCategory(chatId, text);
        return;
      case 'order_selection':
        await this.onOrder(chatId, state, text);
        return;
      case 'description_entry':
        await this.onDescription(message, state);
        return;
    }
  }

  /** Start intake directly at the description step with a preset category */
  async beginSubject(conversationId: number, subject: string, prompt: string): Promise<void> {
    const { phase } = await this.currentPhase(conversationId);
    const next: IntakeState = { step: 'description_entry', category: subject, orderNumber: UNSPECIFIED_ORDER };
    if (await this.enter(conversationId, phase, next, 'menu_subject')) {
      await this.send(conversationId, prompt);
    }
  }

  // ───── Steps ─────

  private async onCategory(chatId: number, text: string): Promise<void> {
    const orderCategory: string | undefined = ORDER_CATEGORIES[text];

    if (orderCategory !== undefined) {
      const account = await this.deps.directory.findByConversationId(chatId);
      if (!account) {
        const next: IntakeState = { step: 'description_entry', category: orderCategory, orderNumber: UNSPECIFIED_ORDER };
        if (await this.enter(chatId, 'category_selection', next, 'guest_order_category')) {
          await this.send(chatId, guestCategoryPrompt(orderCategory));
        }
        return;
      }

      const orders = await this.deps.directory.recentOrders(account.id, this.deps.recentOrdersLimit);
      const { labels, ordersMap } = buildOrderChoices(orders, this.deps.timeZone);
      const next: IntakeState = { step: 'order_selection', category: orderCategory, ordersMap };
      if (await this.enter(chatId, 'category_selection', next, 'order_category')) {
        await this.send(chatId, chooseOrderPrompt(orderCategory, labels.length > 0), ordersKeyboard(labels));
      }
      return;
    }

    switch (text) {
      case CATEGORY_LABELS.other: {
        const next: IntakeState = { step: 'description_entry', category: OTHER_CATEGORY, orderNumber: UNSPECIFIED_ORDER };
        if (await this.enter(chatId, 'category_selection', next, 'other_category')) {
          await this.send(chatId, USER_COPY.describeProblem);
        }
        return;
      }
      case CATEGORY_LABELS.faq:
        await this.deps.menu.showRoot(chatId);
        return;
      case CATEGORY_LABELS.back:
        await this.send(chatId, USER_COPY.chooseCategory, categoriesKeyboard());
        return;
      default:
        await this.send(chatId, USER_COPY.unknownCommand, categoriesKeyboard());
    }
  }

  private async onOrder(chatId: number, state: IntakeState, text: string): Promise<void> {
    const category = state.category ?? OTHER_CATEGORY;
    const ordersMap = state.ordersMap ?? {};

    if (text === CATEGORY_LABELS.back) {
      if (await this.enter(chatId, 'order_selection', { step: 'category_selection' }, 'back_to_categories')) {
        await this.send(chatId, USER_COPY.chooseCategory, categoriesKeyboard());
      }
      return;
    }

    let orderNumber: string | null = null;
    if (text === CATEGORY_LABELS.other) {
      orderNumber = UNSPECIFIED_ORDER;
    } else if (Object.hasOwn(ordersMap, text)) {
      orderNumber = ordersMap[text];
    } else if (text.includes('Последний заказ') || text.includes('Заказ №')) {
      orderNumber = parseOrderNumberFromLabel(text);
      if (orderNumber === null) {
        await this.send(chatId, USER_COPY.orderNotRecognized, ordersKeyboard(Object.keys(ordersMap)));
        return;
      }
    }

    if (orderNumber === null) {
      await this.send(chatId, USER_COPY.unknownCommand, ordersKeyboard(Object.keys(ordersMap)));
      return;
    }

    const next: IntakeState = { step: 'description_entry', category, orderNumber };
    if (await this.enter(chatId, 'order_selection', next, 'order_chosen')) {
      await this.send(chatId, USER_COPY.describeProblem);
    }
  }

  private async onDescription(message: ChatMessage, state: IntakeState): Promise<void> {
    const chatId = message.chatId;

    if (await this.deps.router.findActiveTicket(chatId)) {
      await this.finish(chatId, 'description_entry', 'ticket_already_open');
      await this.deps.router.forwardUserMessage(message);
      return;
    }

    const account = await this.deps.directory.findByConversationId(chatId);
    const orderNumber = state.orderNumber && state.orderNumber !== UNSPECIFIED_ORDER ? state.orderNumber : null;
    const ticket = await this.deps.router.createTicket({
      message,
      account,
      category: state.category ?? OTHER_CATEGORY,
      orderNumber,
      description: messageBody(message) ?? NO_TEXT_DESCRIPTION,
    });

    // without a ticket the state stays so the description can be resent
    if (ticket) await this.finish(chatId, 'description_entry', 'ticket_created');
  }
}
