import type { Logger } from 'pino';
import { BotConfig, StaffedHours } from '../config/types';
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
} from '../copy';
import { REMOVE_KEYBOARD, closureKeyboard } from '../conversation/keyboards';
import { UserDirectory } from '../directory/user-directory';
import { RoutingError, TransportError } from '../errors';
import { logger } from '../observability/logger';
import { messagesForwarded, ticketsTotal } from '../observability/metrics';
import { Account, Ticket, TicketRepository } from '../persistence/types';
import { ChatMessage, ChatTransport } from '../transport/types';
import { isStaffedHour } from './support-hours';
import { buildSubject, buildTicketSummary, resolveBranch, resolveDisplayName, shortUserInfo } from './ticket-formatting';

export interface TicketRouterDeps {
  bot: BotConfig;
  transport: ChatTransport;
  tickets: TicketRepository;
  directory: UserDirectory;
  staffedHours: StaffedHours;
  clock?: () => Date;
}

export interface TicketRequest {
  /** The message that completed intake; its sender is the ticket owner */
  message: ChatMessage;
  account: Account | null;
  category: string;
  /** null when the user did not pick an order */
  orderNumber: string | null;
  description: string;
}

export type UserForwardOutcome = 'forwarded' | 'reopened' | 'no_ticket' | 'orphaned' | 'failed';
export type StaffReplyOutcome = 'delivered' | 'ignored' | 'no_ticket' | 'blocked';
export type CloseOutcome = 'closed' | 'already_closed' | 'not_found' | 'outside_thread';

/**
 * Binds a user conversation to a staff discussion thread for the ticket's
 * lifetime and relays messages in both directions.
 */
export class TicketRouter {
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: TicketRouterDeps) {
    this.log = logger.child({ component: 'ticket-router', bot: deps.bot.name });
    this.clock = deps.clock ?? (() => new Date());
  }

  private get groupId(): number {
    return this.deps.bot.adminGroupId;
  }

  isStaffedNow(): boolean {
    return isStaffedHour(this.clock(), this.deps.staffedHours);
  }

  async findActiveTicket(conversationId: number): Promise<Ticket | null> {
    return this.deps.tickets.findLastOpenByConversation(conversationId);
  }

  // ───── Ticket creation ─────

  /**
   * Create the ticket, open its thread, post the summary and acknowledge.
   * Returns null when the thread could not be created; the orphan row is
   * closed so a fresh intake can proceed.
   */
  async createTicket(request: TicketRequest): Promise<Ticket | null> {
    const { message, account } = request;
    const conversationId = message.chatId;
    const log = this.log.child({ conversationId });

    const displayName = resolveDisplayName(account, message.from);
    const { storeId, storeTitle } = await this.enrich(account, request.orderNumber, log);

    const ticket = await this.deps.tickets.create({
      conversationId,
      accountId: account?.id ?? null,
      category: request.category,
      orderNumber: request.orderNumber,
      description: request.description,
      branch: resolveBranch(account),
      storeId,
    });
    ticketsTotal.inc({ event: 'created' });
    log.info({ ticketId: ticket.id, category: ticket.category }, 'Ticket created');

    const subject = buildSubject({
      registered: account !== null,
      displayName,
      category: request.category,
      storeTitle,
      orderNumber: request.orderNumber,
    });

    let threadId: number;
    try {
      ({ threadId } = await this.deps.transport.createDiscussionThread(this.groupId, subject));
    } catch (err) {
      await this.abandonOrphan(ticket, message, err, log);
      return null;
    }

    if (!(await this.deps.tickets.assignThread(ticket.id, threadId, subject))) {
      return this.discardUnboundThread(ticket, threadId, message, log);
    }

    await this.deps.transport.sendText(
      this.groupId,
      buildTicketSummary({
        ticketId: ticket.id,
        displayName,
        category: request.category,
        orderNumber: request.orderNumber,
        storeTitle,
        description: request.description,
      }),
      { threadId, html: true },
    );

    await this.deps.transport.sendText(conversationId, ticketAcknowledgement(ticket.id, this.isStaffedNow()), {
      keyboard: REMOVE_KEYBOARD,
    });

    return { ...ticket, threadId, subject };
  }

  /**
   * The ticket refused the new thread: it is already bound elsewhere or gone.
   * The new thread is closed unused and the stored binding wins.
   */
  private async discardUnboundThread(
    ticket: Ticket,
    threadId: number,
    message: ChatMessage,
    log: Logger,
  ): Promise<Ticket | null> {
    const stored = await this.deps.tickets.findById(ticket.id);
    log.warn({ ticketId: ticket.id, threadId, boundThreadId: stored?.threadId ?? null }, 'Thread binding refused');
    try {
      await this.deps.transport.closeDiscussionThread(this.groupId, threadId);
    } catch (err) {
      log.warn({ err, threadId }, 'Failed to close unbound thread');
    }
    if (stored && stored.threadId !== null) return stored;

    await this.deps.tickets.updateStatus(ticket.id, 'closed', { from: ['open', 'reopened'] });
    ticketsTotal.inc({ event: 'orphaned' });
    await this.deps.transport.sendText(message.chatId, USER_COPY.ticketCreateFailed);
    return null;
  }

  /** order → store id → store title; best-effort */
  private async enrich(
    account: Account | null,
    orderNumber: string | null,
    log: Logger,
  ): Promise<{ storeId: string | null; storeTitle: string | null }> {
    if (!account || !orderNumber) return { storeId: null, storeTitle: null };
    try {
      const order = await this.deps.directory.findOrderByNumber(orderNumber);
      if (!order?.storeId) return { storeId: null, storeTitle: null };
      const storeTitle = await this.deps.directory.storeTitle(order.storeId);
      return { storeId: order.storeId, storeTitle };
    } catch (err) {
      log.warn({ err, orderNumber }, 'Ticket enrichment failed; continuing without store');
      return { storeId: null, storeTitle: null };
    }
  }

  private async abandonOrphan(ticket: Ticket, message: ChatMessage, err: unknown, log: Logger): Promise<void> {
    log.error({ err, ticketId: ticket.id }, 'Failed to create discussion thread');
    await this.deps.tickets.updateStatus(ticket.id, 'closed', { from: ['open', 'reopened'] });
    ticketsTotal.inc({ event: 'orphaned' });

    if (err instanceof TransportError && err.isTopicRightsMissing && message.from) {
      await this.notifyStaff(missingTopicRightsNotice(shortUserInfo(message.from)), undefined, true);
    }
    await this.deps.transport.sendText(message.chatId, USER_COPY.ticketCreateFailed);
  }

  // ───── User → staff ─────

  async forwardUserMessage(message: ChatMessage): Promise<UserForwardOutcome> {
    const conversationId = message.chatId;
    const log = this.log.child({ conversationId });

    let ticket = await this.deps.tickets.findLastOpenByConversation(conversationId);
    let reopened = false;

    if (!ticket) {
      const closed = await this.deps.tickets.findLastReopenableByConversation(conversationId);
      if (closed) {
        reopened = await this.deps.tickets.updateStatus(closed.id, 'reopened', { from: ['closed'] });
        if (reopened) {
          ticketsTotal.inc({ event: 'reopened' });
          log.info({ ticketId: closed.id }, 'Ticket reopened by user message');
          ticket = { ...closed, status: 'reopened', isClosed: false, closedAt: null };
        } else {
          ticket = await this.deps.tickets.findLastOpenByConversation(conversationId);
        }
      }
    }

    if (!ticket) {
      await this.deps.transport.sendText(conversationId, USER_COPY.startHint);
      return 'no_ticket';
    }

    if (ticket.threadId === null) {
      const routingErr = new RoutingError(ticket.id, 'Active ticket has no discussion thread');
      log.error({ err: routingErr, ticketId: ticket.id }, 'Closing ticket without thread');
      await this.deps.tickets.updateStatus(ticket.id, 'closed', { from: ['open', 'reopened'] });
      ticketsTotal.inc({ event: 'orphaned' });
      await this.deps.transport.sendText(conversationId, USER_COPY.ticketWithoutThread);
      return 'orphaned';
    }

    if (reopened) {
      await this.notifyStaff(reopenedByMessageNotice(ticket.id), ticket.threadId);
    }

    try {
      await this.deps.transport.forwardMessage(
        this.groupId,
        { chatId: conversationId, messageId: message.messageId },
        { threadId: ticket.threadId },
      );
    } catch (err) {
      messagesForwarded.inc({ direction: 'to_staff', outcome: 'failed' });
      log.error({ err, ticketId: ticket.id, threadId: ticket.threadId }, 'Failed to forward user message');
      await this.deps.transport.sendText(conversationId, forwardFailureCopy(err));
      return 'failed';
    }

    messagesForwarded.inc({ direction: 'to_staff', outcome: 'ok' });
    return reopened ? 'reopened' : 'forwarded';
  }

  // ───── Staff → user ─────

  async forwardStaffReply(message: ChatMessage): Promise<StaffReplyOutcome> {
    const threadId = message.threadId;
    if (threadId === undefined || !message.replyTo) return 'ignored';

    const ticket = await this.deps.tickets.findByThreadId(threadId);
    if (!ticket) {
      this.log.warn({ threadId }, 'Staff reply in a thread without a ticket');
      await this.deps.transport.sendText(this.groupId, STAFF_COPY.threadWithoutTicket, { threadId });
      return 'no_ticket';
    }

    try {
      await this.deps.transport.copyMessage(ticket.conversationId, {
        chatId: message.chatId,
        messageId: message.messageId,
      });
    } catch (err) {
      if (!(err instanceof TransportError) || err.kind !== 'forbidden') throw err;
      messagesForwarded.inc({ direction: 'to_user', outcome: 'blocked' });
      this.log.warn({ err, ticketId: ticket.id }, 'User cannot receive staff reply');
      const notice = err.isBotTarget
        ? botTargetNotice(ticket.conversationId)
        : userBlockedNotice(ticket.conversationId, (await this.deps.transport.getIdentity()).username);
      await this.deps.transport.sendText(this.groupId, notice, { threadId });
      return 'blocked';
    }

    messagesForwarded.inc({ direction: 'to_user', outcome: 'ok' });
    return 'delivered';
  }

  // ───── Closure ─────

  async closeFromThread(message: ChatMessage): Promise<CloseOutcome> {
    const threadId = message.threadId;
    if (threadId === undefined) {
      await this.deps.transport.sendText(message.chatId, STAFF_COPY.closeOutsideThread);
      return 'outside_thread';
    }

    const ticket = await this.deps.tickets.findByThreadId(threadId);
    if (!ticket) {
      await this.deps.transport.sendText(this.groupId, STAFF_COPY.ticketNotFoundForThread, { threadId });
      return 'not_found';
    }

    const closed =
      ticket.status !== 'closed' &&
      (await this.deps.tickets.updateStatus(ticket.id, 'closed', { from: ['open', 'reopened'] }));
    if (!closed) {
      await this.deps.transport.sendText(this.groupId, alreadyClosedNotice(ticket.id), { threadId });
      return 'already_closed';
    }

    ticketsTotal.inc({ event: 'closed' });
    this.log.info({ ticketId: ticket.id, threadId }, 'Ticket closed by staff');
    await this.deps.transport.sendText(this.groupId, closedNotice(ticket.id), { threadId });

    try {
      await this.deps.transport.sendText(ticket.conversationId, USER_COPY.closurePrompt, {
        keyboard: closureKeyboard(ticket.id),
      });
    } catch (err) {
      this.log.warn({ err, ticketId: ticket.id }, 'Failed to send closure survey');
      await this.deps.transport.sendText(this.groupId, surveyNotDelivered(ticket.conversationId), { threadId });
    }
    return 'closed';
  }

  /** Post into the staff group; a failed notice is logged and does not abort the caller */
  async notifyStaff(text: string, threadId?: number, html = false): Promise<void> {
    try {
      await this.deps.transport.sendText(this.groupId, text, { threadId, html });
    } catch (err) {
      this.log.warn({ err, threadId }, 'Failed to notify staff');
    }
  }
}

function forwardFailureCopy(err: unknown): string {
  if (err instanceof TransportError) {
    if (err.kind === 'bad_request') return USER_COPY.forwardBadRequest;
    if (err.kind === 'forbidden') return USER_COPY.forwardForbidden;
  }
  return USER_COPY.forwardFailed;
}
