import type { Logger } from 'pino';
import { BotConfig } from '../config/types';
import {
  CALLBACK_ANSWERS,
  confirmedClosedNotice,
  keptOpenMessage,
  ratingNotice,
  ratingThanks,
  reopenedBySurveyNotice,
  resolvedRatingPrompt,
} from '../copy';
import { StateMachine } from '../conversation/state-machine';
import { ratingKeyboard } from '../conversation/keyboards';
import { logger } from '../observability/logger';
import { ticketsTotal } from '../observability/metrics';
import { Ticket, TicketRepository } from '../persistence/types';
import { TicketRouter } from '../routing/ticket-router';
import { CallbackEvent, ChatTransport, MessageRef } from '../transport/types';
import { TicketAction, parseTicketAction } from './callback-data';
import { SURVEY_TRANSITIONS, SurveyPhase, surveyPhaseOf } from './survey-phase';

export const surveyMachine = new StateMachine<SurveyPhase>('survey', SURVEY_TRANSITIONS);

export interface ClosureSurveyDeps {
  bot: BotConfig;
  transport: ChatTransport;
  tickets: TicketRepository;
  router: TicketRouter;
}

export type SurveyOutcome = 'confirmed' | 'kept_open' | 'rated' | 'duplicate' | 'rejected' | 'invalid' | 'not_found';

/**
 * Handles the post-closure buttons. Every step is guarded at the row level,
 * so repeated presses only acknowledge the callback.
 */
export class ClosureSurvey {
  private readonly log: Logger;

  constructor(private readonly deps: ClosureSurveyDeps) {
    this.log = logger.child({ component: 'closure-survey', bot: deps.bot.name });
  }

  async handleCallback(callback: CallbackEvent): Promise<SurveyOutcome> {
    const action = parseTicketAction(callback.data);
    if (!action) {
      await this.answer(callback, CALLBACK_ANSWERS.badFormat);
      return 'invalid';
    }

    const ticket = await this.deps.tickets.findById(action.ticketId);
    if (!ticket || (callback.message && callback.message.chatId !== ticket.conversationId)) {
      await this.answer(callback, CALLBACK_ANSWERS.ticketNotFound);
      return 'not_found';
    }

    const prompt: MessageRef | null = callback.message
      ? { chatId: callback.message.chatId, messageId: callback.message.messageId }
      : null;

    switch (action.action) {
      case 'closure_yes':
        return this.confirm(callback, ticket, prompt);
      case 'closure_no':
        return this.keepOpen(callback, ticket, prompt);
      case 'rate':
        return this.rate(callback, ticket, prompt, action);
    }
  }

  private async answer(callback: CallbackEvent, text: string): Promise<void> {
    await this.deps.transport.answerCallback(callback.id, text);
  }

  private async editPrompt(prompt: MessageRef | null, text: string, ratingFor?: number): Promise<void> {
    if (!prompt) return;
    if (ratingFor === undefined) {
      await this.deps.transport.editText(prompt, text);
    } else {
      await this.deps.transport.editText(prompt, text, { keyboard: ratingKeyboard(ratingFor) });
    }
  }

  private async confirm(callback: CallbackEvent, ticket: Ticket, prompt: MessageRef | null): Promise<SurveyOutcome> {
    const phase = surveyPhaseOf(ticket);
    if (!surveyMachine.canTransition(phase, 'rating_entry') || !(await this.deps.tickets.confirmResolved(ticket.id))) {
      await this.answer(callback, CALLBACK_ANSWERS.alreadyAnswered);
      return 'duplicate';
    }
    surveyMachine.transition(ticket.id, phase, 'rating_entry', 'user_confirmed');
    ticketsTotal.inc({ event: 'confirmed' });

    if (ticket.threadId !== null) {
      try {
        await this.deps.transport.closeDiscussionThread(this.deps.bot.adminGroupId, ticket.threadId);
      } catch (err) {
        this.log.warn({ err, ticketId: ticket.id, threadId: ticket.threadId }, 'Failed to close discussion thread');
      }
    }
    await this.deps.router.notifyStaff(confirmedClosedNotice(ticket.id), ticket.threadId ?? undefined);
    await this.editPrompt(prompt, resolvedRatingPrompt(ticket.id), ticket.id);
    await this.answer(callback, CALLBACK_ANSWERS.closed);
    return 'confirmed';
  }

  private async keepOpen(callback: CallbackEvent, ticket: Ticket, prompt: MessageRef | null): Promise<SurveyOutcome> {
    const phase = surveyPhaseOf(ticket);
    if (phase === 'free_messaging' || !surveyMachine.canTransition(phase, 'free_messaging')) {
      await this.answer(callback, CALLBACK_ANSWERS.alreadyAnswered);
      return 'duplicate';
    }

    const other = await this.deps.tickets.findLastOpenByConversation(ticket.conversationId);
    if (other && other.id !== ticket.id) {
      await this.answer(callback, CALLBACK_ANSWERS.anotherTicketOpen);
      return 'rejected';
    }

    if (!(await this.deps.tickets.updateStatus(ticket.id, 'reopened', { from: ['closed'] }))) {
      await this.answer(callback, CALLBACK_ANSWERS.alreadyAnswered);
      return 'duplicate';
    }
    surveyMachine.transition(ticket.id, phase, 'free_messaging', 'user_not_resolved');
    ticketsTotal.inc({ event: 'reopened' });

    if (ticket.threadId !== null) {
      try {
        await this.deps.transport.reopenDiscussionThread(this.deps.bot.adminGroupId, ticket.threadId);
      } catch (err) {
        this.log.warn({ err, ticketId: ticket.id, threadId: ticket.threadId }, 'Failed to reopen discussion thread');
      }
    }
    await this.editPrompt(prompt, keptOpenMessage(ticket.id, this.deps.router.isStaffedNow()));
    await this.deps.router.notifyStaff(reopenedBySurveyNotice(ticket.id), ticket.threadId ?? undefined);
    await this.answer(callback, CALLBACK_ANSWERS.keptOpen);
    return 'kept_open';
  }

  private async rate(
    callback: CallbackEvent,
    ticket: Ticket,
    prompt: MessageRef | null,
    action: Extract<TicketAction, { action: 'rate' }>,
  ): Promise<SurveyOutcome> {
    const phase = surveyPhaseOf(ticket);
    if (phase !== 'finalized' && !surveyMachine.canTransition(phase, 'finalized')) {
      await this.answer(callback, CALLBACK_ANSWERS.alreadyAnswered);
      return 'rejected';
    }
    if (!(await this.deps.tickets.updateRating(ticket.id, action.rating))) {
      await this.answer(callback, CALLBACK_ANSWERS.ratingAlreadySaved);
      return 'duplicate';
    }
    surveyMachine.transition(ticket.id, phase, 'finalized', 'user_rated');
    ticketsTotal.inc({ event: 'rated' });
    this.log.info({ ticketId: ticket.id, rating: action.rating }, 'Ticket rated');

    await this.editPrompt(prompt, ratingThanks(ticket.id));
    await this.deps.router.notifyStaff(ratingNotice(ticket.id, action.rating), ticket.threadId ?? undefined);
    await this.answer(callback, CALLBACK_ANSWERS.rated);
    return 'rated';
  }
}
