import type { Logger } from 'pino';
import { BotConfig } from '../config/types';
import { USER_COPY, missingTopicRightsNotice, userBlockedBotNotice } from '../copy';
import { StorageUnavailableError, TransportError } from '../errors';
import { handlerInvocations } from '../observability/metrics';
import { TraceContext } from '../observability/trace';
import { shortUserInfo } from '../routing/ticket-formatting';
import { ChatTransport, ChatUser, InboundEvent, fullName } from '../transport/types';

export interface DispatchContext {
  bot: BotConfig;
  transport: ChatTransport;
  event: InboundEvent;
  trace: TraceContext;
  log: Logger;
}

export type Handler = (ctx: DispatchContext) => Promise<void>;
export type Middleware = (handlerName: string, next: Handler) => Handler;

/** Chat, topic and sender an event belongs to */
export function eventOrigin(event: InboundEvent): { chatId: number; threadId?: number; from?: ChatUser } {
  if (event.kind === 'message') {
    const { chatId, threadId, from } = event.message;
    return { chatId, threadId, from };
  }
  const { message, from } = event.callback;
  return { chatId: message?.chatId ?? from.id, threadId: message?.threadId, from };
}

export const withLogging: Middleware = (handlerName, next) => async (ctx) => {
  const start = Date.now();
  ctx.log.debug({ handler: handlerName }, 'Handler started');
  await next(ctx);
  ctx.log.info({ handler: handlerName, durationMs: Date.now() - start }, 'Handler completed');
};

/**
 * Turns handler failures into staff notices or a generic user reply.
 * Transient intake state is left as it was so the user can retry.
 */
export const withErrorHandling: Middleware = (handlerName, next) => async (ctx) => {
  try {
    await next(ctx);
    handlerInvocations.inc({ handler: handlerName, outcome: 'ok' });
  } catch (err) {
    handlerInvocations.inc({ handler: handlerName, outcome: 'error' });
    await reportFailure(handlerName, ctx, err);
  }
};

async function reportFailure(handlerName: string, ctx: DispatchContext, err: unknown): Promise<void> {
  const { chatId, threadId, from } = eventOrigin(ctx.event);
  const groupId = ctx.bot.adminGroupId;

  try {
    if (err instanceof TransportError && err.kind === 'forbidden') {
      ctx.log.warn({ err, handler: handlerName, chatId }, 'User blocked the bot');
      await ctx.transport.sendText(groupId, userBlockedBotNotice(chatId, from ? fullName(from) : String(chatId)));
      return;
    }

    if (err instanceof TransportError && err.isTopicRightsMissing) {
      ctx.log.error({ err, handler: handlerName }, 'Bot lacks the right to manage topics');
      await ctx.transport.sendText(groupId, missingTopicRightsNotice(from ? shortUserInfo(from) : String(chatId)), {
        html: true,
      });
      return;
    }

    const level = err instanceof StorageUnavailableError ? 'storage unavailable' : 'unexpected error';
    ctx.log.error({ err, handler: handlerName, chatId, threadId }, `Handler failed: ${level}`);

    if (ctx.event.kind === 'callback') {
      await ctx.transport.answerCallback(ctx.event.callback.id, USER_COPY.temporaryError);
    } else {
      await ctx.transport.sendText(chatId, USER_COPY.temporaryError, { threadId });
    }
  } catch (reportErr) {
    ctx.log.error({ err: reportErr, handler: handlerName }, 'Failed to report handler error');
  }
}

/** The first middleware in the list is the outermost */
export function applyMiddleware(handlerName: string, handler: Handler, middleware: readonly Middleware[]): Handler {
  return middleware.reduceRight<Handler>((next, wrap) => wrap(handlerName, next), handler);
}
