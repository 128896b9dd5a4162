import { BotConfig } from '../config/types';
import { groupHello } from '../copy';
import { IntakeFlow } from '../conversation/intake-flow';
import { MenuHandler } from '../menu/menu-handler';
import { MENU_CALLBACK_PREFIX } from '../menu/menu-callback';
import { logger, traceLogger } from '../observability/logger';
import { TraceContext } from '../observability/trace';
import { TicketRouter } from '../routing/ticket-router';
import { ClosureSurvey } from '../survey/closure-survey';
import { TICKET_ACTION_PREFIX } from '../survey/callback-data';
import { CallbackEvent, ChatMessage, ChatTransport, InboundEvent } from '../transport/types';
import { KeyedSerialQueue } from './keyed-queue';
import { DispatchContext, Handler, Middleware, applyMiddleware, withErrorHandling, withLogging } from './middleware';

export interface DispatcherDeps {
  bot: BotConfig;
  transport: ChatTransport;
  intake: IntakeFlow;
  router: TicketRouter;
  survey: ClosureSurvey;
  menu: MenuHandler;
  middleware?: readonly Middleware[];
}

interface Route<T> {
  name: string;
  when: (input: T) => boolean;
  run: (input: T) => Promise<unknown>;
}

/** Events of one conversation share a key and therefore run in order */
export function conversationKey(event: InboundEvent): string {
  if (event.kind === 'callback') {
    return `chat:${event.callback.message?.chatId ?? event.callback.from.id}`;
  }
  const { chatId, threadId } = event.message;
  return threadId === undefined ? `chat:${chatId}` : `chat:${chatId}:thread:${threadId}`;
}

/**
 * Routes parsed updates to handlers through a fixed table, first match wins.
 * Each handler runs wrapped by the middleware chain.
 */
export class Dispatcher {
  private readonly queue = new KeyedSerialQueue();
  private readonly middleware: readonly Middleware[];
  private readonly messageRoutes: Route<ChatMessage>[];
  private readonly callbackRoutes: Route<CallbackEvent>[];

  constructor(private readonly deps: DispatcherDeps) {
    this.middleware = deps.middleware ?? [withErrorHandling, withLogging];
    const adminGroupId = deps.bot.adminGroupId;
    const isPrivate = (m: ChatMessage): boolean => m.chatType === 'private';
    const isAdminGroup = (m: ChatMessage): boolean => m.chatId === adminGroupId;

    this.messageRoutes = [
      { name: 'start', when: (m) => isPrivate(m) && m.command === 'start', run: (m) => deps.intake.start(m) },
      { name: 'contact', when: (m) => isPrivate(m) && m.contact !== undefined, run: (m) => deps.intake.handleContact(m) },
      { name: 'private_command', when: (m) => isPrivate(m) && m.command !== undefined, run: (m) => this.ignore(m) },
      { name: 'private_message', when: isPrivate, run: (m) => deps.intake.handleMessage(m) },
      {
        name: 'group_membership',
        when: (m) => !isPrivate(m) && (m.groupChatCreated || m.newChatMembers.length > 0),
        run: (m) => this.greetGroup(m),
      },
      { name: 'close', when: (m) => isAdminGroup(m) && m.command === 'close', run: (m) => deps.router.closeFromThread(m) },
      {
        name: 'staff_reply',
        when: (m) =>
          isAdminGroup(m) && m.command === undefined && m.threadId !== undefined && m.replyTo !== undefined && !m.from?.isBot,
        run: (m) => deps.router.forwardStaffReply(m),
      },
    ];

    this.callbackRoutes = [
      {
        name: 'closure_survey',
        when: (c) => c.data.startsWith(TICKET_ACTION_PREFIX),
        run: (c) => deps.survey.handleCallback(c),
      },
      {
        name: 'faq_menu',
        when: (c) => c.data.startsWith(MENU_CALLBACK_PREFIX),
        run: (c) => deps.menu.handleCallback(c, deps.intake),
      },
      { name: 'unknown_callback', when: () => true, run: (c) => deps.transport.answerCallback(c.id) },
    ];
  }

  /** Resolves once the event has been handled; handler errors are reported by the middleware */
  dispatch(event: InboundEvent, trace: TraceContext): Promise<void> {
    return this.queue.run(conversationKey(event), () => this.handle(event, trace));
  }

  /** Wait for every queued event to finish */
  drain(): Promise<void> {
    return this.queue.onIdle();
  }

  private async handle(event: InboundEvent, trace: TraceContext): Promise<void> {
    const log = traceLogger({ ...trace, bot: this.deps.bot.name });
    const route = this.select(event);
    if (!route) {
      log.debug({ kind: event.kind }, 'No handler for update');
      return;
    }

    const ctx: DispatchContext = { bot: this.deps.bot, transport: this.deps.transport, event, trace, log };
    await applyMiddleware(route.name, route.handler, this.middleware)(ctx);
  }

  private select(event: InboundEvent): { name: string; handler: Handler } | null {
    if (event.kind === 'message') {
      return this.bind(this.messageRoutes, event.message);
    }
    return this.bind(this.callbackRoutes, event.callback);
  }

  private bind<T>(routes: readonly Route<T>[], input: T): { name: string; handler: Handler } | null {
    const route = routes.find((r) => r.when(input));
    if (!route) return null;
    return {
      name: route.name,
      handler: async () => {
        await route.run(input);
      },
    };
  }

  private async ignore(message: ChatMessage): Promise<void> {
    logger.debug({ bot: this.deps.bot.name, command: message.command }, 'Ignoring unsupported private command');
  }

  /** Tell admins the group id when the bot is added to a group */
  private async greetGroup(message: ChatMessage): Promise<void> {
    const identity = await this.deps.transport.getIdentity();
    const botAdded = message.groupChatCreated || message.newChatMembers.some((member) => member.id === identity.id);
    if (!botAdded) return;
    await this.deps.transport.sendText(message.chatId, groupHello(message.chatId, message.isForum), { html: true });
  }
}
