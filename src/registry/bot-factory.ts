import Redis from 'ioredis';
import { env } from '../config/env';
import { BotConfig, StaffedHours } from '../config/types';
import { IntakeFlow } from '../conversation/intake-flow';
import { IntakeStateStore, createIntakeStateStore } from '../conversation/state-store';
import { UserDirectory } from '../directory/user-directory';
import { Dispatcher } from '../dispatch/dispatcher';
import { MenuHandler } from '../menu/menu-handler';
import { MenuTree } from '../menu/menu-tree';
import { TicketStore } from '../persistence/types';
import { TicketRouter } from '../routing/ticket-router';
import { ClosureSurvey } from '../survey/closure-survey';
import { ChatTransport } from '../transport/types';
import { BotRuntime } from './bot-registry';

/** Services every bot in the process shares */
export interface SharedServices {
  directory: UserDirectory;
  /** Scoped per bot with `forBot` */
  tickets: TicketStore;
  menuTree: MenuTree;
  redis?: Redis;
  clock?: () => Date;
  /** Overrides the Redis / in-memory intake state store */
  states?: IntakeStateStore;
}

export function staffedHoursFromEnv(): StaffedHours {
  return {
    timeZone: env.support.timeZone,
    startHour: env.support.staffedHoursStart,
    endHour: env.support.staffedHoursEnd,
  };
}

export function createBotRuntime(config: BotConfig, transport: ChatTransport, shared: SharedServices): BotRuntime {
  const tickets = shared.tickets.forBot(config.name);

  const router = new TicketRouter({
    bot: config,
    transport,
    tickets,
    directory: shared.directory,
    staffedHours: staffedHoursFromEnv(),
    clock: shared.clock,
  });

  const menu = new MenuHandler({
    transport,
    tree: shared.menuTree,
    filesDir: env.telegram.filesDir,
    helloMessage: config.helloMessage || undefined,
  });

  const intake = new IntakeFlow({
    bot: config,
    transport,
    directory: shared.directory,
    states: shared.states ?? createIntakeStateStore(config.name, env.intake.stateTtlSeconds, shared.redis),
    router,
    menu,
    timeZone: env.support.timeZone,
    recentOrdersLimit: env.intake.recentOrdersLimit,
  });

  const survey = new ClosureSurvey({ bot: config, transport, tickets, router });
  const dispatcher = new Dispatcher({ bot: config, transport, intake, router, survey, menu });

  return { config, transport, dispatcher };
}
