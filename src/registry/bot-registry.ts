import { BotConfig } from '../config/types';
import { Dispatcher } from '../dispatch/dispatcher';
import { ChatTransport } from '../transport/types';

/** One configured bot with its own transport and handler graph */
export interface BotRuntime {
  config: BotConfig;
  transport: ChatTransport;
  dispatcher: Dispatcher;
}

/**
 * Bots served by this process, keyed by name. The name is the path segment
 * of the bot's webhook URL.
 */
export class BotRegistry {
  private readonly bots = new Map<string, BotRuntime>();

  register(runtime: BotRuntime): void {
    if (this.bots.has(runtime.config.name)) {
      throw new Error(`Bot "${runtime.config.name}" is already registered`);
    }
    this.bots.set(runtime.config.name, runtime);
  }

  get(name: string): BotRuntime | undefined {
    return this.bots.get(name);
  }

  list(): BotRuntime[] {
    return [...this.bots.values()];
  }

  get size(): number {
    return this.bots.size;
  }
}
