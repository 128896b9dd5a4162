import Fastify, { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env, loadBotConfigs } from './config/env';
import { BotConfig } from './config/types';
import { UserDirectory } from './directory/user-directory';
import { MenuTree, loadMenuTree } from './menu/menu-tree';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createAccountRepository } from './persistence/account-repository';
import { Database, createPgPool } from './persistence/database';
import { createTicketStore } from './persistence/ticket-repository';
import { AccountRepository, TicketStore } from './persistence/types';
import { createBotRuntime } from './registry/bot-factory';
import { BotRegistry } from './registry/bot-registry';
import { createDedupStore } from './security/dedup-store';
import { registerHealthRoutes } from './health/health-routes';
import { TelegramTransport } from './transport/telegram-adapter';
import { registerTelegramWebhook } from './transport/telegram-webhook';
import { ChatTransport } from './transport/types';

export interface AppContext {
  app: FastifyInstance;
  registry: BotRegistry;
  database?: Database;
  redis?: Redis;
}

/** Overrides for tests and embedding; anything omitted is built from env */
export interface BuildAppOptions {
  bots?: BotConfig[];
  transportFactory?: (bot: BotConfig) => ChatTransport;
  /** null disables Redis even when REDIS_URL is set */
  redis?: Redis | null;
  /** null disables Postgres even when DATABASE_URL is set */
  database?: Database | null;
  accounts?: AccountRepository;
  tickets?: TicketStore;
  menuTree?: MenuTree;
  clock?: () => Date;
}

export function createDatabase(): Database | undefined {
  if (!env.database.url) {
    logger.warn('DATABASE_URL not set; using in-memory repositories');
    return undefined;
  }
  const pool = createPgPool({
    connectionString: env.database.url,
    poolSize: env.database.poolSize,
    maxOverflow: env.database.maxOverflow,
    recycleSeconds: env.database.recycleSeconds,
  });
  return new Database(pool, {
    prePing: env.database.prePing,
    retry: { attempts: env.database.retryAttempts, baseDelayMs: env.database.retryBaseDelayMs },
  });
}

const REDIS_MAX_RECONNECTS = 5;

/** Intake state and update dedup; both stay in process memory when Redis is down */
async function connectRedis(url: string): Promise<Redis | undefined> {
  const redis = new Redis(url, {
    connectionName: 'support-relay',
    lazyConnect: true,
    maxRetriesPerRequest: 2,
    retryStrategy: (attempt) => (attempt > REDIS_MAX_RECONNECTS ? null : Math.min(attempt * 250, 2000)),
  });
  // before connect(): a refused connection emits 'error'
  redis.on('error', (err) => {
    logger.debug({ err }, 'Redis connection error');
  });

  try {
    await redis.connect();
  } catch (err) {
    logger.warn({ err }, 'Redis unavailable; intake state and update dedup kept in memory');
    redis.disconnect();
    return undefined;
  }
  logger.info({ keyPrefix: env.redis.keyPrefix }, 'Redis connected');
  return redis;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  // Request timing
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  // ───── Storage ─────
  let redis = options.redis ?? undefined;
  if (options.redis === undefined && env.redis.url) redis = await connectRedis(env.redis.url);
  const database = options.database === undefined ? createDatabase() : options.database ?? undefined;

  const directory = new UserDirectory(options.accounts ?? createAccountRepository(database));
  const tickets = options.tickets ?? createTicketStore(database);
  const menuTree = options.menuTree ?? loadMenuTree(env.telegram.menuPath);

  // ───── Bots ─────
  const registry = new BotRegistry();
  const bots = options.bots ?? loadBotConfigs(env.telegram.botsEnabled);
  const transportFactory =
    options.transportFactory ?? ((bot: BotConfig) => new TelegramTransport(bot.token, env.telegram.apiBaseUrl, bot.name));

  for (const bot of bots) {
    registry.register(
      createBotRuntime(bot, transportFactory(bot), { directory, tickets, menuTree, redis, clock: options.clock }),
    );
  }
  if (registry.size === 0) {
    logger.warn('No bots enabled; set BOTS_ENABLED');
  }
  logger.info({ bots: registry.list().map((b) => b.config.name) }, 'Bots initialized');

  // ───── Routes ─────
  registerTelegramWebhook(app, registry, createDedupStore(redis));
  registerHealthRoutes(app, { database, redis });

  return { app, registry, database, redis };
}
