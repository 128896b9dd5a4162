import { buildApp, createDatabase } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';
import { runMigrations } from './persistence/migrate';
import { BotRegistry } from './registry/bot-registry';

async function migrate(): Promise<void> {
  const database = createDatabase();
  if (!database) throw new Error('DATABASE_URL is required to run migrations');
  try {
    await runMigrations(database);
  } finally {
    await database.close();
  }
}

async function registerWebhooks(registry: BotRegistry): Promise<void> {
  if (!env.publicUrl) {
    logger.info('PUBLIC_URL not set; skipping webhook registration');
    return;
  }
  for (const { config, transport } of registry.list()) {
    if (!transport.registerWebhook) continue;
    const url = `${env.publicUrl.replace(/\/$/, '')}/webhooks/telegram/${encodeURIComponent(config.name)}`;
    try {
      await transport.registerWebhook(url, config.webhookSecret);
    } catch (err) {
      logger.error({ err, bot: config.name }, 'Failed to register webhook');
    }
  }
}

async function main(): Promise<void> {
  if (process.argv[2] === 'migrate') {
    await migrate();
    return;
  }

  const { app, registry, database, redis } = await buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    await Promise.all(registry.list().map((bot) => bot.dispatcher.drain()));
    if (database) await database.close();
    if (redis) redis.disconnect();
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal('SIGTERM'));
  process.on('SIGINT', onSignal('SIGINT'));

  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    logger.info({ port: env.port, env: env.nodeEnv, bots: registry.size }, 'Support relay started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }

  await registerWebhooks(registry);
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
