import { FastifyInstance } from 'fastify';
import { eventOrigin } from '../dispatch/middleware';
import { traceLogger } from '../observability/logger';
import { updatesReceived } from '../observability/metrics';
import { createTraceContext } from '../observability/trace';
import { BotRegistry } from '../registry/bot-registry';
import { DedupStore } from '../security/dedup-store';
import { verifySecretToken } from '../security/webhook-verifier';
import { parseTelegramUpdate } from './telegram-update';

export const SECRET_TOKEN_HEADER = 'x-telegram-bot-api-secret-token';

export function registerTelegramWebhook(app: FastifyInstance, registry: BotRegistry, dedup: DedupStore): void {
  app.post<{ Params: { bot: string } }>('/webhooks/telegram/:bot', async (req, reply) => {
    const botName = req.params.bot;
    const trace = createTraceContext({ bot: botName });
    const log = traceLogger(trace);

    const runtime = registry.get(botName);
    if (!runtime) {
      log.warn('Webhook call for unknown bot');
      return reply.status(404).send({ error: 'Unknown bot' });
    }

    // 1. Secret token
    const header = req.headers[SECRET_TOKEN_HEADER];
    if (!verifySecretToken(runtime.config.webhookSecret, typeof header === 'string' ? header : undefined)) {
      return reply.status(401).send({ error: 'Invalid secret token' });
    }

    // 2. Parse update; unsupported kinds are acknowledged so they are not redelivered
    const parsed = parseTelegramUpdate(req.body);
    if (!parsed.ok) {
      log.debug({ reason: parsed.reason, updateId: parsed.updateId }, 'Ignoring update');
      return reply.status(200).send({ status: 'ignored' });
    }

    // 3. Redelivery
    if (!(await dedup.isNew(botName, parsed.updateId))) {
      log.info({ updateId: parsed.updateId }, 'Duplicate update; skipping');
      return reply.status(200).send({ status: 'duplicate', requestId: trace.requestId });
    }

    trace.updateId = parsed.updateId;
    trace.conversationId = eventOrigin(parsed.event).chatId;
    updatesReceived.inc({ bot: botName, kind: parsed.event.kind });

    // 4. Respond immediately and process asynchronously
    runtime.dispatcher.dispatch(parsed.event, trace).catch((err) => {
      log.error({ err, updateId: parsed.updateId }, 'Dispatch error');
    });

    return reply.status(200).send({ status: 'accepted', requestId: trace.requestId });
  });
}
