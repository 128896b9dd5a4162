import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

export const updatesReceived = new Counter({
  name: 'telegram_updates_received_total',
  help: 'Telegram updates accepted by the webhook',
  labelNames: ['bot', 'kind'] as const,
  registers: [registry],
});

export const handlerInvocations = new Counter({
  name: 'handler_invocations_total',
  help: 'Dispatched handler runs by outcome',
  labelNames: ['handler', 'outcome'] as const,
  registers: [registry],
});

export const ticketsTotal = new Counter({
  name: 'tickets_total',
  help: 'Ticket lifecycle events',
  labelNames: ['event'] as const,
  registers: [registry],
});

export const stateTransitions = new Counter({
  name: 'state_transitions_total',
  help: 'Intake and closure-survey state transitions',
  labelNames: ['machine', 'from', 'to'] as const,
  registers: [registry],
});

export const messagesForwarded = new Counter({
  name: 'messages_forwarded_total',
  help: 'Messages relayed between users and staff threads',
  labelNames: ['direction', 'outcome'] as const,
  registers: [registry],
});

export const storageRetries = new Counter({
  name: 'storage_retries_total',
  help: 'Storage operations retried after a transient failure',
  labelNames: ['operation'] as const,
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
