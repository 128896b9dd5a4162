import pino from 'pino';
import { env } from '../config/env';
import { TraceContext } from './trace';

/** Bot credentials and shared contacts, wherever they end up in a log object */
export const REDACT_PATHS = [
  'token',
  'webhookSecret',
  '*.token',
  '*.webhookSecret',
  'headers["x-telegram-bot-api-secret-token"]',
  '*.headers["x-telegram-bot-api-secret-token"]',
  'contact.phoneNumber',
  '*.contact.phoneNumber',
];

export const loggerOptions: pino.LoggerOptions = {
  level: env.logLevel,
  base: { service: 'support-relay' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: { paths: REDACT_PATHS, censor: '[redacted]' },
};

export const logger = pino({
  ...loggerOptions,
  ...(env.nodeEnv === 'development' ? { transport: { target: 'pino/file', options: { destination: 1 } } } : {}),
});

/** Logger for one webhook update */
export function traceLogger(trace: TraceContext): pino.Logger {
  return logger.child({
    requestId: trace.requestId,
    bot: trace.bot,
    conversationId: trace.conversationId,
    updateId: trace.updateId,
  });
}

/** Keep only the last four digits of a phone number for log output */
export function redactPhone(phone: string): string {
  return `****${phone.slice(-4)}`;
}
