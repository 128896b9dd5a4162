import crypto from 'crypto';
import { env } from '../config/env';
import { logger } from '../observability/logger';

/**
 * Check the X-Telegram-Bot-Api-Secret-Token header against the bot's
 * configured secret. If no secret is configured, verification is skipped
 * in development and requests are rejected in production.
 */
export function verifySecretToken(expected: string, provided: string | undefined): boolean {
  if (!expected) {
    if (env.isDev) {
      logger.debug('No webhook secret configured; skipping verification (dev mode)');
      return true;
    }
    logger.error('No webhook secret configured in production; rejecting request');
    return false;
  }

  if (!provided) {
    logger.warn('Missing webhook secret token header');
    return false;
  }

  const expectedBuf = Buffer.from(expected);
  const providedBuf = Buffer.from(provided);
  const isValid = expectedBuf.length === providedBuf.length && crypto.timingSafeEqual(providedBuf, expectedBuf);

  if (!isValid) {
    logger.warn('Webhook secret token mismatch');
  }

  return isValid;
}
