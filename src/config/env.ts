import dotenv from 'dotenv';
import path from 'path';
import { BotConfig } from './types';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function required(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function requiredInt(key: string): number {
  const raw = required(key);
  const val = Number(raw);
  if (!Number.isInteger(val)) throw new Error(`Env var ${key} must be an integer, got "${raw}"`);
  return val;
}

/**
 * Read the per-bot settings for every name listed in BOTS_ENABLED.
 * Each bot is configured through `<NAME>_TOKEN`, `<NAME>_ADMIN_GROUP_ID`,
 * `<NAME>_WEBHOOK_SECRET` and optionally `<NAME>_HELLO_MSG`.
 */
export function loadBotConfigs(list: string): BotConfig[] {
  return list
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
    .map((name) => {
      const prefix = name.toUpperCase();
      return {
        name,
        token: required(`${prefix}_TOKEN`),
        adminGroupId: requiredInt(`${prefix}_ADMIN_GROUP_ID`),
        webhookSecret: optional(`${prefix}_WEBHOOK_SECRET`, ''),
        helloMessage: optional(`${prefix}_HELLO_MSG`, ''),
      };
    });
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  publicUrl: optional('PUBLIC_URL', ''),

  // ───── Storage ─────
  database: {
    url: optional('DATABASE_URL', ''),
    poolSize: optionalInt('DB_POOL_SIZE', 5),
    maxOverflow: optionalInt('DB_POOL_MAX_OVERFLOW', 10),
    recycleSeconds: optionalInt('DB_POOL_RECYCLE_SECONDS', 3600),
    prePing: optionalBool('DB_PRE_PING', true),
    retryAttempts: optionalInt('DB_RETRY_ATTEMPTS', 3),
    retryBaseDelayMs: optionalInt('DB_RETRY_BASE_DELAY_MS', 200),
  },

  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'relay:'),
  },

  // ───── Intake ─────
  intake: {
    stateTtlSeconds: optionalInt('INTAKE_STATE_TTL_SECONDS', 86_400),
    recentOrdersLimit: optionalInt('RECENT_ORDERS_LIMIT', 3),
  },

  support: {
    timeZone: optional('SUPPORT_TIMEZONE', 'Asia/Yakutsk'),
    staffedHoursStart: optionalInt('STAFFED_HOURS_START', 8),
    staffedHoursEnd: optionalInt('STAFFED_HOURS_END', 23),
  },

  // ───── Telegram ─────
  telegram: {
    apiBaseUrl: optional('TELEGRAM_API_BASE_URL', 'https://api.telegram.org'),
    botsEnabled: optional('BOTS_ENABLED', ''),
    menuPath: optional('MENU_CONFIG_PATH', path.join(projectRoot, 'config', 'menu.json')),
    filesDir: optional('MENU_FILES_DIR', path.join(projectRoot, 'config', 'files')),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
} as const;
