import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

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

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  redis: {
    // Empty URL → in-memory coordination store (single process only)
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'handoff:'),
    connectTimeoutMs: optionalInt('REDIS_CONNECT_TIMEOUT_MS', 5000),
  },

  // ───── Identity ─────
  identity: {
    defaultCountryCode: optional('DEFAULT_COUNTRY_CODE', '57'),
  },

  // ───── Conversation state / handoff ─────
  session: {
    defaultTtlSeconds: optionalInt('SESSION_DEFAULT_TTL_SECONDS', 7 * 24 * 60 * 60),
    humanActiveTtlHours: optionalInt('HUMAN_ACTIVE_TTL_HOURS', 72),
    clientTimeoutHours: optionalInt('CLIENT_TIMEOUT_HOURS', 24),
    advisorTimeoutHours: optionalInt('ADVISOR_TIMEOUT_HOURS', 72),
    legacyFallbackEnabled: optionalBool('SESSION_LEGACY_FALLBACK', true),
  },

  // ───── Message aggregation ─────
  aggregation: {
    enabled: optionalBool('MESSAGE_AGGREGATION_ENABLED', true),
    windowSeconds: optionalInt('MESSAGE_AGGREGATION_TIMEOUT', 30),
    separator: process.env.MESSAGE_AGGREGATION_SEPARATOR ?? ' ',
  },

  // ───── Appointments ─────
  appointments: {
    ttlDays: optionalInt('APPOINTMENT_TTL_DAYS', 30),
    reminderIntervalMinutes: optionalInt('REMINDER_INTERVAL_MINUTES', 60),
    schedulerEnabled: optionalBool('REMINDER_SCHEDULER_ENABLED', true),
  },

  // ───── Routing / business hours ─────
  routing: {
    configPath: optional('ROUTING_CONFIG_PATH', path.join('config', 'routing.yaml')),
    timezone: optional('BUSINESS_TIMEZONE', 'America/Bogota'),
  },
} as const;
