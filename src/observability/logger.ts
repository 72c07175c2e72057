import pino from 'pino';
import { env } from '../config/env';

/** Root logger. Components derive `logger.child({ component })`. */
export const logger = pino({
  level: env.logLevel,
  base: { service: 'handoff-core', env: env.nodeEnv },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  ...(env.nodeEnv === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});
