import { Params } from 'nestjs-pino';
import { getCorrelationId } from '../services/correlation-context.js';

/** Adds the active correlation id, if any, to a log line. */
export function correlationMixin(): Record<string, unknown> {
  const correlationId = getCorrelationId();
  return correlationId ? { correlationId } : {};
}

export function buildLoggerConfig(env: NodeJS.ProcessEnv = process.env): Params {
  const production = env.NODE_ENV === 'production';

  return {
    pinoHttp: {
      level: env.LOG_LEVEL ?? (production ? 'info' : 'debug'),

      // Scan cycles are not HTTP-triggered, so customProps never fires here.
      // The mixin stamps the cycle's correlation id onto every line instead.
      mixin: correlationMixin,

      // Pretty-print for development
      transport: !production
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              singleLine: false,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,

      base: null, // Removes pid, hostname, etc.
    },
  };
}

export const loggerConfig: Params = buildLoggerConfig();
