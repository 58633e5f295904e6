import { LoggerOptions } from 'pino';

export const SERVICE_NAME = 'media-tool-service';

/**
 * Pino options shared by the main thread and the worker threads, so both emit
 * the same JSON shape (`level` as a label, `service`/`env` base fields).
 */
export function buildPinoOptions(
  level: string,
  nodeEnv: string | undefined,
  bindings: Record<string, unknown> = {},
): LoggerOptions {
  return {
    level,
    ...(nodeEnv === 'development' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: SERVICE_NAME,
      env: nodeEnv,
      ...bindings,
    },
  };
}
