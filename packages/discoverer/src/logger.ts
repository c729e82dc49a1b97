import { pino, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level: string;
  /** Pretty-print with pino-pretty instead of JSON lines */
  pretty: boolean;
}

/**
 * Build the process-wide logger. Components take a child of it
 * (`logger.child({ component })`); the status server reuses it as
 * Fastify's logger instance.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino(
    options.pretty
      ? {
          level: options.level,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {
          level: options.level,
        },
  );
}
