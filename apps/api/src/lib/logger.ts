import { pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
}

/**
 * Root application logger. Fastify takes it as its logger instance so request
 * logs and worker logs share one stream. Credentials never reach the output.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino({
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: ['password', '*.password', 'credentials.password', 'req.headers.authorization'],
      censor: '[REDACTED]',
    },
  });
}
