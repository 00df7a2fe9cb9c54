// Pino-based JSON logger with a minimal typed wrapper.
// - Writes to stderr (stdout is reserved for the run summary) or to NARRATOR_LOG_FILE.
// - Pretty printing in development only.
// - Supports child loggers with jobKey/runId bindings.

import pino from 'pino';

export interface LogFields {
  jobKey?: string;
  runId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export interface CreateLoggerOptions {
  level?: string;
  /** File to append JSON lines to. */
  file?: string;
  pretty?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const file = options.file ?? process.env.NARRATOR_LOG_FILE;
  const pretty = options.pretty ?? (process.env.NODE_ENV === 'development' && !file);

  const base = pretty
    ? pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            destination: 2,
          },
        },
      })
    : pino({ level }, pino.destination({ dest: file ?? 2, mkdir: Boolean(file), sync: false }));

  return wrap(base);
}

function wrap(instance: pino.Logger): Logger {
  return {
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error(
          {
            ...(fields ?? {}),
            err: {
              message: msg.message,
              stack: msg.stack,
              name: msg.name,
            },
          },
          msg.message,
        );
      } else {
        instance.error(fields ?? {}, msg);
      }
    },
    debug(msg, fields) {
      instance.debug(fields ?? {}, msg);
    },
    child(bindings) {
      return wrap(instance.child(bindings));
    },
  };
}

let rootLogger: Logger | null = null;

/** Process-wide logger, created on first use so LOG_LEVEL from `.env` is honoured. */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

export function setLogger(next: Logger): void {
  rootLogger = next;
}
