import pc from 'picocolors';

type LogLevel = 'info' | 'warn' | 'error' | 'step' | 'success';

export type LogEvent = {
  level: LogLevel;
  message: string;
  details?: Record<string, unknown> | undefined;
  timestamp: string;
};

export type ConsoleLogger = {
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
  step: (message: string, details?: Record<string, unknown>) => void;
  success: (message: string, details?: Record<string, unknown>) => void;
  events: () => LogEvent[];
  flush: (final?: Record<string, unknown>) => void;
};

type ConsoleLoggerOptions = {
  /** Collect everything and print a single JSON document on flush. */
  json?: boolean;
  write?: (line: string) => void;
};

function formatMessage(level: LogLevel, message: string): string {
  const icon =
    level === 'info'
      ? pc.blue('i')
      : level === 'warn'
        ? pc.yellow('!')
        : level === 'error'
          ? pc.red('x')
          : level === 'success'
            ? pc.green('✓')
            : pc.dim('•');
  return `${icon} ${message}`;
}

function formatDetails(details: Record<string, unknown>): string {
  return Object.entries(details)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ');
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ConsoleLogger {
  const { json = false } = options;
  const write = options.write ?? ((line: string) => console.log(line));
  const events: LogEvent[] = [];

  const push = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    events.push({ level, message, details, timestamp: new Date().toISOString() });
    if (json) return;
    if (details && Object.keys(details).length > 0) {
      write(`${formatMessage(level, message)} ${pc.dim(formatDetails(details))}`);
    } else {
      write(formatMessage(level, message));
    }
  };

  return {
    info: (message, details) => push('info', message, details),
    warn: (message, details) => push('warn', message, details),
    error: (message, details) => push('error', message, details),
    step: (message, details) => push('step', message, details),
    success: (message, details) => push('success', message, details),
    events: () => events,
    flush: (final) => {
      if (json) {
        write(JSON.stringify({ events, result: final ?? null }, null, 2));
      }
    },
  };
}
