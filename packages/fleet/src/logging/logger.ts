/**
 * Container Fleet - Console Logger
 *
 * Timestamped, source-tagged console lines:
 *   10:42:07 AM [fleet] Ship speed: 30 knots, ...
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogWriter = (level: LogLevel, line: string) => void;

export interface FleetLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  quiet?: boolean;
  write?: LogWriter;
  now?: () => Date;
}

export function formatLogTime(date: Date): string {
  return date.toLocaleTimeString('en-US', {
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  });
}

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
    default:
      console.log(line);
  }
};

export function createLogger(source: string, options: LoggerOptions = {}): FleetLogger {
  const write = options.write ?? consoleWriter;
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string) => {
    if (options.quiet && level === 'info') return;
    write(level, `${formatLogTime(now())} [${source}] ${message}`);
  };

  return {
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}
