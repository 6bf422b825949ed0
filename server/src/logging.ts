export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

const validLogLevels: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return validLogLevels.some(level => level === value);
}

// Priority: command line arg (--log=debug) > LOG_LEVEL env > default
function resolveLogLevel(): LogLevel {
  const logArgMatch = process.argv.find(arg => arg.startsWith('--log='))?.match(/--log=(\w+)/);
  const raw = logArgMatch?.[1] ?? process.env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(raw)) {
    console.warn(`Invalid log level: ${raw}. Using 'info' instead.`);
    return 'info';
  }
  return raw;
}

const LOG_LEVEL: LogLevel = resolveLogLevel();

const order: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

type Level = Exclude<LogLevel, 'silent'>;
type LogMethod = (message: string, ...args: unknown[]) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** Logger whose lines carry `[context]` after the timestamp; nested scopes join with a space. */
  scoped(context: string): Logger;
}

const sinks: Record<Level, (...data: unknown[]) => void> = {
  debug: (...data) => console.debug(...data),
  info: (...data) => console.log(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data)
};

function createLogger(options: { context?: string; level?: LogLevel } = {}): Logger {
  const threshold = options.level ?? LOG_LEVEL;
  const prefix = options.context ? `[${options.context}] ` : '';
  const method = (level: Level): LogMethod => (message, ...args) => {
    if (order[level] < order[threshold]) return;
    sinks[level](`[${level.toUpperCase()}] ${new Date().toISOString()} - ${prefix}${message}`, ...args);
  };
  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    scoped: context => createLogger({
      context: options.context ? `${options.context} ${context}` : context,
      level: options.level
    })
  };
}

const logger = createLogger();

export { createLogger, logger, LOG_LEVEL };
