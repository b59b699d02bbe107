/**
 * Logger interface for RetryKit
 *
 * The runtime only depends on the `Logger` shape, so a pino logger or the
 * functional logger below can be handed to the retry engine unchanged.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type Logger = {
  error(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
  trace(obj: unknown, msg?: string): void;
};

/**
 * Logger produced by `createLogger`, aware of its own level
 */
export type LeveledLogger = Logger & {
  readonly level: LogLevel;
  child(prefix: string): LeveledLogger;
};

export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Check if a message at `messageLevel` passes a logger set to `currentLevel`
 */
export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  json?: boolean;
  output?: (line: string) => void;
};

// stderr, so stdout stays free for command results
const defaultOutput = (line: string): void => {
  console.error(line);
};

function formatLine(
  level: LogLevel,
  obj: unknown,
  msg: string | undefined,
  prefix: string,
  json: boolean
): string {
  const time = new Date().toISOString();
  const text = msg ?? (typeof obj === 'string' ? obj : undefined);
  const data = typeof obj === 'string' && msg === undefined ? undefined : obj;

  if (json) {
    return JSON.stringify({
      time,
      level,
      ...(prefix ? { prefix } : {}),
      ...(text !== undefined ? { msg: text } : {}),
      ...(data !== undefined ? { data } : {})
    });
  }

  const prefixStr = prefix ? ` ${prefix}` : '';
  const textStr = text !== undefined ? ` ${text}` : '';
  const dataStr = data !== undefined ? ` ${JSON.stringify(data)}` : '';
  return `[${time}] [${level.toUpperCase()}]${prefixStr}${textStr}${dataStr}`;
}

/**
 * Create a functional logger
 */
export function createLogger(options: LoggerOptions = {}): LeveledLogger {
  const level = options.level ?? 'info';
  const prefix = options.prefix ?? '';
  const json = options.json ?? false;
  const output = options.output ?? defaultOutput;

  const log = (messageLevel: LogLevel, obj: unknown, msg?: string): void => {
    if (!shouldLog(level, messageLevel)) {
      return;
    }
    output(formatLine(messageLevel, obj, msg, prefix, json));
  };

  return {
    level,
    error: (obj, msg) => log('error', obj, msg),
    warn: (obj, msg) => log('warn', obj, msg),
    info: (obj, msg) => log('info', obj, msg),
    debug: (obj, msg) => log('debug', obj, msg),
    trace: (obj, msg) => log('trace', obj, msg),
    child: (childPrefix) =>
      createLogger({
        ...options,
        prefix: `${prefix}[${childPrefix}]`
      })
  };
}

export function createSilentLogger(): LeveledLogger {
  return createLogger({ level: 'silent' });
}
