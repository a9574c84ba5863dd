export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);

let override: LogLevel | undefined;

// Read on every call so a LOG_LEVEL loaded by dotenv after import still applies.
const currentLevel = (): LogLevel => {
  if (override) {
    return override;
  }
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(envLevel) ? envLevel : 'info';
};

const formatMessage = (level: LogLevel, message: string, meta?: unknown): string => {
  const timestamp = new Date().toISOString();
  const base = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  if (meta === undefined) {
    return base;
  }
  const metaString = typeof meta === 'string' ? meta : JSON.stringify(meta);
  return `${base} ${metaString}`;
};

const enabled = (level: LogLevel): boolean => LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel()];

export const setLogLevel = (level: LogLevel | undefined): void => {
  override = level;
};

export const logger = {
  debug: (message: string, meta?: unknown) => {
    if (enabled('debug')) {
      console.debug(formatMessage('debug', message, meta));
    }
  },
  info: (message: string, meta?: unknown) => {
    if (enabled('info')) {
      console.log(formatMessage('info', message, meta));
    }
  },
  warn: (message: string, meta?: unknown) => {
    if (enabled('warn')) {
      console.warn(formatMessage('warn', message, meta));
    }
  },
  error: (message: string, meta?: unknown) => {
    if (enabled('error')) {
      console.error(formatMessage('error', message, meta));
    }
  }
};

export type Logger = typeof logger;
