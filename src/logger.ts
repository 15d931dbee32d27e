import winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

export type Logger = Pick<winston.Logger, 'error' | 'warn' | 'info' | 'debug'>;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env['VECTOR_STORE_LOG_LEVEL']?.toLowerCase();
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : 'info';
}

const lineFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}${extra}`;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? defaultLevel(),
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      lineFormat,
    ),
    transports: [new winston.transports.Console()],
  });
}
