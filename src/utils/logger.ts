import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const { combine, timestamp, printf, json } = winston.format;

const textFormat = combine(
  timestamp(),
  printf(({ level, message, timestamp, scope, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level.toUpperCase()}] [${String(scope)}] ${String(message)}${metaStr}`;
  }),
);

const jsonFormat = combine(timestamp(), json());

// Everything goes to stderr: stdout carries the MCP stdio transport.
const root = winston.createLogger({
  level: 'info',
  format: textFormat,
  transports: [
    new winston.transports.Console({
      stderrLevels: ['debug', 'info', 'warn', 'error'],
    }),
  ],
});

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, err?: unknown): void;
}

export function setLogLevel(level: LogLevel): void {
  root.level = level;
}

export function setJsonLogging(enabled: boolean): void {
  root.format = enabled ? jsonFormat : textFormat;
}

export function createLogger(scope: string): Logger {
  const child = root.child({ scope });
  const emit = (level: 'debug' | 'info' | 'warn', message: string, meta?: Record<string, unknown>) => {
    if (meta) child.log(level, message, meta);
    else child.log(level, message);
  };
  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, err) => {
      if (err instanceof Error) {
        child.error(message, { error: err.message, stack: err.stack });
      } else if (err !== undefined) {
        child.error(message, { error: String(err) });
      } else {
        child.error(message);
      }
    },
  };
}
