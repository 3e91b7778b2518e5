// Levelled stderr logger shared by the yangtree packages

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const satisfies Record<LogLevel, number>;

export type LogMetadata = Record<string, unknown>;

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
  readonly level: LogLevel;
}

/** Anything with a `write`, e.g. process.stderr or a test buffer */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Tag in front of every line (default: 'yangtree') */
  prefix?: string;
  /** Minimum level written (default: 'warn') */
  level?: LogLevel;
  /** Destination (default: process.stderr) */
  stream?: LogSink;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function formatMetadata(metadata: LogMetadata | undefined): string {
  if (metadata === undefined) return '';
  const defined = Object.entries(metadata).filter(([, v]) => v !== undefined);
  if (defined.length === 0) return '';
  return ` ${JSON.stringify(Object.fromEntries(defined))}`;
}

/**
 * Lines look like `[yangtree] warn: message {"key":"value"}`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.prefix ?? 'yangtree';
  const level = options.level ?? 'warn';
  const stream = options.stream ?? process.stderr;

  const log = (
    at: Exclude<LogLevel, 'silent'>,
    message: string,
    metadata?: LogMetadata
  ): void => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
    stream.write(`[${prefix}] ${at}: ${message}${formatMetadata(metadata)}\n`);
  };

  return {
    level,
    debug: (message, metadata) => log('debug', message, metadata),
    info: (message, metadata) => log('info', message, metadata),
    warn: (message, metadata) => log('warn', message, metadata),
    error: (message, metadata) => log('error', message, metadata),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger({ level: 'silent' });
