/**
 * Structured logging: one JSON line per record with timestamp, level, message,
 * the webhook's own placement (downward API) when available, and bound context fields.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Pod/namespace/node of the webhook itself when running in Kubernetes. */
  placement?: { pod?: string; namespace?: string; node?: string };
  [key: string]: unknown;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
  /** Returns a logger that adds `fields` to every record. */
  child(fields: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Records below this level are dropped. Default: info */
  level?: LogLevel;
  /** Where records go. Default: stdout, or stderr for errors. */
  sink?: LogSink;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isoTimestamp(): string {
  return new Date().toISOString();
}

function getPlacement(): LogRecord['placement'] {
  const pod = process.env.POD_NAME;
  const namespace = process.env.NAMESPACE;
  const node = process.env.NODE_NAME;
  if (pod ?? namespace ?? node) {
    return { pod, namespace, node };
  }
  return undefined;
}

function write(record: LogRecord): void {
  const line = JSON.stringify(record) + '\n';
  const out = record.level === 'error' ? process.stderr : process.stdout;
  out.write(line);
}

export function createLogger(fields: Record<string, unknown> = {}, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const sink = options.sink ?? write;

  function emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    const placement = getPlacement();
    sink({
      ...fields,
      ...extra,
      timestamp: isoTimestamp(),
      level,
      message,
      ...(placement && { placement }),
    });
  }

  return {
    debug: (message, extra) => emit('debug', message, extra),
    info: (message, extra) => emit('info', message, extra),
    warn: (message, extra) => emit('warn', message, extra),
    error: (message, extra) => emit('error', message, extra),
    child: (more) => createLogger({ ...fields, ...more }, options),
  };
}

/** Process-wide logger at info level; the entrypoint builds its own from config. */
export const rootLogger: Logger = createLogger();
