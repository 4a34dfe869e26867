/**
 * Leveled diagnostics for the CLI. stdout belongs to the report, so every
 * level goes to stderr; LOG_LEVEL (default "warn") sets the threshold.
 */

const LEVELS = ['error', 'warn', 'info', 'debug'] as const;

type LogLevel = (typeof LEVELS)[number];

type LogMeta = Record<string, unknown>;

function isLogLevel(raw: string): raw is LogLevel {
  return (LEVELS as readonly string[]).includes(raw);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = (raw || 'warn').toLowerCase();
  return isLogLevel(level) ? level : 'warn';
}

const threshold = LEVELS.indexOf(resolveLogLevel(process.env.LOG_LEVEL));

export function serializeError(error: unknown) {
  if (error instanceof Error) {
    const { name, message, stack } = error;
    return { name, message, stack };
  }
  return typeof error === 'object' && error !== null ? error : { message: String(error) };
}

function cleanMeta(meta: LogMeta | undefined): LogMeta | undefined {
  const entries = Object.entries(meta ?? {})
    .filter(([, value]) => value !== undefined)
    .map(([key, value]): [string, unknown] => [key, value instanceof Error ? serializeError(value) : value]);
  return entries.length ? Object.fromEntries(entries) : undefined;
}

export function formatLine(level: LogLevel, message: string, meta?: LogMeta, now = new Date()) {
  const head = `${now.toISOString()} [${level.toUpperCase()}] ${message}`;
  const extra = cleanMeta(meta);
  return extra ? `${head} ${JSON.stringify(extra)}` : head;
}

function emit(level: LogLevel) {
  return (message: string, meta?: LogMeta) => {
    if (LEVELS.indexOf(level) > threshold) return;
    console.error(formatLine(level, message, meta));
  };
}

export const logger = {
  error: emit('error'),
  warn: emit('warn'),
  info: emit('info'),
  debug: emit('debug'),
};
