/**
 * Leveled logger shared by every benchmark component.
 * Output goes to stderr so stdout stays reserved for run summaries.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveInitialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

let currentLevel: LogLevel = resolveInitialLevel();

function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [unserializable meta]';
  }
}

function emit(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;
  process.stderr.write(`${line}\n`);
}

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  debug(message: string, meta?: LogMeta): void {
    emit('debug', message, meta);
  },

  info(message: string, meta?: LogMeta): void {
    emit('info', message, meta);
  },

  warn(message: string, meta?: LogMeta): void {
    emit('warn', message, meta);
  },

  error(message: string, meta?: LogMeta): void {
    emit('error', message, meta);
  },
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
