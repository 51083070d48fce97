// ──────────────────────────────────────────
// Console logger with [Tag] prefixes
// ──────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? 'info').toLowerCase();
  if (value === 'debug' || value === 'warn' || value === 'error') return value;
  return 'info';
}

export function createLogger(tag: string, level: LogLevel = parseLevel(process.env.LOG_LEVEL)): Logger {
  const write = (at: LogLevel, message: string, context?: LogContext) => {
    if (LEVELS[at] < LEVELS[level]) return;
    const line = `[${tag}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      console[at](line, context);
    } else {
      console[at](line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

// Frames from the scoping internals are skipped so audit entries point at application code
const INTERNAL_FRAMES = [
  /[\\/]platform[\\/](context|scoped|bypass|registry)\.[cm]?[jt]s/,
  /[\\/]shared[\\/]logger\.[cm]?[jt]s/,
  /node_modules/,
  /node:internal/,
  /\(native\)/,
];

export function callerLocation(stack: string | undefined = new Error().stack): string {
  const frames = (stack ?? '').split('\n').slice(1);
  for (const frame of frames) {
    const trimmed = frame.trim();
    if (!trimmed.startsWith('at ')) continue;
    if (INTERNAL_FRAMES.some((pattern) => pattern.test(trimmed))) continue;
    const match = trimmed.match(/\((.*)\)$/);
    return match ? match[1] : trimmed.slice(3);
  }
  return 'unknown';
}
