export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MESSAGE_LIMIT = 200;
const VALUE_LIMIT = 500;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_PRIORITY;
}

function defaultLogLevel(): LogLevel {
  const explicit = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(explicit)) return explicit;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

let currentLevel: LogLevel = defaultLogLevel();

export function setLogLevel(level: LogLevel): void {
  if (!isLogLevel(level)) return;
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function sanitizeValue(value: unknown, seen: WeakSet<object>): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value.toString();

  if (Buffer.isBuffer(value)) {
    return `[Buffer ${value.length} bytes]`;
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item, seen));
  }

  if (typeof value === 'object') {
    if (seen.has(value)) return '[Circular]';
    seen.add(value);

    const out: Record<string, unknown> = {};
    for (const [key, raw] of Object.entries(value)) {
      out[key] = sanitizeValue(raw, seen);
    }
    return out;
  }

  return String(value);
}

export function sanitize(data: unknown): unknown {
  return sanitizeValue(data, new WeakSet<object>());
}

function truncate(value: string, max: number): string {
  if (value.length <= max) return value;
  return `${value.slice(0, max)}... [${value.length} chars]`;
}

function truncateForLevel(value: unknown, level: LogLevel): unknown {
  if (level === 'debug') return value;

  if (typeof value === 'string') return truncate(value, VALUE_LIMIT);

  if (Array.isArray(value)) {
    return value.map((item) => truncateForLevel(item, level));
  }

  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = truncateForLevel(item, level);
    }
    return out;
  }

  return value;
}

function safeStringify(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function writeLine(level: LogLevel, line: string): void {
  const stream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function formatLogLine(
  level: LogLevel,
  moduleName: string,
  message: string,
  args: unknown[],
  timestamp: string = new Date().toISOString(),
): string {
  const messageFormatted = level === 'debug' ? message : truncate(message, MESSAGE_LIMIT);

  const formattedArgs = args
    .map((arg) => truncateForLevel(sanitize(arg), level))
    .map((arg) => safeStringify(arg))
    .join(' ');

  return formattedArgs
    ? `[${timestamp}] [${level.toUpperCase()}] [${moduleName}] ${messageFormatted} ${formattedArgs}`
    : `[${timestamp}] [${level.toUpperCase()}] [${moduleName}] ${messageFormatted}`;
}

export function createLogger(moduleName: string): Logger {
  const shouldLog = (level: LogLevel): boolean => LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];

  const log = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!shouldLog(level)) return;
    writeLine(level, formatLogLine(level, moduleName, message, args));
  };

  return {
    debug: (message: string, ...args: unknown[]) => log('debug', message, args),
    info: (message: string, ...args: unknown[]) => log('info', message, args),
    warn: (message: string, ...args: unknown[]) => log('warn', message, args),
    error: (message: string, ...args: unknown[]) => log('error', message, args),
  };
}
