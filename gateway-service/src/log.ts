import { SERVICE } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: number = LEVELS[parseLevel(process.env.LOG_LEVEL)];

export function parseLevel(value: string | undefined): LogLevel {
  const v = (value || '').trim().toLowerCase();
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  if (v === 'warning') return 'warn';
  return 'info';
}

export function setLogLevel(level: LogLevel): void {
  threshold = LEVELS[level];
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVELS[level] >= threshold;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger tagged `[gateway-service:<scope>]`, filtered by LOG_LEVEL.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${SERVICE}:${scope}]`;
  return {
    debug: (message, ...details) => { if (isLevelEnabled('debug')) console.debug(`${tag} ${message}`, ...details); },
    info: (message, ...details) => { if (isLevelEnabled('info')) console.log(`${tag} ${message}`, ...details); },
    warn: (message, ...details) => { if (isLevelEnabled('warn')) console.warn(`${tag} ${message}`, ...details); },
    error: (message, ...details) => { if (isLevelEnabled('error')) console.error(`${tag} ${message}`, ...details); },
  };
}

/**
 * Escape CR/LF so device-supplied text cannot forge extra log lines.
 */
export function sanitizeForLog(input: unknown): string {
  if (input === null || input === undefined) return String(input);
  const s = typeof input === 'string' ? input : typeof input === 'object' ? safeJson(input) : String(input);
  return s.replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

function safeJson(value: object): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
