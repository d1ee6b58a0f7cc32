// stdout carries the protocol, so every diagnostic goes to stderr
const PREFIX = '[diigo-mcp]';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function resolveLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase();
  return level === 'debug' || level === 'info' || level === 'warn' || level === 'error'
    ? level
    : 'info';
}

const threshold: LogLevel = resolveLevel(process.env.LOG_LEVEL);

function write(level: LogLevel, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  console.error(PREFIX, level.toUpperCase(), ...args);
}

export const logger = {
  debug: (...args: unknown[]) => write('debug', args),
  info: (...args: unknown[]) => write('info', args),
  warn: (...args: unknown[]) => write('warn', args),
  error: (...args: unknown[]) => write('error', args)
};
