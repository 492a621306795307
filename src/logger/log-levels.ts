import type { LogLevel } from '@nestjs/common';

const ORDERED_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function isLogLevel(value: string): value is LogLevel {
  return ORDERED_LEVELS.some((level) => level === value);
}

/** `LOG_LEVEL=debug` enables error, warn, log and debug. */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? '').trim().toLowerCase();
  const threshold = isLogLevel(normalized) ? normalized : 'log';
  return ORDERED_LEVELS.slice(0, ORDERED_LEVELS.indexOf(threshold) + 1);
}
