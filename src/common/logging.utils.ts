import { LogLevel } from '@nestjs/common';

const DEFAULT_TRUNCATE_LENGTH = 100;

// JSON has no bigint, byte array or map forms
function logReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex');
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

/**
 * Render a value for a log line, cut to `maxLength` characters
 * PrimitiveValues render through their toJSON
 */
export function truncateForLog(data: unknown, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  const str = JSON.stringify(data, logReplacer) ?? String(data);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength) + '...';
}

/**
 * Enabled log levels for a minimum level, as read from LOG_LEVEL
 * Nest levels are cumulative: 'debug' also enables error, warn and log
 */
export function getLogLevels(minLevel: string = 'log'): LogLevel[] {
  const levels: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];
  const index = levels.findIndex(level => level === minLevel);
  return index >= 0 ? levels.slice(0, index + 1) : ['error', 'warn', 'log'];
}
