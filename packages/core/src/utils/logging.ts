/**
 * Logging Utilities - Safe object serialization for logging
 */

import type { Logger } from '../interfaces/logger.js';

/**
 * Console-backed logger used when none is injected
 */
export function defaultLogger(prefix = 'http'): Logger {
  return {
    debug: (m, meta) => console.debug(`[${prefix}][debug]`, m, meta),
    info: (m, meta) => console.info(`[${prefix}][info]`, m, meta),
    warn: (m, meta) => console.warn(`[${prefix}][warn]`, m, meta),
    error: (m, meta) => console.error(`[${prefix}][error]`, m, meta),
  };
}

/**
 * Safely serialize objects for logging
 * Prevents circular reference errors and safely handles various object types.
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Truncate a string to a maximum length
 * If the string exceeds maxLength, appends "..." to indicate truncation.
 */
export function truncateString(str: string, maxLength: number = 500): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength) + '...';
}

const SENSITIVE_HEADERS = ['authorization', 'api-key', 'x-api-key', 'password', 'token', 'cookie', 'set-cookie'];

/**
 * Sanitize sensitive headers from logging
 * Masks values of headers that typically contain sensitive information.
 */
export function sanitizeHeadersForLog(headers?: Readonly<Record<string, unknown>>): Record<string, string> | undefined {
  if (!headers) return undefined;

  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      sanitized[key] = 'REDACTED';
    } else {
      sanitized[key] = String(value);
    }
  }

  return sanitized;
}

/**
 * Create a safe log object from an error
 * Extracts relevant error information in a standardized format suitable for logging.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      type: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'object' && error !== null) {
    const serialized = serializeForLog(error);
    return typeof serialized === 'object' && serialized !== null
      ? { ...serialized }
      : { message: String(serialized) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}
