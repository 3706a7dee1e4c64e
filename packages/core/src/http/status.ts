import { STATUS_CODES } from 'node:http';

/**
 * HTTP status resolved to a stable constant name (404 -> NOT_FOUND)
 */
export interface RestStatus {
  readonly code: number;
  readonly name: string;
}

export function reasonPhrase(code: number): string {
  return STATUS_CODES[code] ?? 'Unknown';
}

export function restStatus(code: number): RestStatus {
  const phrase = STATUS_CODES[code];
  if (!phrase) return { code, name: 'UNKNOWN' };
  const name = phrase
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return { code, name };
}

/**
 * 404 answering a HEAD is a valid "does not exist" answer, not a failure
 */
export function isSuccessfulResponse(method: string, status: number): boolean {
  if (status < 300) return true;
  return method === 'HEAD' && status === 404;
}
