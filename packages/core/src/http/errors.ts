import type { HttpEntity, WireResponse } from '../interfaces/transport.js';

export function entityToString(entity: HttpEntity): string {
  return new TextDecoder().decode(entity.content);
}

export function statusLine(response: WireResponse): string {
  return `${response.status} ${response.statusText}`.trim();
}

/**
 * One-line description used in parse error messages
 */
export function describeResponse(response: WireResponse): string {
  const { method, uri } = response.requestLine;
  return `Response{requestLine=${method} ${uri}, host=${response.host}, status=${statusLine(response)}}`;
}

function buildMessage(response: WireResponse): string {
  const { method, uri } = response.requestLine;
  let message = `method [${method}], host [${response.host}], URI [${uri}], status line [${statusLine(response)}]`;
  if (response.entity) {
    message += `\n${entityToString(response.entity)}`;
  }
  return message;
}

/**
 * ResponseException
 * Raised by transports for unsuccessful statuses. Carries the captured response
 * so callers can still recover a result from it (see the ignore set in dispatch).
 */
export class ResponseException extends Error {
  readonly response: WireResponse;

  constructor(response: WireResponse) {
    super(buildMessage(response));
    Object.setPrototypeOf(this, ResponseException.prototype);
    this.name = 'ResponseException';
    this.response = response;
  }

  get status(): number {
    return this.response.status;
  }
}
