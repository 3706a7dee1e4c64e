import type { Logger } from './logger.js';
import type { Transport, WireRequest, WireResponse } from './transport.js';
import type { ValidationError } from '../errors/index.js';
import type { DocumentParser } from '../http/document-parser.js';

/**
 * ActionRequest
 * A typed domain request. `validate()` returning an error blocks dispatch.
 */
export interface ActionRequest {
  validate(): ValidationError | undefined;
}

/**
 * Caller-side completion handler for the callback dispatch path
 */
export interface ActionListener<T> {
  onResponse(value: T): void;
  onFailure(error: unknown): void;
}

/**
 * DispatchContext
 * Dependencies the dispatch functions run against
 */
export interface DispatchContext {
  /** Transport that executes wire requests (required) */
  transport: Transport;

  /** Optional logger instance */
  logger?: Logger;
}

export type RequestConverter<Req> = (request: Req) => WireRequest;

/**
 * May throw when the response cannot be converted (e.g. malformed body)
 */
export type ResponseConverter<Resp> = (response: WireResponse) => Resp;

/**
 * Content-type specific decode step run inside parseEntity
 */
export type EntityParser<Resp> = (parser: DocumentParser) => Resp;
