import type { Logger } from '../interfaces/logger.js';
import type {
  HttpEntity,
  HttpHeaders,
  HttpMethod,
  QueryParams,
  ResponseListener,
  WireResponse,
} from '../interfaces/transport.js';
import { defaultLogger, errorToLog, sanitizeHeadersForLog, truncateString } from '../utils/logging.js';
import { ResponseException } from './errors.js';
import { isSuccessfulResponse, reasonPhrase } from './status.js';

/**
 * Options shared by every bundled Transport implementation
 */
export interface TransportOptions {
  /** Base URL requests are sent to (e.g. "http://localhost:9200") */
  baseUrl: string;

  /** Headers sent with every request; per-call headers win */
  defaultHeaders?: HttpHeaders;

  /** Default: 30_000 */
  defaultTimeoutMs?: number;

  /** Log requests and responses at debug level. Default: HTTP_DEBUG=1 */
  debug?: boolean;

  /** Include bodies in debug logs. Default: HTTP_DEBUG_FULL=1 */
  debugFullBody?: boolean;

  logger?: Logger;
}

export interface ResolvedTransportSettings {
  baseUrl: string;
  timeoutMs: number;
  debug: boolean;
  debugFullBody: boolean;
  log: Logger;
}

export function resolveTransportSettings(opts: TransportOptions): ResolvedTransportSettings {
  return {
    baseUrl: opts.baseUrl.replace(/\/+$/, ''),
    timeoutMs: opts.defaultTimeoutMs ?? 30_000,
    debug: opts.debug ?? process.env.HTTP_DEBUG === '1',
    debugFullBody: opts.debugFullBody ?? process.env.HTTP_DEBUG_FULL === '1',
    log: opts.logger ?? defaultLogger(),
  };
}

export function buildUri(endpoint: string, params: Readonly<QueryParams>): string {
  const query = new URLSearchParams(Object.entries(params)).toString();
  return query ? `${endpoint}?${query}` : endpoint;
}

export function buildRequestHeaders(
  defaultHeaders: HttpHeaders | undefined,
  entity: HttpEntity | undefined,
  headers: Readonly<HttpHeaders> | undefined
): HttpHeaders {
  return {
    ...defaultHeaders,
    ...(entity?.contentType ? { 'Content-Type': entity.contentType } : {}),
    ...headers,
  };
}

/**
 * Lower-case header names; multi-valued headers are joined with ", "
 */
export function normalizeHeaders(headers: object): HttpHeaders {
  const out: HttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') out[key.toLowerCase()] = value;
    else if (typeof value === 'number') out[key.toLowerCase()] = String(value);
    else if (Array.isArray(value)) out[key.toLowerCase()] = value.map(String).join(', ');
  }
  return out;
}

export function toEntity(content: Uint8Array, headers: HttpHeaders): HttpEntity | undefined {
  if (content.byteLength === 0) return undefined;
  const contentType = headers['content-type'];
  return contentType === undefined ? { content } : { contentType, content };
}

/**
 * Build the WireResponse and decide between resolving and raising
 */
export function completeResponse(
  settings: ResolvedTransportSettings,
  method: HttpMethod,
  uri: string,
  status: number,
  statusText: string,
  headers: HttpHeaders,
  content: Uint8Array
): WireResponse {
  const response: WireResponse = {
    requestLine: { method, uri },
    host: settings.baseUrl,
    status,
    statusText: statusText || reasonPhrase(status),
    headers,
    entity: toEntity(content, headers),
  };

  if (settings.debug) {
    const logObj: Record<string, unknown> = {
      status,
      statusText: response.statusText,
      headers: sanitizeHeadersForLog(headers),
      bodyLength: content.byteLength,
    };
    if (settings.debugFullBody && response.entity) {
      logObj.body = truncateString(new TextDecoder().decode(content), 10_000);
    }
    settings.log.debug('response', logObj);
  }

  if (!isSuccessfulResponse(method, status)) {
    throw new ResponseException(response);
  }
  return response;
}

export function logRequest(
  settings: ResolvedTransportSettings,
  method: HttpMethod,
  uri: string,
  headers: HttpHeaders,
  entity: HttpEntity | undefined
): void {
  if (!settings.debug) return;
  const logObj: Record<string, unknown> = {
    method,
    url: settings.baseUrl + uri,
    headers: sanitizeHeadersForLog(headers),
    bodyLength: entity?.content.byteLength ?? 0,
  };
  if (settings.debugFullBody && entity) {
    logObj.body = truncateString(new TextDecoder().decode(entity.content), 10_000);
  }
  settings.log.debug('request', logObj);
}

/**
 * Route a pending request to a ResponseListener. An exception escaping the
 * listener itself is logged, never redelivered.
 */
export function deliver(
  pending: Promise<WireResponse>,
  listener: ResponseListener,
  log: Logger
): void {
  void pending
    .then(
      (response) => listener.onSuccess(response),
      (error: unknown) => listener.onFailure(error)
    )
    .catch((error: unknown) => {
      log.error('Response listener threw', { error: errorToLog(error) });
    });
}
