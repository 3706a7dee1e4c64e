import { ResponseException } from '../../http/errors.js';
import type {
  HttpEntity,
  HttpHeaders,
  HttpMethod,
  QueryParams,
  ResponseListener,
  Transport,
  WireResponse,
} from '../../interfaces/transport.js';

export interface RecordedCall {
  method: HttpMethod;
  endpoint: string;
  params: Readonly<QueryParams>;
  entity?: HttpEntity;
  headers?: Readonly<HttpHeaders>;
}

/**
 * In-process Transport: every call produces the configured outcome
 * (a response, or the error `outcome` throws).
 */
export class MockTransport implements Transport {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly outcome: () => WireResponse) {}

  async performRequest(
    method: HttpMethod,
    endpoint: string,
    params: Readonly<QueryParams>,
    entity?: HttpEntity,
    headers?: Readonly<HttpHeaders>
  ): Promise<WireResponse> {
    this.calls.push({ method, endpoint, params, entity, headers });
    return this.outcome();
  }

  performRequestAsync(
    method: HttpMethod,
    endpoint: string,
    params: Readonly<QueryParams>,
    entity: HttpEntity | undefined,
    listener: ResponseListener,
    headers?: Readonly<HttpHeaders>
  ): void {
    this.calls.push({ method, endpoint, params, entity, headers });
    queueMicrotask(() => {
      let response: WireResponse;
      try {
        response = this.outcome();
      } catch (err) {
        listener.onFailure(err);
        return;
      }
      listener.onSuccess(response);
    });
  }
}

export function wireResponse(
  status: number,
  body?: string,
  contentType = 'application/json',
  method: HttpMethod = 'GET'
): WireResponse {
  const statusTexts: Record<number, string> = {
    200: 'OK',
    404: 'Not Found',
    500: 'Internal Server Error',
    503: 'Service Unavailable',
  };
  const content = body === undefined ? undefined : new TextEncoder().encode(body);
  return {
    requestLine: { method, uri: '/posts/_all/1' },
    host: 'http://search.test',
    status,
    statusText: statusTexts[status] ?? '',
    headers: { 'content-type': contentType },
    entity: content && { contentType, content },
  };
}

/**
 * Outcome that fails the way transports do for unsuccessful statuses
 */
export function failWith(response: WireResponse): () => WireResponse {
  const exception = new ResponseException(response);
  return () => {
    throw exception;
  };
}
