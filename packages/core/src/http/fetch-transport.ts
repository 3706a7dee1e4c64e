import type { HttpEntity, HttpHeaders, HttpMethod, QueryParams, Transport, WireResponse } from '../interfaces/transport.js';
import {
  buildRequestHeaders,
  buildUri,
  completeResponse,
  deliver,
  logRequest,
  resolveTransportSettings,
  type TransportOptions,
} from './transport-utils.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchTransportOptions extends TransportOptions {
  // fetchFn can be provided for environments where `fetch` is not global
  fetchFn?: FetchFn;
}

export function createFetchTransport(opts: FetchTransportOptions): Transport {
  const fetchFn: FetchFn = opts.fetchFn ?? globalThis.fetch;
  if (!fetchFn) throw new Error('fetch is not available in this environment; provide fetchFn');

  const settings = resolveTransportSettings(opts);

  async function performRequest(
    method: HttpMethod,
    endpoint: string,
    params: Readonly<QueryParams>,
    entity?: HttpEntity,
    headers?: Readonly<HttpHeaders>
  ): Promise<WireResponse> {
    const uri = buildUri(endpoint, params);
    const requestHeaders = buildRequestHeaders(opts.defaultHeaders, entity, headers);
    logRequest(settings, method, uri, requestHeaders, entity);

    const res = await fetchFn(settings.baseUrl + uri, {
      method,
      headers: requestHeaders,
      body: entity?.content,
      signal: AbortSignal.timeout(settings.timeoutMs),
    });

    const responseHeaders: HttpHeaders = {};
    res.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value;
    });
    const content = new Uint8Array(await res.arrayBuffer());

    return completeResponse(settings, method, uri, res.status, res.statusText, responseHeaders, content);
  }

  return {
    performRequest,
    performRequestAsync(method, endpoint, params, entity, listener, headers) {
      deliver(performRequest(method, endpoint, params, entity, headers), listener, settings.log);
    },
  };
}

export default createFetchTransport;
