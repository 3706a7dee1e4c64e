/**
 * Wire-level request/response shapes and the Transport contract.
 *
 * All Transport implementations (axios, fetch, custom) normalize to these shapes,
 * so the dispatch layer never has to know which HTTP library sent the bytes.
 */

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Header names are lower-cased on responses; request headers are sent as given.
 */
export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string>;

/**
 * Raw body plus its declared content type
 */
export interface HttpEntity {
  /**
   * Value of the Content-Type header (e.g. "application/json; charset=UTF-8").
   * Absent when the server did not declare one.
   */
  readonly contentType?: string;

  /**
   * Body bytes, never empty (an empty body means no entity at all)
   */
  readonly content: Uint8Array;
}

export interface RequestLine {
  readonly method: HttpMethod;
  /**
   * Endpoint path including the query string (e.g. "/posts/_all/1?routing=a")
   */
  readonly uri: string;
}

/**
 * Request derived from a domain request by a RequestConverter
 */
export interface WireRequest {
  readonly method: HttpMethod;
  readonly endpoint: string;
  readonly params: Readonly<QueryParams>;
  readonly entity?: HttpEntity;
  readonly headers?: Readonly<HttpHeaders>;
}

/**
 * Response as captured by a Transport, on success or inside a ResponseException
 */
export interface WireResponse {
  readonly requestLine: RequestLine;

  /**
   * Base URL the request was sent to (e.g. "http://localhost:9200")
   */
  readonly host: string;

  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<HttpHeaders>;
  readonly entity?: HttpEntity;
}

/**
 * Completion handler handed to Transport.performRequestAsync.
 * Exactly one of the two methods is called, exactly once.
 */
export interface ResponseListener {
  onSuccess(response: WireResponse): void;

  /**
   * Receives a ResponseException for unsuccessful statuses, or whatever the
   * underlying HTTP library raised for connection-level failures.
   */
  onFailure(error: unknown): void;
}

/**
 * Transport
 * Pluggable HTTP executor the dispatch layer sends wire requests through.
 *
 * Unsuccessful statuses (>= 300, except 404 answering a HEAD) are reported as
 * a ResponseException carrying the captured WireResponse.
 */
export interface Transport {
  performRequest(
    method: HttpMethod,
    endpoint: string,
    params: Readonly<QueryParams>,
    entity?: HttpEntity,
    headers?: Readonly<HttpHeaders>
  ): Promise<WireResponse>;

  /**
   * Returns immediately; the outcome is delivered to `listener`.
   */
  performRequestAsync(
    method: HttpMethod,
    endpoint: string,
    params: Readonly<QueryParams>,
    entity: HttpEntity | undefined,
    listener: ResponseListener,
    headers?: Readonly<HttpHeaders>
  ): void;
}
