import axios, { type AxiosInstance } from "axios";
import type { HttpEntity, HttpHeaders, HttpMethod, QueryParams, Transport, WireResponse } from "../interfaces/transport.js";
import {
  buildRequestHeaders,
  buildUri,
  completeResponse,
  deliver,
  logRequest,
  normalizeHeaders,
  resolveTransportSettings,
  type TransportOptions,
} from "./transport-utils.js";

export interface AxiosTransportOptions extends TransportOptions {
  axiosInstance?: AxiosInstance;
}

/**
 * Create a Transport backed by Axios.
 * - Bodies are read as raw bytes; decoding is left to the entity parser.
 * - Every status resolves inside axios; success is decided by isSuccessfulResponse.
 * - Errors without a response (connection refused, timeout) are rethrown as-is.
 */
export function createAxiosTransport(opts: AxiosTransportOptions): Transport {
  const settings = resolveTransportSettings(opts);
  const instance: AxiosInstance =
    opts.axiosInstance ?? axios.create({ timeout: settings.timeoutMs });

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

    const res = await instance.request<ArrayBuffer>({
      method,
      url: settings.baseUrl + uri,
      headers: requestHeaders,
      data: entity ? Buffer.from(entity.content) : undefined,
      responseType: "arraybuffer",
      validateStatus: () => true,
    });

    return completeResponse(
      settings,
      method,
      uri,
      res.status,
      res.statusText,
      normalizeHeaders(res.headers),
      res.data ? new Uint8Array(res.data) : new Uint8Array()
    );
  }

  return {
    performRequest,
    performRequestAsync(method, endpoint, params, entity, listener, headers) {
      deliver(performRequest(method, endpoint, params, entity, headers), listener, settings.log);
    },
  };
}

export default createAxiosTransport;
