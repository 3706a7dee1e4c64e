/**
 * Document-store endpoint client
 * Typed get / exists / ping calls dispatched through the core request pipeline
 */

import {
  convertExistsResponse,
  performRequest,
  performRequestAndParseEntity,
  performRequestAsyncAndParseEntity,
  performRequestAsync,
} from '@restlift/core';
import type { ActionListener, DispatchContext, HttpHeaders } from '@restlift/core';
import { GetRequest, MainRequest } from './requests/get-request.js';
import { existsRequest, getRequest, parseGetResponse, pingRequest } from './mappers/index.js';
import type { GetResponse } from './mappers/index.js';

const NO_IGNORES: ReadonlySet<number> = new Set();

// a missing document answers 404 with a regular "found": false body
const GET_IGNORES: ReadonlySet<number> = new Set([404]);

/**
 * DocumentsClient
 *
 * Operations:
 * - ping: HEAD / (true when the cluster answers 200)
 * - get / getAsync: GET /{index}/{type}/{id}
 * - exists / existsAsync: HEAD /{index}/{type}/{id}
 *
 * Every method accepts extra per-call headers, sent on top of the transport's defaults.
 */
export class DocumentsClient {
  constructor(private readonly ctx: DispatchContext) {}

  ping(headers?: Readonly<HttpHeaders>): Promise<boolean> {
    return performRequest(this.ctx, new MainRequest(), pingRequest, convertExistsResponse, NO_IGNORES, headers);
  }

  get(request: GetRequest, headers?: Readonly<HttpHeaders>): Promise<GetResponse> {
    this.ctx.logger?.debug('Getting document', { index: request.index, type: request.type, id: request.id });
    return performRequestAndParseEntity(this.ctx, request, getRequest, parseGetResponse, GET_IGNORES, headers);
  }

  getAsync(request: GetRequest, listener: ActionListener<GetResponse>, headers?: Readonly<HttpHeaders>): void {
    this.ctx.logger?.debug('Getting document', { index: request.index, type: request.type, id: request.id });
    performRequestAsyncAndParseEntity(
      this.ctx,
      request,
      getRequest,
      parseGetResponse,
      listener,
      GET_IGNORES,
      headers
    );
  }

  exists(request: GetRequest, headers?: Readonly<HttpHeaders>): Promise<boolean> {
    return performRequest(this.ctx, request, existsRequest, convertExistsResponse, NO_IGNORES, headers);
  }

  existsAsync(request: GetRequest, listener: ActionListener<boolean>, headers?: Readonly<HttpHeaders>): void {
    performRequestAsync(this.ctx, request, existsRequest, convertExistsResponse, listener, NO_IGNORES, headers);
  }
}

export { GetRequest, MainRequest } from './requests/get-request.js';
export { parseGetResponse, getParams } from './mappers/index.js';
export type { GetResponse } from './mappers/index.js';
export type { GetRequestOptions, FetchSource, VersionType } from './validation.js';
export { buildEndpoint } from './utils/endpoint.js';
