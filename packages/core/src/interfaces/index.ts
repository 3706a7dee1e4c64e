export type { Logger } from './logger.js';
export type {
  HttpMethod,
  HttpHeaders,
  QueryParams,
  HttpEntity,
  RequestLine,
  WireRequest,
  WireResponse,
  ResponseListener,
  Transport,
} from './transport.js';
export type {
  ActionRequest,
  ActionListener,
  DispatchContext,
  RequestConverter,
  ResponseConverter,
  EntityParser,
} from './action.js';
