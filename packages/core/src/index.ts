// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export {
  ValidationError,
  ParsingError,
  ResponseParseError,
  RemoteError,
  StatusError,
  categorizeStatus,
  remoteErrorMessage,
} from './errors/index.js';
export type { ErrorCategory, RemoteErrorOptions, StatusErrorOptions } from './errors/index.js';
export { ResponseException, describeResponse, entityToString } from './http/errors.js';

// Entity parsing
export { parseEntity } from './http/entity-parser.js';
export { DocumentParser } from './http/document-parser.js';
export {
  contentTypeFromMediaTypeOrFormat,
  JSON_CONTENT_TYPE,
  YAML_CONTENT_TYPE,
} from './http/content-type.js';
export type { ContentType, ContentFormat } from './http/content-type.js';
export { restStatus, reasonPhrase, isSuccessfulResponse } from './http/status.js';
export type { RestStatus } from './http/status.js';

// Dispatch
export * from './dispatch/index.js';

// Transports (convenience exports)
export { createAxiosTransport } from './http/axios-transport.js';
export type { AxiosTransportOptions } from './http/axios-transport.js';
export { createFetchTransport } from './http/fetch-transport.js';
export type { FetchTransportOptions, FetchFn } from './http/fetch-transport.js';
export type { TransportOptions } from './http/transport-utils.js';

// Utilities
export { serializeForLog, truncateString, sanitizeHeadersForLog, errorToLog, defaultLogger, isRecord } from './utils/index.js';
