export { performRequest, performRequestAndParseEntity } from './perform-request.js';
export {
  performRequestAsync,
  performRequestAsyncAndParseEntity,
  wrapResponseListener,
} from './perform-request-async.js';
export { parseResponseException } from './parse-response-exception.js';
export { errorFromDocument } from './error-document.js';
export type { FailureDocument } from './error-document.js';
export { convertExistsResponse } from './converters.js';
