import { StatusError } from '../errors/index.js';
import { parseEntity } from '../http/entity-parser.js';
import type { ResponseException } from '../http/errors.js';
import { restStatus } from '../http/status.js';
import { errorFromDocument } from './error-document.js';

/**
 * Converts a ResponseException obtained from the transport into a StatusError.
 *
 * If a response body was returned, tries to parse it as an error document; the
 * ResponseException is then attached as suppressed. If there is no body, or
 * parsing fails for any reason, returns a status-only StatusError wrapping the
 * ResponseException, with the parse failure (if any) attached as suppressed.
 * Never throws.
 */
export function parseResponseException(responseException: ResponseException): StatusError {
  const response = responseException.response;
  const status = restStatus(response.status);

  if (!response.entity) {
    return new StatusError(responseException.message, status, { cause: responseException });
  }

  try {
    const error = parseEntity(response.entity, (parser) => errorFromDocument(parser, status));
    error.addSuppressed(responseException);
    return error;
  } catch (err) {
    const error = new StatusError('Unable to parse response body', status, { cause: responseException });
    error.addSuppressed(err);
    return error;
  }
}
