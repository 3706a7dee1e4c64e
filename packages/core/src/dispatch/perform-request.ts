import { ResponseParseError } from '../errors/index.js';
import { parseEntity } from '../http/entity-parser.js';
import { ResponseException, describeResponse } from '../http/errors.js';
import type {
  ActionRequest,
  DispatchContext,
  EntityParser,
  RequestConverter,
  ResponseConverter,
} from '../interfaces/action.js';
import type { HttpHeaders, WireRequest, WireResponse } from '../interfaces/transport.js';
import { errorToLog } from '../utils/logging.js';
import { parseResponseException } from './parse-response-exception.js';

export function mergeHeaders(
  request: WireRequest,
  headers?: Readonly<HttpHeaders>
): Readonly<HttpHeaders> | undefined {
  if (!request.headers) return headers;
  if (!headers) return request.headers;
  return { ...request.headers, ...headers };
}

export function unparseableResponse(response: WireResponse, cause: unknown): ResponseParseError {
  return new ResponseParseError(`Unable to parse response body for ${describeResponse(response)}`, cause);
}

/**
 * Validate, convert and execute a request, then convert its response.
 *
 * Statuses listed in `ignores` are first handed to `responseConverter` as if
 * they were successful; when that conversion fails the
 * ResponseException is translated instead (the conversion failure is dropped,
 * since e.g. a 404 may be either a valid "not found" document or an error).
 *
 * Rejects with the ValidationError, a StatusError, a ResponseParseError, or
 * the transport's own error for connection-level failures.
 */
export async function performRequest<Req extends ActionRequest, Resp>(
  ctx: DispatchContext,
  request: Req,
  requestConverter: RequestConverter<Req>,
  responseConverter: ResponseConverter<Resp>,
  ignores: ReadonlySet<number>,
  headers?: Readonly<HttpHeaders>
): Promise<Resp> {
  const validationError = request.validate();
  if (validationError) {
    ctx.logger?.debug('Request validation failed', { errors: validationError.validationErrors });
    throw validationError;
  }

  const req = requestConverter(request);
  let response: WireResponse;
  try {
    response = await ctx.transport.performRequest(
      req.method,
      req.endpoint,
      req.params,
      req.entity,
      mergeHeaders(req, headers)
    );
  } catch (err) {
    if (!(err instanceof ResponseException)) {
      throw err;
    }
    if (ignores.has(err.status)) {
      try {
        const converted = responseConverter(err.response);
        ctx.logger?.debug('Converted ignored status as a response', { status: err.status });
        return converted;
      } catch (innerErr) {
        ctx.logger?.debug('Ignored status did not convert, translating as error', {
          status: err.status,
          error: errorToLog(innerErr),
        });
        throw parseResponseException(err);
      }
    }
    throw parseResponseException(err);
  }

  try {
    return responseConverter(response);
  } catch (err) {
    throw unparseableResponse(response, err);
  }
}

/**
 * performRequest whose response converter decodes the entity with `entityParser`
 */
export function performRequestAndParseEntity<Req extends ActionRequest, Resp>(
  ctx: DispatchContext,
  request: Req,
  requestConverter: RequestConverter<Req>,
  entityParser: EntityParser<Resp>,
  ignores: ReadonlySet<number>,
  headers?: Readonly<HttpHeaders>
): Promise<Resp> {
  return performRequest(
    ctx,
    request,
    requestConverter,
    (response) => parseEntity(response.entity, entityParser),
    ignores,
    headers
  );
}
