import { parseEntity } from '../http/entity-parser.js';
import { ResponseException } from '../http/errors.js';
import type {
  ActionListener,
  ActionRequest,
  DispatchContext,
  EntityParser,
  RequestConverter,
  ResponseConverter,
} from '../interfaces/action.js';
import type { Logger } from '../interfaces/logger.js';
import type { HttpHeaders, ResponseListener, WireRequest } from '../interfaces/transport.js';
import { errorToLog } from '../utils/logging.js';
import { parseResponseException } from './parse-response-exception.js';
import { mergeHeaders, unparseableResponse } from './perform-request.js';

/**
 * Adapt an ActionListener to the transport's ResponseListener, applying the
 * same conversion and ignore-set rules as performRequest.
 *
 * The converter always runs before `onResponse` is called, so an exception
 * thrown by the caller's `onResponse` never turns into a second `onFailure`.
 */
export function wrapResponseListener<Resp>(
  responseConverter: ResponseConverter<Resp>,
  actionListener: ActionListener<Resp>,
  ignores: ReadonlySet<number>,
  logger?: Logger
): ResponseListener {
  return {
    onSuccess(response) {
      let converted: Resp;
      try {
        converted = responseConverter(response);
      } catch (err) {
        actionListener.onFailure(unparseableResponse(response, err));
        return;
      }
      actionListener.onResponse(converted);
    },

    onFailure(error) {
      if (!(error instanceof ResponseException)) {
        actionListener.onFailure(error);
        return;
      }
      if (!ignores.has(error.status)) {
        actionListener.onFailure(parseResponseException(error));
        return;
      }

      let converted: Resp;
      try {
        converted = responseConverter(error.response);
      } catch (innerErr) {
        // a 404 may be a valid "not found" document or an error; when it does not
        // convert as a response it is parsed as an error instead
        logger?.debug('Ignored status did not convert, translating as error', {
          status: error.status,
          error: errorToLog(innerErr),
        });
        actionListener.onFailure(parseResponseException(error));
        return;
      }
      actionListener.onResponse(converted);
    },
  };
}

/**
 * Callback flavour of performRequest. Returns immediately; `listener` receives
 * exactly one outcome. Validation failures are delivered synchronously and the
 * transport is never contacted.
 */
export function performRequestAsync<Req extends ActionRequest, Resp>(
  ctx: DispatchContext,
  request: Req,
  requestConverter: RequestConverter<Req>,
  responseConverter: ResponseConverter<Resp>,
  listener: ActionListener<Resp>,
  ignores: ReadonlySet<number>,
  headers?: Readonly<HttpHeaders>
): void {
  const validationError = request.validate();
  if (validationError) {
    ctx.logger?.debug('Request validation failed', { errors: validationError.validationErrors });
    listener.onFailure(validationError);
    return;
  }

  let req: WireRequest;
  try {
    req = requestConverter(request);
  } catch (err) {
    listener.onFailure(err);
    return;
  }

  const responseListener = wrapResponseListener(responseConverter, listener, ignores, ctx.logger);
  ctx.transport.performRequestAsync(
    req.method,
    req.endpoint,
    req.params,
    req.entity,
    responseListener,
    mergeHeaders(req, headers)
  );
}

export function performRequestAsyncAndParseEntity<Req extends ActionRequest, Resp>(
  ctx: DispatchContext,
  request: Req,
  requestConverter: RequestConverter<Req>,
  entityParser: EntityParser<Resp>,
  listener: ActionListener<Resp>,
  ignores: ReadonlySet<number>,
  headers?: Readonly<HttpHeaders>
): void {
  performRequestAsync(
    ctx,
    request,
    requestConverter,
    (response) => parseEntity(response.entity, entityParser),
    listener,
    ignores,
    headers
  );
}
