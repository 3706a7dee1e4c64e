import type { RequestConverter, WireRequest } from '@restlift/core';
import type { GetRequest, MainRequest } from '../requests/get-request.js';
import { ParamsBuilder, buildEndpoint } from '../utils/endpoint.js';

export const pingRequest: RequestConverter<MainRequest> = () => ({
  method: 'HEAD',
  endpoint: '/',
  params: {},
});

/**
 * Query parameters shared by get and exists; defaults are left out
 */
export function getParams(request: GetRequest): WireRequest['params'] {
  const params = new ParamsBuilder()
    .put('preference', request.preference)
    .put('routing', request.routing)
    .put('parent', request.parent)
    .put('refresh', request.refresh ? 'true' : undefined)
    .put('realtime', request.realtime ? undefined : 'false')
    .putList('stored_fields', request.storedFields)
    .put('version', request.version === undefined ? undefined : String(request.version))
    .put('version_type', request.versionType === 'internal' ? undefined : request.versionType);

  const source = request.fetchSource;
  if (source === false) {
    params.put('_source', 'false');
  } else if (source) {
    params.putList('_source_include', source.includes).putList('_source_exclude', source.excludes);
  }
  return params.build();
}

/**
 * Assumes a validated request: index, type and id are present
 */
function documentEndpoint(request: GetRequest): string {
  return buildEndpoint(request.index ?? '', request.type, request.id ?? '');
}

export const getRequest: RequestConverter<GetRequest> = (request) => ({
  method: 'GET',
  endpoint: documentEndpoint(request),
  params: getParams(request),
});

export const existsRequest: RequestConverter<GetRequest> = (request) => ({
  method: 'HEAD',
  endpoint: documentEndpoint(request),
  params: getParams(request),
});
