import type { WireResponse } from '../interfaces/transport.js';

/**
 * Response converter for existence checks: 200 means "exists", anything else
 * that reaches it (e.g. 404 on HEAD) means it does not.
 */
export function convertExistsResponse(response: WireResponse): boolean {
  return response.status === 200;
}
