import type { QueryParams } from '@restlift/core';

/**
 * Join path segments into an endpoint, URL-encoding each segment
 */
export function buildEndpoint(...segments: string[]): string {
  return '/' + segments.map((segment) => encodeURIComponent(segment)).join('/');
}

/**
 * Collects query parameters, skipping absent or empty values
 */
export class ParamsBuilder {
  private readonly params: QueryParams = {};

  put(name: string, value: string | undefined): this {
    if (value !== undefined && value !== '') {
      this.params[name] = value;
    }
    return this;
  }

  putList(name: string, values: readonly string[] | undefined): this {
    if (values && values.length > 0) {
      this.params[name] = values.join(',');
    }
    return this;
  }

  build(): QueryParams {
    return { ...this.params };
  }
}
