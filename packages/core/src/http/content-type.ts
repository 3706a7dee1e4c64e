import { parse as parseYaml } from 'yaml';

export type ContentFormat = 'json' | 'yaml';

/**
 * A structured content type the entity parser knows how to decode
 */
export interface ContentType {
  readonly format: ContentFormat;
  readonly mediaTypes: readonly string[];
  decode(text: string): unknown;
}

export const JSON_CONTENT_TYPE: ContentType = {
  format: 'json',
  mediaTypes: ['application/json'],
  decode: (text) => JSON.parse(text),
};

export const YAML_CONTENT_TYPE: ContentType = {
  format: 'yaml',
  mediaTypes: ['application/yaml', 'application/x-yaml'],
  decode: (text) => parseYaml(text),
};

const SUPPORTED_CONTENT_TYPES: readonly ContentType[] = [JSON_CONTENT_TYPE, YAML_CONTENT_TYPE];

/**
 * Resolve a Content-Type header value ("application/json; charset=UTF-8") or a
 * bare format name ("yaml") to a supported content type.
 */
export function contentTypeFromMediaTypeOrFormat(value: string): ContentType | undefined {
  const normalized = value.split(';')[0].trim().toLowerCase();
  return SUPPORTED_CONTENT_TYPES.find(
    (type) => type.format === normalized || type.mediaTypes.includes(normalized)
  );
}
