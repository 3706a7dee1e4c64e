import { ParsingError } from '../errors/index.js';
import type { EntityParser } from '../interfaces/action.js';
import type { HttpEntity } from '../interfaces/transport.js';
import { contentTypeFromMediaTypeOrFormat } from './content-type.js';
import { DocumentParser } from './document-parser.js';

/**
 * Decode a response entity with a content-type specific parser.
 * The parsing context is closed on every exit path, including when
 * `entityParser` throws.
 */
export function parseEntity<T>(entity: HttpEntity | undefined, entityParser: EntityParser<T>): T {
  if (!entity) {
    throw new ParsingError('Response body expected but not returned');
  }
  if (entity.contentType === undefined) {
    throw new ParsingError(
      "Server didn't return the [Content-Type] header, unable to parse response body"
    );
  }
  const contentType = contentTypeFromMediaTypeOrFormat(entity.contentType);
  if (!contentType) {
    throw new ParsingError(`Unsupported Content-Type: ${entity.contentType}`);
  }

  const parser = new DocumentParser(contentType, entity.content);
  try {
    return entityParser(parser);
  } finally {
    parser.close();
  }
}
