import { ParsingError } from '../errors/index.js';
import { isRecord } from '../utils/index.js';
import type { ContentType } from './content-type.js';

/**
 * DocumentParser
 * Parsing context opened over a response entity. Decodes lazily, once, and
 * refuses every read after close().
 */
export class DocumentParser {
  private closed = false;
  private decoded?: { value: unknown };

  constructor(
    readonly contentType: ContentType,
    private readonly content: Uint8Array
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  text(): string {
    this.ensureOpen();
    return new TextDecoder().decode(this.content);
  }

  document(): unknown {
    this.ensureOpen();
    if (this.decoded) return this.decoded.value;

    const text = this.text();
    let value: unknown;
    try {
      value = this.contentType.decode(text);
    } catch (err) {
      throw new ParsingError(`Unable to decode ${this.contentType.format} content`, { cause: err });
    }
    this.decoded = { value };
    return value;
  }

  /**
   * The document, which must be an object at the top level
   */
  map(): Record<string, unknown> {
    const doc = this.document();
    if (!isRecord(doc)) {
      const found = Array.isArray(doc) ? 'array' : doc === null ? 'null' : typeof doc;
      throw new ParsingError(`Expected an object at the document root but found ${found}`);
    }
    return doc;
  }

  close(): void {
    this.closed = true;
    this.decoded = undefined;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ParsingError('Parser is already closed');
    }
  }
}
