import { z } from 'zod';
import { ParsingError, type DocumentParser } from '@restlift/core';

/**
 * A document read by id. `found` is false for a well-formed "not found" answer.
 */
export interface GetResponse {
  index: string;
  type: string;
  id: string;
  version?: number;
  found: boolean;
  source?: Record<string, unknown>;
  fields: Record<string, unknown[]>;
  routing?: string;
  parent?: string;
}

const GetDocumentSchema = z.looseObject({
  _index: z.string(),
  _type: z.string(),
  _id: z.string(),
  _version: z.number().int().optional(),
  found: z.boolean(),
  _source: z.record(z.string(), z.unknown()).nullish(),
  fields: z.record(z.string(), z.array(z.unknown())).optional(),
  _routing: z.string().optional(),
  _parent: z.string().optional(),
});

export function parseGetResponse(parser: DocumentParser): GetResponse {
  const parsed = GetDocumentSchema.safeParse(parser.map());
  if (!parsed.success) {
    throw new ParsingError(`Failed to parse get response: ${z.prettifyError(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const doc = parsed.data;
  const response: GetResponse = {
    index: doc._index,
    type: doc._type,
    id: doc._id,
    found: doc.found,
    fields: doc.fields ?? {},
  };
  if (doc._version !== undefined) response.version = doc._version;
  if (doc._source) response.source = doc._source;
  if (doc._routing !== undefined) response.routing = doc._routing;
  if (doc._parent !== undefined) response.parent = doc._parent;
  return response;
}
