import { z } from 'zod';
import { ParsingError, RemoteError, StatusError, remoteErrorMessage } from '../errors/index.js';
import type { DocumentParser } from '../http/document-parser.js';
import { restStatus, type RestStatus } from '../http/status.js';

/**
 * A single failure as reported by the server (top-level error, caused_by, root_cause entries)
 */
export interface FailureDocument {
  type: string;
  reason?: string | null;
  stack_trace?: string;
  caused_by?: FailureDocument;
  root_cause?: FailureDocument[];
  header?: Record<string, string | string[]>;
  [key: string]: unknown;
}

const FailureDocumentSchema: z.ZodType<FailureDocument> = z.lazy(() =>
  z.looseObject({
    type: z.string(),
    reason: z.string().nullish(),
    stack_trace: z.string().optional(),
    caused_by: FailureDocumentSchema.optional(),
    root_cause: z.array(FailureDocumentSchema).optional(),
    header: z.record(z.string(), z.union([z.string(), z.array(z.string())])).optional(),
  })
);

/**
 * Error body: `{ "error": <failure object | string>, "status": <code> }`
 */
const ErrorDocumentSchema = z.looseObject({
  error: z.union([z.string(), FailureDocumentSchema]).optional(),
  status: z.number().int().optional(),
});

const KNOWN_FAILURE_FIELDS = new Set(['type', 'reason', 'stack_trace', 'caused_by', 'root_cause', 'header']);

function metadataOf(doc: FailureDocument): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(doc)) {
    if (!KNOWN_FAILURE_FIELDS.has(key)) metadata[key] = value;
  }
  return metadata;
}

function headersOf(doc: FailureDocument): Record<string, string[]> {
  const headers: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(doc.header ?? {})) {
    headers[key] = Array.isArray(value) ? value : [value];
  }
  return headers;
}

function toRemoteError(doc: FailureDocument): RemoteError {
  return new RemoteError(doc.type, doc.reason ?? undefined, {
    cause: doc.caused_by ? toRemoteError(doc.caused_by) : undefined,
    metadata: metadataOf(doc),
    headers: headersOf(doc),
    stackTrace: doc.stack_trace,
  });
}

/**
 * Parse a structured error body into a StatusError.
 * `fallbackStatus` is used when the document carries no `status` member.
 * Throws ParsingError for anything that is not an error document.
 */
export function errorFromDocument(parser: DocumentParser, fallbackStatus: RestStatus): StatusError {
  const parsed = ErrorDocumentSchema.safeParse(parser.document());
  if (!parsed.success) {
    throw new ParsingError(`Failed to parse status exception: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }

  const { error, status } = parsed.data;
  if (error === undefined) {
    throw new ParsingError('Failed to parse status exception: no exception was found');
  }
  const resolvedStatus = status === undefined ? fallbackStatus : restStatus(status);

  if (typeof error === 'string') {
    return new StatusError(remoteErrorMessage('exception', error), resolvedStatus, {
      type: 'exception',
      reason: error,
    });
  }

  const reason = error.reason ?? undefined;
  return new StatusError(remoteErrorMessage(error.type, reason, error.stack_trace), resolvedStatus, {
    type: error.type,
    reason,
    cause: error.caused_by ? toRemoteError(error.caused_by) : undefined,
    rootCauses: (error.root_cause ?? []).map(toRemoteError),
    metadata: metadataOf(error),
    headers: headersOf(error),
  });
}
