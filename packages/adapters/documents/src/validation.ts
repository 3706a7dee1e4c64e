import { z } from 'zod';

/**
 * Zod schemas for runtime validation of document requests
 */

/**
 * Index, type and id must be present and non-empty
 */
export const RequiredNameSchema = z.string().min(1);

export const VersionTypeSchema = z.enum(['internal', 'external', 'external_gte', 'force']);
export type VersionType = z.infer<typeof VersionTypeSchema>;

/**
 * Source filtering: `false` disables `_source`, otherwise include/exclude patterns
 */
export const FetchSourceSchema = z.union([
  z.literal(false),
  z.object({
    includes: z.array(z.string()).optional(),
    excludes: z.array(z.string()).optional(),
  }),
]);
export type FetchSource = z.infer<typeof FetchSourceSchema>;

export const GetRequestOptionsSchema = z.object({
  index: z.string().optional(),
  type: z.string().optional(),
  id: z.string().optional(),
  routing: z.string().optional(),
  parent: z.string().optional(),
  preference: z.string().optional(),
  realtime: z.boolean().optional(),
  refresh: z.boolean().optional(),
  storedFields: z.array(z.string()).optional(),
  version: z.number().int().optional(),
  versionType: VersionTypeSchema.optional(),
  fetchSource: FetchSourceSchema.optional(),
});
export type GetRequestOptions = z.infer<typeof GetRequestOptionsSchema>;

/**
 * Versions accepted on reads: any non-negative number
 */
export const ReadVersionSchema = z.number().int().nonnegative();

/**
 * Helper to validate get options
 * Returns { success: true, data } or { success: false, error }
 */
export function safeValidateGetRequestOptions(options: unknown) {
  return GetRequestOptionsSchema.safeParse(options);
}
