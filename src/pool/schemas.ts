/**
 * POLICY POOL - Zod Schemas
 *
 * Runtime validation for policy records. Records are checked when written to
 * the store and again when rows are read back.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Tenure
// ---------------------------------------------------------------------------

// Kept in step with TENURED_SQL in db/schema.ts
const TRUTHY_STRINGS = new Set(['true', '1', '1.0', 'yes']);

/** Coerce a stored metadata flag to boolean. Missing means false. */
export function coerceFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value === 1;
  if (typeof value === 'string') return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  return false;
}

export function coerceTenured(value: unknown): boolean {
  return coerceFlag(value);
}

// ---------------------------------------------------------------------------
// Metadata - open bag, must carry `tenured`
// ---------------------------------------------------------------------------

export const PolicyMetadataSchema = z
  .object({
    tenured: z.unknown(),
    /** Set on anchors so they come back as fixed reference points. */
    anchor: z.unknown().optional(),
  })
  .passthrough();
export type PolicyMetadata = z.infer<typeof PolicyMetadataSchema>;

// ---------------------------------------------------------------------------
// Policy Record
// ---------------------------------------------------------------------------

export const PolicyNameSchema = z
  .string()
  .min(1)
  .max(200)
  // Names become snapshot file names
  .regex(/^[A-Za-z0-9._-]+$/, 'Policy names may only contain letters, digits, ".", "_" and "-"')
  .refine((name) => name !== '.' && name !== '..', 'Policy name cannot be a path segment');

export const PolicyRecordSchema = z.object({
  name: PolicyNameSchema,
  snapshotPath: z.string().min(1),
  architectureTag: z.string().min(1),
  mu: z.number().finite(),
  sigma: z.number().finite().nonnegative(),
  episodes: z.number().int().nonnegative(),
  metadata: PolicyMetadataSchema,
});
export type PolicyRecordInput = z.infer<typeof PolicyRecordSchema>;

/** A stored policy, with tenure resolved from its metadata. */
export interface PolicyRecord extends PolicyRecordInput {
  tenured: boolean;
}

export function toPolicyRecord(input: unknown): PolicyRecord {
  const parsed = PolicyRecordSchema.parse(input);
  return { ...parsed, tenured: coerceTenured(parsed.metadata.tenured) };
}
