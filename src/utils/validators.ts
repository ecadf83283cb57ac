/**
 * utils/validators.ts — Response schemas and input validation.
 *
 * Every repository response is validated here, at the system boundary,
 * before any service reads a field from it. A response that does not match
 * its schema becomes a ProtocolError carrying the decoded body, rather than a
 * property access on undefined somewhere in the upload loop.
 *
 * The input guards are type guards where possible, so a successful check
 * narrows the type in subsequent code:
 *   if (isFullRecordPayload(metadata)) { // metadata is FullRecordPayload }
 */
import { z } from 'zod';
import type { FullRecordPayload } from '../shared';
import { LIMITS } from '../shared';
import { ProtocolError, ValidationError } from './errors';

// ─── Repository Responses ────────────────────────────────────────

/** POST /api/records */
export const draftResponseSchema = z
  .object({
    id: z.string().min(1),
    links: z.object({ self_html: z.string().min(1) }).passthrough(),
  })
  .passthrough();

const partLinkSchema = z.object({
  part: z.number().int().positive(),
  url: z.string().min(1),
});

export const fileEntrySchema = z
  .object({
    key: z.string().min(1),
    size: z.number().int().nonnegative(),
    transfer: z
      .object({
        parts: z.number().int().nonnegative(),
        part_size: z.number().int().positive(),
      })
      .passthrough(),
    links: z.object({ parts: z.array(partLinkSchema) }).passthrough(),
  })
  .passthrough();

export type FileEntry = z.infer<typeof fileEntrySchema>;

/** POST /api/records/{id}/draft/files */
export const fileInitResponseSchema = z
  .object({
    entries: z.array(fileEntrySchema),
  })
  .passthrough();

/**
 * Validates a decoded response body against its schema.
 * @param context — What the response was for, used in the error message
 * @throws ProtocolError with the decoded body when the shape does not match
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context: string,
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProtocolError(`Unexpected or invalid ${context} response (${issues})`, describe(data));
  }
  return result.data;
}

function describe(data: unknown): string {
  if (typeof data === 'string') return data;
  const json = JSON.stringify(data);
  return json === undefined ? String(data) : json;
}

// ─── Inputs ──────────────────────────────────────────────────────

/** Flat metadata file: the simplified fields, nothing else required */
export const simpleMetadataSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  subjects: z.array(z.object({ subject: z.string() }).passthrough()).optional(),
  resource_type: z.string().optional(),
  rights: z.array(z.unknown()).optional(),
  creators: z.array(z.unknown()).optional(),
  publication_date: z.union([z.string(), z.number(), z.null()]).optional(),
});

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A complete record payload has both a metadata and an access section */
export function isFullRecordPayload(value: unknown): value is FullRecordPayload {
  return isPlainObject(value) && isPlainObject(value.metadata) && isPlainObject(value.access);
}

/** Record title: non-empty after trimming */
export function validateTitle(title: unknown): title is string {
  return typeof title === 'string' && title.trim().length > 0;
}

/**
 * Parses a positive integer from a CLI option or environment variable.
 * Returns the fallback when the value is absent or blank.
 */
export function parsePositiveInteger(
  value: string | undefined,
  name: string,
  fallback: number,
): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parses a part size given in MiB and returns it in bytes.
 * Returns `fallback` (bytes) when the value is absent or blank.
 */
export function parsePartSizeMiB(value: string | undefined, name: string, fallback: number): number {
  const mib = parsePositiveInteger(value, name, 0);
  if (mib === 0) return fallback;
  if (mib > LIMITS.MAX_PART_SIZE_MIB) {
    throw new ValidationError(
      `${name} must be at most ${LIMITS.MAX_PART_SIZE_MIB} MiB, got "${value}"`,
    );
  }
  return mib * LIMITS.MIB;
}
