// Per-call option bundles and their Zod schemas.
//
// Options are validated at the Operator boundary; anything that does not
// match fails with InvalidInput before a backend is touched.

import { z } from 'zod';

import { ErrorKind, storageError } from '../errors/index.js';

const SignalSchema = z.custom<AbortSignal>((value) => value instanceof AbortSignal, {
  message: 'signal must be an AbortSignal',
});

const ETagSchema = z.string().min(1);

/** Byte range with an exclusive end. Omit `end` to read to the end of the object. */
export const ByteRangeSchema = z.object({
  start: z.number().int().min(0),
  end: z.number().int().min(0).optional(),
});

export const ReadOptionsSchema = z
  .object({
    range: ByteRangeSchema.optional(),
    ifMatch: ETagSchema.optional(),
    ifNoneMatch: ETagSchema.optional(),
    ifModifiedSince: z.date().optional(),
    version: z.string().min(1).optional(),
    signal: SignalSchema.optional(),
  })
  .strict();

export const WriteOptionsSchema = z
  .object({
    append: z.boolean().optional(),
    contentType: z.string().min(1).optional(),
    cacheControl: z.string().min(1).optional(),
    contentDisposition: z.string().min(1).optional(),
    ifNotExists: z.boolean().optional(),
    userMetadata: z.record(z.string(), z.string()).optional(),
    /** Split the payload into backend writes of at most this many bytes */
    chunk: z.number().int().positive().optional(),
    signal: SignalSchema.optional(),
  })
  .strict();

export const StatOptionsSchema = z
  .object({
    ifMatch: ETagSchema.optional(),
    ifNoneMatch: ETagSchema.optional(),
    version: z.string().min(1).optional(),
    signal: SignalSchema.optional(),
  })
  .strict();

export const ListOptionsSchema = z
  .object({
    recursive: z.boolean().optional(),
    /** Page size hint passed to the backend */
    limit: z.number().int().positive().optional(),
    startAfter: z.string().min(1).optional(),
    signal: SignalSchema.optional(),
  })
  .strict();

export const DeleteOptionsSchema = z
  .object({
    version: z.string().min(1).optional(),
    signal: SignalSchema.optional(),
  })
  .strict();

export const PresignOptionsSchema = z
  .object({
    /** Lifetime of the presigned request in seconds (max 7 days) */
    expiresIn: z.number().int().min(1).max(604_800),
    signal: SignalSchema.optional(),
  })
  .strict();

export const OpenOptionsSchema = WriteOptionsSchema.extend({
  ifMatch: ETagSchema.optional(),
  ifNoneMatch: ETagSchema.optional(),
  version: z.string().min(1).optional(),
  /** Write buffer threshold in bytes (default 8 MiB) */
  bufferSize: z.number().int().positive().optional(),
}).strict();

export const CallOptionsSchema = z.object({ signal: SignalSchema.optional() }).strict();

export type ByteRange = z.infer<typeof ByteRangeSchema>;
export type ReadOptions = z.infer<typeof ReadOptionsSchema>;
export type WriteOptions = z.infer<typeof WriteOptionsSchema>;
export type StatOptions = z.infer<typeof StatOptionsSchema>;
export type ListOptions = z.infer<typeof ListOptionsSchema>;
export type DeleteOptions = z.infer<typeof DeleteOptionsSchema>;
export type PresignOptions = z.infer<typeof PresignOptionsSchema>;
export type OpenOptions = z.infer<typeof OpenOptionsSchema>;
export type CallOptions = z.infer<typeof CallOptionsSchema>;

export type OpenMode = 'r' | 'w';

/** Signed request a client can perform without credentials. */
export interface PresignedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
}

export type PresignOperation = 'read' | 'stat' | 'write';

/**
 * Validate an options bundle against its schema.
 * Returns the parsed (frozen) options or throws InvalidInput.
 */
export function parseOptions<T>(
  schema: z.ZodType<T>,
  value: unknown,
  operation: string
): Readonly<T> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `${e.path.map(String).join('.') || '(root)'}: ${e.message}`)
      .join(', ');
    throw storageError(ErrorKind.InvalidInput, `invalid ${operation} options: ${errors}`, {
      context: { operation },
    });
  }
  return Object.freeze(result.data);
}
