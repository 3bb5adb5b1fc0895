import { z } from 'zod';
import { EVENT_SOURCES, EVENT_TYPES, MAX_METADATA_LENGTH, canonicalJson } from '../domain/index.js';

/**
 * Zod schema for the body of `POST /webhook/ingest`.
 *
 * - `source` / `event_type` must belong to the fixed enumerations.
 * - `metadata` is an open object, bounded by the length of its
 *   canonical serialization. Absent or null means `{}`.
 * - `timestamp` is accepted for producer bookkeeping only, with or
 *   without an offset; the store assigns `created_at` itself.
 */
export const ingestPayloadSchema = z.object({
  source: z.enum(EVENT_SOURCES, {
    errorMap: () => ({ message: `source must be one of: ${EVENT_SOURCES.join(', ')}` }),
  }),
  event_type: z.enum(EVENT_TYPES, {
    errorMap: () => ({ message: `Unknown event type. Allowed types: ${EVENT_TYPES.join(', ')}` }),
  }),
  metadata: z
    .record(z.string(), z.unknown())
    .nullish()
    .transform((metadata): Record<string, unknown> => metadata ?? {})
    .refine(
      (metadata) => canonicalJson(metadata).length <= MAX_METADATA_LENGTH,
      { message: `Metadata too large (max ${MAX_METADATA_LENGTH} characters)` },
    ),
  timestamp: z.string().datetime({ offset: true, local: true, message: 'Must be a valid ISO-8601 datetime' }).optional(),
});

/** Inferred type of a validated ingest payload. */
export type IngestPayload = z.infer<typeof ingestPayloadSchema>;
