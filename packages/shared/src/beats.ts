/**
 * Beat schemas for the catalog API.
 * These describe what crosses the wire; the server keeps its own row types.
 */

import { z } from "zod";

// ============================================================================
// Primitives
// ============================================================================

/** Store-assigned beat identity */
export const BeatIdSchema = z
  .number()
  .int()
  .positive()
  .refine(Number.isSafeInteger, "Beat id is out of range");
export type BeatId = z.infer<typeof BeatIdSchema>;

/**
 * Beat id as it arrives from a path segment or a JSON body:
 * either a positive integer or a string of digits.
 */
export const BeatIdInputSchema = z
  .union([
    BeatIdSchema,
    z
      .string()
      .trim()
      .regex(/^\d+$/, "Expected a positive integer")
      .transform((value) => Number(value)),
  ])
  .pipe(BeatIdSchema);

// ============================================================================
// Beat DTO
// ============================================================================

/** A catalogued beat as returned by GET /api/beats */
export const BeatDtoSchema = z.object({
  id: BeatIdSchema,
  title: z.string(),
  slug: z.string(),
  description: z.string().nullable(),
  genre: z.string().nullable(),
  /** Tempo, curated by hand; never guessed from the audio */
  bpm: z.number().int().nullable(),
  /** Length in seconds, curated by hand */
  duration: z.number().int().nullable(),
  fileType: z.string(),
  fileName: z.string(),
  /** Locator for the audio bytes, e.g. "/api/audio/track.mp3" */
  fileUrl: z.string(),
});
export type BeatDto = z.infer<typeof BeatDtoSchema>;

// ============================================================================
// Manual curation
// ============================================================================

/** Input for adding a beat explicitly instead of through folder sync */
export const NewBeatSchema = z.object({
  title: z.string().min(1),
  /** Derived from the title when omitted */
  slug: z.string().min(1).optional(),
  description: z.string().nullable().optional(),
  genre: z.string().nullable().optional(),
  bpm: z.number().int().positive().nullable().optional(),
  duration: z.number().int().positive().nullable().optional(),
  fileName: z.string().min(1),
  /** Derived from the file name when omitted */
  fileType: z.string().min(1).optional(),
});
export type NewBeat = z.infer<typeof NewBeatSchema>;

/**
 * Build a slug from a title: lower-case, then each space and each
 * underscore becomes a hyphen. Nothing else is touched, so runs of
 * separators produce runs of hyphens.
 */
export function slugify(title: string): string {
  return title.toLowerCase().replaceAll(" ", "-").replaceAll("_", "-");
}

/** Path under which the transport serves a beat's audio */
export const AUDIO_ROUTE_PREFIX = "/api/audio/";

/** Build the audio locator for a file name (not percent-encoded) */
export function audioLocatorFor(fileName: string): string {
  return `${AUDIO_ROUTE_PREFIX}${fileName}`;
}
