/**
 * @beat-catalog/shared
 *
 * Shared types, schemas, and utilities for the beat catalog.
 * This package is the single source of truth for the HTTP API contract.
 */

// ============================================================================
// Version
// ============================================================================

export const VERSION = "0.1.0";

// ============================================================================
// Audio Exports
// ============================================================================

export {
  AUDIO_EXTENSIONS,
  AUDIO_MIME_TYPES,
  DEFAULT_AUDIO_MIME_TYPE,
  isAudioExtension,
  splitExtension,
  audioMimeTypeFor,
  type AudioExtension,
} from "./audio.js";

// ============================================================================
// Beat Exports
// ============================================================================

export {
  BeatIdSchema,
  BeatIdInputSchema,
  BeatDtoSchema,
  NewBeatSchema,
  AUDIO_ROUTE_PREFIX,
  slugify,
  audioLocatorFor,
  type BeatId,
  type BeatDto,
  type NewBeat,
} from "./beats.js";

// ============================================================================
// Inquiry Exports
// ============================================================================

export {
  InquiryStatusSchema,
  InquiryRequestSchema,
  InquiryResponseSchema,
  ErrorResponseSchema,
  INQUIRY_FIELDS,
  isPlausibleEmail,
  type InquiryStatus,
  type InquiryRequest,
  type InquiryResponse,
  type ErrorResponse,
} from "./inquiries.js";

// ============================================================================
// Validator Exports
// ============================================================================

export {
  isRecord,
  parseBeatId,
  validateInquiryRequest,
  validateNewBeat,
  type ValidationResult,
} from "./validators.js";
