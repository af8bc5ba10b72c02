/**
 * Validation utilities for the catalog API.
 *
 * These validators wrap zod schemas with additional logic for:
 * - Type-safe parsing with error handling
 * - Machine-readable messages for missing fields and bad emails
 */

import { z } from "zod";
import { BeatIdInputSchema, NewBeatSchema, type BeatId, type NewBeat } from "./beats.js";
import {
  INQUIRY_FIELDS,
  InquiryRequestSchema,
  isPlausibleEmail,
  type InquiryRequest,
} from "./inquiries.js";

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Narrow an unknown JSON value to a plain object */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  return typeof value === "string" && value.trim().length === 0;
}

/** Validate a beat id taken from a path segment */
export function parseBeatId(raw: unknown): ValidationResult<BeatId> {
  const result = BeatIdInputSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, error: "Invalid beat id" };
  }
  return { success: true, data: result.data };
}

/** Validate the body of an inquiry submission */
export function validateInquiryRequest(body: unknown): ValidationResult<InquiryRequest> {
  if (!isRecord(body)) {
    return { success: false, error: "Request body must be a JSON object" };
  }

  const missing = INQUIRY_FIELDS.filter((field) => isBlank(body[field]));
  if (missing.length > 0) {
    return {
      success: false,
      error: `Missing required fields: ${missing.join(", ")}`,
    };
  }

  const email = body.email;
  if (typeof email === "string" && !isPlausibleEmail(email)) {
    return { success: false, error: "Invalid email format" };
  }

  const result = InquiryRequestSchema.safeParse(body);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

/** Validate a manually curated beat */
export function validateNewBeat(input: unknown): ValidationResult<NewBeat> {
  const result = NewBeatSchema.safeParse(input);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.join(".");
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join("; ");
}
