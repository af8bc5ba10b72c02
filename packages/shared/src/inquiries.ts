/**
 * Exclusive license inquiry schemas.
 */

import { z } from "zod";
import { BeatIdInputSchema } from "./beats.js";

/** Lifecycle of an inquiry; new ones always start as "new" */
export const InquiryStatusSchema = z.enum([
  "new",
  "reviewed",
  "accepted",
  "declined",
  "closed",
]);
export type InquiryStatus = z.infer<typeof InquiryStatusSchema>;

/** Fields a caller must supply for POST /api/inquiry */
export const INQUIRY_FIELDS = ["beatId", "name", "email", "offer"] as const;

/**
 * Syntactic email check: an "@" and a "." somewhere in the string.
 * Deliberately weak; it is not an RFC 5322 validator.
 */
export function isPlausibleEmail(email: string): boolean {
  return email.includes("@") && email.includes(".");
}

const RequiredTextSchema = z
  .string()
  .refine((value) => value.trim().length > 0, "Must not be empty");

/** Body of POST /api/inquiry */
export const InquiryRequestSchema = z.object({
  beatId: BeatIdInputSchema,
  name: RequiredTextSchema,
  email: RequiredTextSchema.refine(isPlausibleEmail, "Invalid email format"),
  offer: RequiredTextSchema,
});
export type InquiryRequest = z.infer<typeof InquiryRequestSchema>;

/** Success body of POST /api/inquiry */
export const InquiryResponseSchema = z.object({
  success: z.literal(true),
  inquiryId: z.number().int().positive(),
  message: z.string(),
});
export type InquiryResponse = z.infer<typeof InquiryResponseSchema>;

/** Error body shared by every failing API response */
export const ErrorResponseSchema = z.object({
  error: z.string(),
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
