/**
 * Database types for the beat catalog.
 */

import type { InquiryStatus } from "@beat-catalog/shared";

export interface Beat {
  id: number;
  title: string;
  slug: string;
  description: string | null;
  genre: string | null;
  bpm: number | null;
  duration: number | null;
  fileName: string;  // Exact on-disk name, natural key for sync
  fileType: string;  // Lower-cased extension without the dot
  createdAt: Date;
}

export interface CreateBeatInput {
  title: string;
  slug: string;
  description: string | null;
  genre: string | null;
  bpm: number | null;
  duration: number | null;
  fileName: string;
  fileType: string;
}

/** Column that rejected an insert because of a uniqueness violation */
export type BeatUniqueField = "slug" | "fileName";

export type InsertBeatResult =
  | { ok: true; id: number }
  | { ok: false; code: "CONFLICT"; field: BeatUniqueField | null; error: string };

/**
 * Exclusive license inquiry. beatId is not checked against the
 * beats table when the inquiry is written.
 */
export interface Inquiry {
  id: number;
  beatId: number;
  name: string;
  email: string;
  offer: string;
  status: InquiryStatus;
  createdAt: Date;
}

export interface CreateInquiryInput {
  beatId: number;
  name: string;
  email: string;
  offer: string;
}
