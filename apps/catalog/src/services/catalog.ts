/**
 * Catalog service - the entry point the transport layer calls.
 *
 * Request-level validation happens here so the store only ever sees
 * well-formed input.
 */

import {
  audioLocatorFor,
  parseBeatId,
  slugify,
  splitExtension,
  validateInquiryRequest,
  validateNewBeat,
  type BeatDto,
} from "@beat-catalog/shared";
import type { CatalogStore } from "../db/catalogStore.js";
import type { Beat } from "../db/types.js";
import { syncFolder, type SyncReport } from "./folderSync.js";

export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogValidationError";
  }
}

export class CatalogConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogConflictError";
  }
}

export interface CatalogServiceOptions {
  store: CatalogStore;
  /** Directory scanned for audio files */
  beatsFolder: string;
  /** Sync the folder before every listing */
  syncOnList: boolean;
}

/**
 * Map a stored beat to its wire shape. fileUrl is not percent-encoded;
 * the transport does that.
 */
export function toBeatDto(beat: Beat): BeatDto {
  return {
    id: beat.id,
    title: beat.title,
    slug: beat.slug,
    description: beat.description,
    genre: beat.genre,
    bpm: beat.bpm,
    duration: beat.duration,
    fileType: beat.fileType,
    fileName: beat.fileName,
    fileUrl: audioLocatorFor(beat.fileName),
  };
}

export class CatalogService {
  private readonly store: CatalogStore;
  private readonly beatsFolder: string;
  private readonly syncOnList: boolean;

  constructor(options: CatalogServiceOptions) {
    this.store = options.store;
    this.beatsFolder = options.beatsFolder;
    this.syncOnList = options.syncOnList;
  }

  /**
   * Scan the beats folder for files the catalog does not know yet.
   */
  async syncNow(): Promise<SyncReport> {
    return await syncFolder(this.store, this.beatsFolder);
  }

  /**
   * List all beats, newest first. Syncs the folder first unless
   * disabled in configuration.
   */
  async listBeats(): Promise<BeatDto[]> {
    if (this.syncOnList) {
      await this.syncNow();
    }
    const beats = await this.store.listBeats();
    return beats.map(toBeatDto);
  }

  /**
   * Get a beat by ID. Throws on a malformed id, returns null when
   * there is no such beat.
   */
  async getBeat(rawId: unknown): Promise<BeatDto | null> {
    const parsed = parseBeatId(rawId);
    if (!parsed.success) {
      throw new CatalogValidationError(parsed.error);
    }
    const beat = await this.store.getBeat(parsed.data);
    return beat ? toBeatDto(beat) : null;
  }

  /**
   * Validate and record an exclusive license inquiry.
   * Returns the new inquiry id.
   */
  async submitInquiry(body: unknown): Promise<number> {
    const validation = validateInquiryRequest(body);
    if (!validation.success) {
      throw new CatalogValidationError(validation.error);
    }

    const { beatId, name, email, offer } = validation.data;
    return await this.store.insertInquiry({ beatId, name, email, offer });
  }

  /**
   * Add a beat by hand. Slug and file type are derived when omitted.
   * A slug or file name that is already taken is a conflict; nothing
   * is overwritten.
   */
  async addBeat(input: unknown): Promise<BeatDto> {
    const validation = validateNewBeat(input);
    if (!validation.success) {
      throw new CatalogValidationError(validation.error);
    }

    const data = validation.data;
    const fileType = (data.fileType ?? splitExtension(data.fileName).ext).toLowerCase();
    if (!fileType) {
      throw new CatalogValidationError("fileType: could not be derived from fileName");
    }

    const result = await this.store.insertBeat({
      title: data.title,
      slug: data.slug ?? slugify(data.title),
      description: data.description ?? null,
      genre: data.genre ?? null,
      bpm: data.bpm ?? null,
      duration: data.duration ?? null,
      fileName: data.fileName,
      fileType,
    });

    if (!result.ok) {
      const what = result.field ?? "slug or fileName";
      throw new CatalogConflictError(`A beat with this ${what} already exists`);
    }

    const beat = await this.store.getBeat(result.id);
    if (!beat) {
      throw new Error(`Beat ${result.id} missing right after insert`);
    }
    return toBeatDto(beat);
  }

  /**
   * Get total beat count.
   */
  async countBeats(): Promise<number> {
    return await this.store.countBeats();
  }
}
