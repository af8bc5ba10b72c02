/**
 * Folder synchronizer - reconciles the catalog with an audio directory.
 *
 * Sync only ever adds beats. Files removed from disk keep their rows,
 * and titles are never rewritten once a beat is known. No audio is
 * parsed: bpm and duration stay null until curated by hand.
 */

import { readdir, stat } from "fs/promises";
import { join } from "path";
import { isAudioExtension, slugify, splitExtension } from "@beat-catalog/shared";
import type { CatalogStore } from "../db/catalogStore.js";
import type { CreateBeatInput } from "../db/types.js";

/** The part of the store the synchronizer writes through */
export type SyncTarget = Pick<CatalogStore, "findBeatByFileName" | "insertBeat">;

export interface SyncFailure {
  fileName: string;
  reason: "conflict" | "error";
  error: string;
}

export type SyncReport =
  | {
      status: "ok";
      directory: string;
      /** Audio files found in the directory */
      considered: number;
      /** File names catalogued by this run */
      inserted: string[];
      /** Files already in the catalog */
      skipped: number;
      failures: SyncFailure[];
    }
  | {
      status: "unavailable";
      directory: string;
      reason: string;
    };

/**
 * Check if a file name has a recognized audio extension (any case).
 */
export function isAudioFile(fileName: string): boolean {
  return isAudioExtension(splitExtension(fileName).ext.toLowerCase());
}

/**
 * Derive catalog fields from a file name.
 */
export function deriveBeatFields(fileName: string): CreateBeatInput {
  const { base, ext } = splitExtension(fileName);
  return {
    title: base,
    slug: slugify(base),
    description: null,
    genre: null,
    bpm: null,
    duration: null,
    fileName,
    fileType: ext.toLowerCase(),
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a symbolic link resolves to a regular file. A broken link
 * is logged and left out.
 */
async function linksToFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    console.warn(`[sync] Skipping broken link ${path}: ${describeError(error)}`);
    return false;
  }
}

/**
 * List audio file names in a directory, non-recursively, sorted so
 * that runs are deterministic. Symbolic links count only when their
 * target is a regular file.
 */
async function listAudioFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (!isAudioFile(entry.name)) continue;
    if (entry.isFile()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink() && (await linksToFile(join(directory, entry.name)))) {
      names.push(entry.name);
    }
  }
  return names.sort();
}

/**
 * Catalog every audio file in the directory that the store does not
 * know yet. A missing or unreadable directory leaves the store
 * untouched. One failing file never stops the rest of the scan.
 */
export async function syncFolder(store: SyncTarget, directory: string): Promise<SyncReport> {
  let files: string[];
  try {
    files = await listAudioFiles(directory);
  } catch (error) {
    const reason = describeError(error);
    console.log(`[sync] Beats folder unavailable: ${directory} (${reason})`);
    return { status: "unavailable", directory, reason };
  }

  const inserted: string[] = [];
  const failures: SyncFailure[] = [];
  let skipped = 0;

  for (const fileName of files) {
    try {
      if (await store.findBeatByFileName(fileName)) {
        skipped++;
        continue;
      }

      const result = await store.insertBeat(deriveBeatFields(fileName));
      if (result.ok) {
        inserted.push(fileName);
        console.log(`[sync] Catalogued ${fileName} as beatId=${result.id}`);
      } else {
        console.warn(`[sync] Skipping ${fileName}: ${result.error}`);
        failures.push({ fileName, reason: "conflict", error: result.error });
      }
    } catch (error) {
      console.error(`[sync] Failed to catalog ${fileName}:`, error);
      failures.push({ fileName, reason: "error", error: describeError(error) });
    }
  }

  console.log(
    `[sync] Synced ${files.length} beats from folder (new=${inserted.length}, failed=${failures.length})`
  );

  return {
    status: "ok",
    directory,
    considered: files.length,
    inserted,
    skipped,
    failures,
  };
}
