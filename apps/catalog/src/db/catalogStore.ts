/**
 * Catalog database store.
 *
 * SQLite through better-sqlite3, queried with drizzle. One store is
 * constructed at process start and handed to every consumer; each
 * operation is a single statement, committed before it returns.
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, count, desc, eq, type SQL } from "drizzle-orm";
import type { InquiryStatus } from "@beat-catalog/shared";
import { beats, exclusiveInquiries, schemaStatements } from "./schema.js";
import type {
  Beat,
  BeatUniqueField,
  CreateBeatInput,
  CreateInquiryInput,
  InsertBeatResult,
  Inquiry,
} from "./types.js";

const tables = { beats, exclusiveInquiries };

type Db = BetterSQLite3Database<typeof tables>;
type BeatRow = typeof beats.$inferSelect;
type InquiryRow = typeof exclusiveInquiries.$inferSelect;

export interface CatalogStoreOptions {
  /** SQLite file path, or ":memory:" */
  path: string;
  /** Clock used for createdAt (injectable for tests) */
  now?: () => Date;
}

/** Find the SQLite error in an error's cause chain, if there is one */
function findSqliteError(error: unknown): { code: string; message: string } | null {
  let current: unknown = error;
  while (current instanceof Error) {
    if ("code" in current && typeof current.code === "string" && current.code.startsWith("SQLITE_")) {
      return { code: current.code, message: current.message };
    }
    current = current.cause;
  }
  return null;
}

function uniqueFieldFromMessage(message: string): BeatUniqueField | null {
  if (message.includes("beats.slug")) return "slug";
  if (message.includes("beats.file_name")) return "fileName";
  return null;
}

function toBeat(row: BeatRow): Beat {
  return {
    id: row.id,
    title: row.title,
    slug: row.slug,
    description: row.description,
    genre: row.genre,
    bpm: row.bpm,
    duration: row.duration,
    fileName: row.fileName,
    fileType: row.fileType,
    createdAt: row.createdAt,
  };
}

function toInquiry(row: InquiryRow): Inquiry {
  return {
    id: row.id,
    beatId: row.beatId,
    name: row.name,
    email: row.email,
    offer: row.offer,
    status: row.status,
    createdAt: row.createdAt,
  };
}

export class CatalogStore {
  private readonly sqlite: Database.Database;
  private readonly db: Db;
  private readonly now: () => Date;

  constructor(options: CatalogStoreOptions) {
    this.sqlite = new Database(options.path);
    this.sqlite.pragma("journal_mode = WAL");
    this.sqlite.pragma("busy_timeout = 5000");
    // Inquiry.beatId is a soft reference
    this.sqlite.pragma("foreign_keys = OFF");
    this.db = drizzle(this.sqlite, { schema: tables });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create tables and indexes if they do not exist yet.
   * Safe to call on every start; existing rows are left alone.
   */
  initialize(): void {
    const apply = this.sqlite.transaction(() => {
      for (const statement of schemaStatements) {
        this.sqlite.exec(statement);
      }
    });
    apply();
  }

  /**
   * All beats, most recently catalogued first.
   */
  async listBeats(): Promise<Beat[]> {
    const rows = this.db
      .select()
      .from(beats)
      .orderBy(desc(beats.createdAt), desc(beats.id))
      .all();
    return rows.map(toBeat);
  }

  /**
   * Find a beat by ID.
   */
  async getBeat(id: number): Promise<Beat | null> {
    const row = this.db.select().from(beats).where(eq(beats.id, id)).get();
    return row ? toBeat(row) : null;
  }

  /**
   * Insert a beat. A duplicate slug or file name is reported as a
   * conflict; anything else is thrown.
   */
  async insertBeat(input: CreateBeatInput): Promise<InsertBeatResult> {
    try {
      const row = this.db
        .insert(beats)
        .values({
          title: input.title,
          slug: input.slug,
          description: input.description,
          genre: input.genre,
          bpm: input.bpm,
          duration: input.duration,
          fileName: input.fileName,
          fileType: input.fileType,
          createdAt: this.now(),
        })
        .returning({ id: beats.id })
        .get();
      return { ok: true, id: row.id };
    } catch (error) {
      const sqliteError = findSqliteError(error);
      if (sqliteError && sqliteError.code.startsWith("SQLITE_CONSTRAINT")) {
        return {
          ok: false,
          code: "CONFLICT",
          field: uniqueFieldFromMessage(sqliteError.message),
          error: sqliteError.message,
        };
      }
      throw error;
    }
  }

  /**
   * Check whether a beat with exactly this file name exists.
   * Comparison is case-sensitive.
   */
  async findBeatByFileName(fileName: string): Promise<boolean> {
    const row = this.db
      .select({ id: beats.id })
      .from(beats)
      .where(eq(beats.fileName, fileName))
      .get();
    return row !== undefined;
  }

  /**
   * Get total beat count.
   */
  async countBeats(): Promise<number> {
    const row = this.db.select({ value: count() }).from(beats).get();
    return row?.value ?? 0;
  }

  /**
   * Record an inquiry with status "new". The beat is not looked up.
   */
  async insertInquiry(input: CreateInquiryInput): Promise<number> {
    const row = this.db
      .insert(exclusiveInquiries)
      .values({
        beatId: input.beatId,
        name: input.name,
        email: input.email,
        offer: input.offer,
        status: "new",
        createdAt: this.now(),
      })
      .returning({ id: exclusiveInquiries.id })
      .get();
    return row.id;
  }

  async getInquiry(id: number): Promise<Inquiry | null> {
    const row = this.db
      .select()
      .from(exclusiveInquiries)
      .where(eq(exclusiveInquiries.id, id))
      .get();
    return row ? toInquiry(row) : null;
  }

  /**
   * Inquiries, newest first, optionally narrowed to one beat.
   */
  async listInquiries(filter: { beatId?: number; status?: InquiryStatus } = {}): Promise<Inquiry[]> {
    const conditions: SQL[] = [];
    if (filter.beatId !== undefined) {
      conditions.push(eq(exclusiveInquiries.beatId, filter.beatId));
    }
    if (filter.status !== undefined) {
      conditions.push(eq(exclusiveInquiries.status, filter.status));
    }

    const rows = this.db
      .select()
      .from(exclusiveInquiries)
      .where(and(...conditions))
      .orderBy(desc(exclusiveInquiries.createdAt), desc(exclusiveInquiries.id))
      .all();
    return rows.map(toInquiry);
  }

  /**
   * Move an inquiry to another status. Returns false if no such inquiry.
   */
  async updateInquiryStatus(id: number, status: InquiryStatus): Promise<boolean> {
    const result = this.db
      .update(exclusiveInquiries)
      .set({ status })
      .where(eq(exclusiveInquiries.id, id))
      .run();
    return result.changes > 0;
  }

  /**
   * Release the SQLite handle.
   */
  close(): void {
    this.sqlite.close();
  }
}
