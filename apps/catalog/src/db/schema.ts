import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { InquiryStatusSchema } from "@beat-catalog/shared";

export const beats = sqliteTable("beats", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  title: text("title").notNull(),
  slug: text("slug").notNull().unique(),
  description: text("description"),
  genre: text("genre"),
  bpm: integer("bpm"),
  duration: integer("duration"),
  fileName: text("file_name").notNull().unique(),
  fileType: text("file_type").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

// beat_id is a soft reference: declared, but foreign key enforcement stays off
export const exclusiveInquiries = sqliteTable("exclusive_inquiries", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  beatId: integer("beat_id")
    .notNull()
    .references(() => beats.id),
  name: text("name").notNull(),
  email: text("email").notNull(),
  offer: text("offer").notNull(),
  status: text("status", { enum: InquiryStatusSchema.options }).notNull().default("new"),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

/**
 * DDL applied by CatalogStore.initialize(). Kept beside the table
 * definitions so the two stay in step.
 */
export const schemaStatements = [
  `
CREATE TABLE IF NOT EXISTS beats (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  slug TEXT UNIQUE NOT NULL,
  description TEXT,
  genre TEXT,
  bpm INTEGER,
  duration INTEGER,
  file_name TEXT UNIQUE NOT NULL,
  file_type TEXT NOT NULL,
  created_at INTEGER NOT NULL
);
  `,
  `
CREATE TABLE IF NOT EXISTS exclusive_inquiries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  beat_id INTEGER NOT NULL REFERENCES beats(id),
  name TEXT NOT NULL,
  email TEXT NOT NULL,
  offer TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'new',
  created_at INTEGER NOT NULL
);
  `,
  `CREATE INDEX IF NOT EXISTS beats_created_at_idx ON beats (created_at);`,
  `CREATE INDEX IF NOT EXISTS exclusive_inquiries_beat_id_idx ON exclusive_inquiries (beat_id);`,
];
