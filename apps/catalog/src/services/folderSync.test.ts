/**
 * Tests for the folder synchronizer.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { CatalogStore } from "../db/catalogStore.js";
import { deriveBeatFields, isAudioFile, syncFolder, type SyncTarget } from "./folderSync.js";

describe("isAudioFile", () => {
  it("matches recognized extensions in any case", () => {
    expect(isAudioFile("a.mp3")).toBe(true);
    expect(isAudioFile("a.MP3")).toBe(true);
    expect(isAudioFile("a.Flac")).toBe(true);
    expect(isAudioFile("a.ogg")).toBe(true);
  });

  it("ignores other files", () => {
    expect(isAudioFile("notes.txt")).toBe(false);
    expect(isAudioFile("mp3")).toBe(false);
    expect(isAudioFile("cover.mp3.jpg")).toBe(false);
  });
});

describe("deriveBeatFields", () => {
  it("derives title, slug, and file type from the file name", () => {
    expect(deriveBeatFields("Dark Night_Vibes.WAV")).toEqual({
      title: "Dark Night_Vibes",
      slug: "dark-night-vibes",
      description: null,
      genre: null,
      bpm: null,
      duration: null,
      fileName: "Dark Night_Vibes.WAV",
      fileType: "wav",
    });
  });

  it("only strips the last extension", () => {
    const fields = deriveBeatFields("beat.v2.mp3");
    expect(fields.title).toBe("beat.v2");
    expect(fields.slug).toBe("beat.v2");
  });
});

describe("syncFolder", () => {
  let dir: string;
  let store: CatalogStore;

  function touch(name: string): void {
    writeFileSync(join(dir, name), "fake audio");
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), "beats-"));
    store = new CatalogStore({ path: ":memory:" });
    store.initialize();
  });

  afterEach(() => {
    store.close();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("catalogues new audio files", async () => {
    touch("Alpha.mp3");
    touch("Beta.wav");

    const report = await syncFolder(store, dir);

    expect(report).toEqual({
      status: "ok",
      directory: dir,
      considered: 2,
      inserted: ["Alpha.mp3", "Beta.wav"],
      skipped: 0,
      failures: [],
    });
    const beats = await store.listBeats();
    expect(beats.map((b) => b.fileName).sort()).toEqual(["Alpha.mp3", "Beta.wav"]);
  });

  it("follows links to files and leaves out links to directories", async () => {
    touch("Alpha.mp3");
    mkdirSync(join(dir, "realdir"));
    symlinkSync(join(dir, "realdir"), join(dir, "linkdir.mp3"));
    symlinkSync(join(dir, "Alpha.mp3"), join(dir, "Alias.mp3"));
    symlinkSync(join(dir, "gone.wav"), join(dir, "Broken.wav"));

    const report = await syncFolder(store, dir);

    expect(report).toEqual({
      status: "ok",
      directory: dir,
      considered: 2,
      inserted: ["Alias.mp3", "Alpha.mp3"],
      skipped: 0,
      failures: [],
    });
    expect(await store.findBeatByFileName("linkdir.mp3")).toBe(false);
  });

  it("is idempotent over an unchanged directory", async () => {
    touch("Alpha.mp3");
    touch("Beta.wav");

    await syncFolder(store, dir);
    const second = await syncFolder(store, dir);

    expect(second.status).toBe("ok");
    if (second.status !== "ok") return;
    expect(second.inserted).toEqual([]);
    expect(second.skipped).toBe(2);
    expect(await store.countBeats()).toBe(2);
  });

  it("never catalogues non-audio files", async () => {
    touch("notes.txt");
    touch("track.MP3");

    await syncFolder(store, dir);

    const beats = await store.listBeats();
    expect(beats).toHaveLength(1);
    expect(beats[0]?.fileName).toBe("track.MP3");
    expect(beats[0]?.fileType).toBe("mp3");
    expect(beats[0]?.title).toBe("track");
  });

  it("does not descend into subdirectories", async () => {
    mkdirSync(join(dir, "nested"));
    writeFileSync(join(dir, "nested", "deep.mp3"), "fake audio");
    touch("top.mp3");

    await syncFolder(store, dir);

    const beats = await store.listBeats();
    expect(beats.map((b) => b.fileName)).toEqual(["top.mp3"]);
  });

  it("reports a slug collision and keeps scanning", async () => {
    touch("My Beat.mp3");
    touch("My_Beat.wav");
    touch("Other.ogg");

    const report = await syncFolder(store, dir);

    expect(report.status).toBe("ok");
    if (report.status !== "ok") return;
    // Sorted order: "My Beat.mp3" < "My_Beat.wav" < "Other.ogg"
    expect(report.inserted).toEqual(["My Beat.mp3", "Other.ogg"]);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]?.fileName).toBe("My_Beat.wav");
    expect(report.failures[0]?.reason).toBe("conflict");
    expect(await store.countBeats()).toBe(2);
  });

  it("keeps rows for files removed from disk", async () => {
    touch("Gone.mp3");
    await syncFolder(store, dir);
    rmSync(join(dir, "Gone.mp3"));

    await syncFolder(store, dir);

    expect(await store.findBeatByFileName("Gone.mp3")).toBe(true);
  });

  it("leaves the store untouched when the folder is missing", async () => {
    const missing = join(dir, "does-not-exist");

    const report = await syncFolder(store, missing);

    expect(report.status).toBe("unavailable");
    expect(report.directory).toBe(missing);
    expect(await store.countBeats()).toBe(0);
  });

  it("continues past a file whose insert throws", async () => {
    touch("a.mp3");
    touch("b.mp3");
    const target: SyncTarget = {
      findBeatByFileName: async () => false,
      insertBeat: async (input) => {
        if (input.fileName === "a.mp3") {
          throw new Error("disk full");
        }
        return { ok: true, id: 1 };
      },
    };

    const report = await syncFolder(target, dir);

    expect(report).toEqual({
      status: "ok",
      directory: dir,
      considered: 2,
      inserted: ["b.mp3"],
      skipped: 0,
      failures: [{ fileName: "a.mp3", reason: "error", error: "disk full" }],
    });
  });
});
