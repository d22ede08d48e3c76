import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readdir, readFile, writeFile, mkdir } from "fs/promises";
import { join } from "path";
import {
  InvalidNoteError,
  NoteDeserializationError,
  PermissionDeniedError,
  StorageIOError,
  StorageUnavailableError,
} from "../errors.js";
import { noteLabel } from "../notes/format.js";
import { serializeNote } from "../notes/note.js";
import { sortNotes } from "../notes/store.js";
import { Note } from "../notes/types.js";
import { NoteFileSystem, nodeFileSystem } from "../storage/filesystem.js";
import { FakePlatform, RecordingFileSystem, makeStore, makeTempDir, memoryLogger, removeTempDir } from "./helpers.js";

function note(id: string, date: string, overrides: Partial<Note> = {}): Note {
  return { id, title: `Note ${id}`, content: `body ${id}`, date, color: 0, ...overrides };
}

describe("NoteStore", () => {
  let root: string;
  let notesDir: string;
  let platform: FakePlatform;

  beforeEach(async () => {
    root = await makeTempDir();
    notesDir = join(root, "Notes");
    platform = new FakePlatform({ root });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe("resolveDirectory", () => {
    it("creates Notes under the storage root, including missing parents", async () => {
      platform.root = join(root, "deep", "nested");
      const store = makeStore(platform);

      const dir = await store.resolveDirectory();

      expect(dir).toBe(join(root, "deep", "nested", "Notes"));
      expect(await readdir(dir)).toEqual([]);
    });

    it("is idempotent", async () => {
      const fs = new RecordingFileSystem();
      const store = makeStore(platform, { fs });

      const first = await store.resolveDirectory();
      const second = await store.resolveDirectory();

      expect(second).toBe(first);
      expect(fs.calls).toEqual([`stat ${notesDir}`, `mkdir ${notesDir}`, `stat ${notesDir}`]);
    });

    it("fails with StorageUnavailableError when there is no storage root", async () => {
      platform.root = null;
      const fs = new RecordingFileSystem();
      const store = makeStore(platform, { fs });

      await expect(store.resolveDirectory()).rejects.toBeInstanceOf(StorageUnavailableError);
      await expect(store.list()).rejects.toThrow("External storage directory not available");
      expect(fs.calls).toEqual([]);
    });

    it("reports a storage root lookup failure as StorageUnavailableError", async () => {
      class FailingPlatform extends FakePlatform {
        async storageRoot(): Promise<string | null> {
          throw new Error("EACCES: permission denied");
        }
      }
      const fs = new RecordingFileSystem();
      const store = makeStore(new FailingPlatform(), { fs });

      await expect(store.list()).rejects.toBeInstanceOf(StorageUnavailableError);
      await expect(store.list()).rejects.toThrow("Cannot resolve storage root: EACCES: permission denied");
      expect(fs.calls).toEqual([]);
    });

    it("fails when Notes exists as a file", async () => {
      await writeFile(notesDir, "not a directory");
      const store = makeStore(platform);

      await expect(store.resolveDirectory()).rejects.toThrow(`${notesDir} exists and is not a directory`);
    });
  });

  describe("save", () => {
    it("writes <id>.json holding the five fields", async () => {
      const store = makeStore(platform);
      const n = note("1", "2024-01-01T00:00:00Z", { title: "A", content: "x" });

      await store.save(n);

      const raw = await readFile(join(notesDir, "1.json"), "utf-8");
      expect(JSON.parse(raw)).toEqual({
        id: "1",
        title: "A",
        content: "x",
        date: "2024-01-01T00:00:00Z",
        color: 0,
      });
    });

    it("overwrites an existing note with the same id", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await store.save(note("1", "2024-03-01T00:00:00Z", { title: "Renamed" }));

      const notes = await store.list();
      expect(notes).toHaveLength(1);
      expect(notes[0].title).toBe("Renamed");
      expect(notes[0].date).toBe("2024-03-01T00:00:00Z");
    });

    it("saving the same note twice leaves the same state as saving it once", async () => {
      const store = makeStore(platform);
      const n = note("7", "2024-01-01T00:00:00Z");

      await store.save(n);
      const once = { files: (await readdir(notesDir)).sort(), notes: await store.list() };
      await store.save(n);
      const twice = { files: (await readdir(notesDir)).sort(), notes: await store.list() };

      expect(twice).toEqual(once);
      expect(once.files).toEqual(["7.json"]);
    });

    it("writes through a temp file and renames it into place", async () => {
      const fs = new RecordingFileSystem();
      const store = makeStore(platform, { fs });

      await store.save(note("1", "2024-01-01T00:00:00Z"));

      const tempPath = join(notesDir, ".1.json.tmp");
      expect(fs.calls.slice(-2)).toEqual([
        `writeFile ${tempPath}`,
        `rename ${tempPath} ${join(notesDir, "1.json")}`,
      ]);
      expect(await readdir(notesDir)).toEqual(["1.json"]);
    });

    it("wraps write failures in StorageIOError and removes the temp file", async () => {
      const failing: NoteFileSystem = {
        ...nodeFileSystem,
        rename: async () => {
          throw new Error("disk full");
        },
      };
      const store = makeStore(platform, { fs: failing });

      const error = await store.save(note("1", "2024-01-01T00:00:00Z")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageIOError);
      expect(error).toHaveProperty("message", `Failed to write ${join(notesDir, "1.json")}: disk full`);
      expect(await readdir(notesDir)).toEqual([]);
    });

    it("rejects invalid notes without writing", async () => {
      const fs = new RecordingFileSystem();
      const store = makeStore(platform, { fs });

      await expect(store.save(note("../x", "2024-01-01T00:00:00Z"))).rejects.toBeInstanceOf(InvalidNoteError);
      await expect(store.save(note("1", "not a date"))).rejects.toBeInstanceOf(InvalidNoteError);
      expect(fs.calls).toEqual([]);
    });
  });

  describe("list", () => {
    it("returns an empty list for an empty directory", async () => {
      expect(await makeStore(platform).list()).toEqual([]);
    });

    it("sorts by date, newest first", async () => {
      const store = makeStore(platform);
      await store.save(note("b", "2024-02-01T00:00:00Z"));
      await store.save(note("c", "2023-12-31T23:59:59Z"));
      await store.save(note("a", "2024-02-01T00:00:01Z"));
      await store.save(note("d", "2024-01-15T08:00:00+02:00"));

      const ids = (await store.list()).map((n) => n.id);

      expect(ids).toEqual(["a", "b", "d", "c"]);
    });

    it("compares instants rather than strings", async () => {
      const store = makeStore(platform);
      // 01:00+02:00 is 23:00Z the previous day
      await store.save(note("early", "2024-01-02T01:00:00+02:00"));
      await store.save(note("late", "2024-01-01T23:30:00Z"));

      expect((await store.list()).map((n) => n.id)).toEqual(["late", "early"]);
    });

    it("skips corrupt files and logs them", async () => {
      const logger = memoryLogger();
      const store = makeStore(platform, { logger });
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await store.save(note("2", "2024-02-01T00:00:00Z"));
      await writeFile(join(notesDir, "broken.json"), "{ not json");
      await writeFile(join(notesDir, "partial.json"), JSON.stringify({ id: "p", title: "P" }));

      const notes = await store.list();

      expect(notes.map((n) => n.id)).toEqual(["2", "1"]);
      const warnings = logger.lines.filter((line) => line.level === "warn").map((line) => line.message);
      expect(warnings).toHaveLength(2);
      expect(warnings.some((w) => w.startsWith("Skipping broken.json: Invalid note in "))).toBe(true);
      expect(warnings.some((w) => w.startsWith("Skipping partial.json: Invalid note in "))).toBe(true);
    });

    it("skips a file whose id does not match its name", async () => {
      const logger = memoryLogger();
      const store = makeStore(platform, { logger });
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await writeFile(join(notesDir, "a.json"), serializeNote(note("b", "2024-02-01T00:00:00Z")));

      expect((await store.list()).map((n) => n.id)).toEqual(["1"]);
      expect(logger.lines).toContainEqual({
        level: "warn",
        message: 'Skipping a.json: id "b" does not match the file name',
      });
    });

    it("ignores non-json files, directories and temp files", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await writeFile(join(notesDir, "readme.txt"), "hello");
      await writeFile(join(notesDir, ".2.json.tmp"), serializeNote(note("2", "2024-01-02T00:00:00Z")));
      await mkdir(join(notesDir, "folder.json"));

      expect((await store.list()).map((n) => n.id)).toEqual(["1"]);
    });

    it("leaves the export file out", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await store.exportAll();

      expect((await store.list()).map((n) => n.id)).toEqual(["1"]);
    });

    it("reports a directory that cannot be enumerated as StorageIOError", async () => {
      const failing: NoteFileSystem = {
        ...nodeFileSystem,
        readdir: async () => {
          throw new Error("EACCES");
        },
      };
      const store = makeStore(platform, { fs: failing });

      await expect(store.list()).rejects.toBeInstanceOf(StorageIOError);
    });
  });

  describe("get", () => {
    it("returns the note or null", async () => {
      const store = makeStore(platform);
      const n = note("1", "2024-01-01T00:00:00Z");
      await store.save(n);

      expect(await store.get("1")).toEqual(n);
      expect(await store.get("missing")).toBeNull();
    });

    it("fails on a corrupt file", async () => {
      const store = makeStore(platform);
      await store.resolveDirectory();
      await writeFile(join(notesDir, "bad.json"), "[]");

      await expect(store.get("bad")).rejects.toBeInstanceOf(NoteDeserializationError);
    });
  });

  describe("noteLabel", () => {
    it("quotes the title of a stored note", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));

      expect(await noteLabel(store, "1")).toBe('"Note 1"');
      expect(await noteLabel(store, "missing")).toBe("missing");
    });

    it("falls back to the id for a corrupt file, which can still be deleted", async () => {
      const store = makeStore(platform);
      await store.resolveDirectory();
      await writeFile(join(notesDir, "bad.json"), "{ not json");

      expect(await noteLabel(store, "bad")).toBe("bad");
      await store.delete("bad");
      expect(await readdir(notesDir)).toEqual([]);
    });

    it("passes other failures through", async () => {
      platform.status = "denied";
      const store = makeStore(platform);

      await expect(noteLabel(store, "1")).rejects.toBeInstanceOf(PermissionDeniedError);
    });
  });

  describe("delete", () => {
    it("removes the note file", async () => {
      const store = makeStore(platform);
      await store.save(note("3", "2024-01-01T00:00:00Z"));

      await store.delete("3");

      expect(await readdir(notesDir)).toEqual([]);
    });

    it("succeeds for an id that does not exist and changes nothing", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));

      await expect(store.delete("nope")).resolves.toBeUndefined();
      await expect(store.delete("nope")).resolves.toBeUndefined();

      expect(await readdir(notesDir)).toEqual(["1.json"]);
    });

    it("refuses ids that would leave the directory", async () => {
      const fs = new RecordingFileSystem();
      const store = makeStore(platform, { fs });

      await expect(store.delete("../Notes")).rejects.toBeInstanceOf(InvalidNoteError);
      expect(fs.calls).toEqual([]);
    });
  });

  describe("exportAll", () => {
    it("writes all notes as one JSON array, newest first", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await store.save(note("2", "2024-02-01T00:00:00Z"));

      const artifact = await store.exportAll();

      expect(artifact).toEqual({ path: join(notesDir, "notes_export.json"), noteCount: 2 });
      const exported: unknown = JSON.parse(await readFile(artifact.path, "utf-8"));
      expect(exported).toEqual(await store.list());
    });

    it("overwrites a previous export", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await store.exportAll();
      await store.delete("1");

      const artifact = await store.exportAll();

      expect(artifact.noteCount).toBe(0);
      expect(JSON.parse(await readFile(artifact.path, "utf-8"))).toEqual([]);
    });
  });

  describe("permission gating", () => {
    const operations: [string, (store: ReturnType<typeof makeStore>) => Promise<unknown>][] = [
      ["save", (store) => store.save(note("1", "2024-01-01T00:00:00Z"))],
      ["get", (store) => store.get("1")],
      ["list", (store) => store.list()],
      ["delete", (store) => store.delete("1")],
      ["exportAll", (store) => store.exportAll()],
    ];

    it.each(operations)("%s fails with PermissionDeniedError and touches nothing", async (_name, run) => {
      const denied = new FakePlatform({ root, family: "other", status: "denied", requestAnswer: "denied" });
      const fs = new RecordingFileSystem();
      const store = makeStore(denied, { fs });

      await expect(run(store)).rejects.toBeInstanceOf(PermissionDeniedError);

      expect(fs.calls).toEqual([]);
      expect(denied.requests).toBe(1);
      expect(await readdir(root)).toEqual([]);
    });

    it("proceeds once consent is given", async () => {
      const asking = new FakePlatform({ root, family: "other", status: "denied", requestAnswer: "granted" });
      const store = makeStore(asking);

      await store.save(note("1", "2024-01-01T00:00:00Z"));

      expect(asking.requests).toBe(1);
      expect(await readdir(notesDir)).toEqual(["1.json"]);
    });
  });

  describe("scenarios", () => {
    it("lists later notes first", async () => {
      const store = makeStore(platform);
      await store.save({ id: "1", title: "A", content: "x", date: "2024-01-01T00:00:00Z", color: 0 });
      await store.save({ id: "2", title: "B", content: "y", date: "2024-02-01T00:00:00Z", color: 0 });

      expect((await store.list()).map((n) => n.id)).toEqual(["2", "1"]);
    });

    it("does not list a deleted note", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await store.save(note("3", "2024-01-02T00:00:00Z"));
      await store.delete("3");

      expect((await store.list()).map((n) => n.id)).toEqual(["1"]);
    });

    it("exports what list returns at the time of the call", async () => {
      const store = makeStore(platform);
      await store.save(note("1", "2024-01-01T00:00:00Z"));
      await store.save(note("2", "2024-02-01T00:00:00Z"));

      const artifact = await store.exportAll();
      const listed = await store.list();
      const exported: unknown = JSON.parse(await readFile(artifact.path, "utf-8"));

      expect(Array.isArray(exported)).toBe(true);
      if (Array.isArray(exported)) {
        expect(sortNotes(exported)).toEqual(listed);
      }
    });
  });
});

describe("sortNotes", () => {
  it("keeps the input order for equal dates", () => {
    const notes = [
      note("x", "2024-01-01T00:00:00Z"),
      note("y", "2024-01-01T00:00:00Z"),
      note("z", "2024-01-02T00:00:00Z"),
    ];

    expect(sortNotes(notes).map((n) => n.id)).toEqual(["z", "x", "y"]);
  });
});
