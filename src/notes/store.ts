import { basename, dirname, join } from "path";
import {
  InvalidNoteError,
  StorageIOError,
  StorageUnavailableError,
  describeError,
} from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import { PermissionGate } from "../permissions/gate.js";
import { PlatformEnvironment } from "../platform/types.js";
import { DirEntry, FileStat, NoteFileSystem, nodeFileSystem } from "../storage/filesystem.js";
import { deserializeNote, parseNote, serializeNote, toRecord } from "./note.js";
import { EXPORT_FILE_STEM, ExportArtifact, Note, NoteIdSchema } from "./types.js";

export const NOTES_DIRECTORY_NAME = "Notes";
export const EXPORT_FILE_NAME = `${EXPORT_FILE_STEM}.json`;
const NOTE_EXTENSION = ".json";

export interface NoteStoreOptions {
  platform: PlatformEnvironment;
  gate: PermissionGate;
  fs?: NoteFileSystem;
  logger?: Logger;
  directoryName?: string;
}

/** Newest first. Ties keep their input order. */
export function sortNotes(notes: readonly Note[]): Note[] {
  return [...notes].sort((a, b) => Date.parse(b.date) - Date.parse(a.date));
}

/**
 * Reads and writes notes as `<id>.json` files in a `Notes` directory under
 * the platform's storage root. Every public operation passes the permission
 * gate before it touches the filesystem.
 */
export class NoteStore {
  private platform: PlatformEnvironment;
  private gate: PermissionGate;
  private fs: NoteFileSystem;
  private logger: Logger;
  private directoryName: string;

  constructor(options: NoteStoreOptions) {
    this.platform = options.platform;
    this.gate = options.gate;
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = options.logger ?? silentLogger;
    this.directoryName = options.directoryName ?? NOTES_DIRECTORY_NAME;
  }

  private validateId(id: string): string {
    const result = NoteIdSchema.safeParse(id);
    if (!result.success) {
      throw new InvalidNoteError(result.error.issues.map((issue) => issue.message));
    }
    return result.data;
  }

  private notePath(dir: string, id: string): string {
    return join(dir, `${id}${NOTE_EXTENSION}`);
  }

  private async writeFileAtomic(path: string, data: string): Promise<void> {
    const tempPath = join(dirname(path), `.${basename(path)}.tmp`);

    try {
      await this.fs.writeFile(tempPath, data);
      await this.fs.rename(tempPath, path);
    } catch (error) {
      await this.fs.unlink(tempPath).catch((cleanupError: unknown) => {
        this.logger.debug(`Could not remove ${tempPath}: ${describeError(cleanupError)}`);
      });
      throw new StorageIOError("write", path, error);
    }
  }

  private async readAll(dir: string): Promise<Note[]> {
    let entries: DirEntry[];
    try {
      entries = await this.fs.readdir(dir);
    } catch (error) {
      throw new StorageIOError("list", dir, error);
    }

    const notes: Note[] = [];
    for (const entry of entries) {
      if (
        !entry.isFile ||
        !entry.name.endsWith(NOTE_EXTENSION) ||
        entry.name === EXPORT_FILE_NAME
      ) {
        continue;
      }

      const filePath = join(dir, entry.name);
      let note: Note;
      try {
        note = deserializeNote(await this.fs.readFile(filePath), filePath);
      } catch (error) {
        this.logger.warn(`Skipping ${entry.name}: ${describeError(error)}`);
        continue;
      }

      // The file name is the key; a record claiming another id could not be deleted
      const stem = entry.name.slice(0, -NOTE_EXTENSION.length);
      if (note.id !== stem) {
        this.logger.warn(`Skipping ${entry.name}: id "${note.id}" does not match the file name`);
        continue;
      }
      notes.push(note);
    }

    return sortNotes(notes);
  }

  /**
   * Ensure `<storage root>/Notes` exists and return its path. Fails with
   * StorageUnavailableError when the platform has no storage root.
   */
  async resolveDirectory(): Promise<string> {
    let root: string | null;
    try {
      root = await this.platform.storageRoot();
    } catch (error) {
      throw new StorageUnavailableError(`Cannot resolve storage root: ${describeError(error)}`);
    }
    if (!root) {
      throw new StorageUnavailableError("External storage directory not available");
    }

    const dir = join(root, this.directoryName);
    let existing: FileStat | null;
    try {
      existing = await this.fs.stat(dir);
    } catch (error) {
      throw new StorageUnavailableError(`Cannot inspect ${dir}: ${describeError(error)}`);
    }

    if (existing) {
      if (!existing.isDirectory) {
        throw new StorageUnavailableError(`${dir} exists and is not a directory`);
      }
      return dir;
    }

    try {
      await this.fs.mkdir(dir);
    } catch (error) {
      throw new StorageUnavailableError(`Cannot create ${dir}: ${describeError(error)}`);
    }
    this.logger.info(`Created notes directory ${dir}`);
    return dir;
  }

  /** Create or overwrite `<id>.json`. */
  async save(note: Note): Promise<void> {
    await this.gate.assertAccess();
    const valid = parseNote(note);
    const dir = await this.resolveDirectory();
    const filePath = this.notePath(dir, valid.id);

    await this.writeFileAtomic(filePath, serializeNote(valid));
    this.logger.debug(`Saved note ${valid.id}`);
  }

  async get(id: string): Promise<Note | null> {
    await this.gate.assertAccess();
    const noteId = this.validateId(id);
    const dir = await this.resolveDirectory();
    const filePath = this.notePath(dir, noteId);

    let raw: string;
    try {
      if (!(await this.fs.stat(filePath))) {
        return null;
      }
      raw = await this.fs.readFile(filePath);
    } catch (error) {
      throw new StorageIOError("read", filePath, error);
    }
    return deserializeNote(raw, filePath);
  }

  /** All readable notes, newest first. Unreadable files are logged and skipped. */
  async list(): Promise<Note[]> {
    await this.gate.assertAccess();
    const dir = await this.resolveDirectory();
    return this.readAll(dir);
  }

  /** Removing a note that does not exist is not an error. */
  async delete(id: string): Promise<void> {
    await this.gate.assertAccess();
    const noteId = this.validateId(id);
    const dir = await this.resolveDirectory();
    const filePath = this.notePath(dir, noteId);

    let removed: boolean;
    try {
      removed = await this.fs.unlink(filePath);
    } catch (error) {
      throw new StorageIOError("delete", filePath, error);
    }
    this.logger.debug(removed ? `Deleted note ${noteId}` : `Note ${noteId} already absent`);
  }

  /**
   * Write every note, newest first, as one JSON array to the export file in
   * the notes directory. The export file is left out of `list()`.
   */
  async exportAll(): Promise<ExportArtifact> {
    await this.gate.assertAccess();
    const dir = await this.resolveDirectory();
    const notes = await this.readAll(dir);
    const exportPath = join(dir, EXPORT_FILE_NAME);

    await this.writeFileAtomic(exportPath, JSON.stringify(notes.map(toRecord), null, 2) + "\n");
    this.logger.info(`Exported ${notes.length} notes to ${exportPath}`);

    return { path: exportPath, noteCount: notes.length };
  }
}
