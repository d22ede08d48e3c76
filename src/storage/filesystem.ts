import { mkdir, readdir, readFile, rename, stat, unlink, writeFile } from "fs/promises";

export interface DirEntry {
  name: string;
  isFile: boolean;
}

export interface FileStat {
  isDirectory: boolean;
}

/** The filesystem calls the note store makes. Paths are absolute. */
export interface NoteFileSystem {
  mkdir(path: string): Promise<void>;
  stat(path: string): Promise<FileStat | null>;
  readdir(path: string): Promise<DirEntry[]>;
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  /** Resolves false when there was nothing to remove. */
  unlink(path: string): Promise<boolean>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export const nodeFileSystem: NoteFileSystem = {
  async mkdir(path) {
    await mkdir(path, { recursive: true });
  },

  async stat(path) {
    try {
      const stats = await stat(path);
      return { isDirectory: stats.isDirectory() };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  },

  async readdir(path) {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.map((entry) => ({ name: entry.name, isFile: entry.isFile() }));
  },

  async readFile(path) {
    return readFile(path, "utf-8");
  },

  async writeFile(path, data) {
    await writeFile(path, data, "utf-8");
  },

  async rename(from, to) {
    await rename(from, to);
  },

  async unlink(path) {
    try {
      await unlink(path);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  },
};
