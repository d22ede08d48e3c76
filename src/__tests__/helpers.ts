import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { PermissionGate } from "../permissions/gate.js";
import { PermissionStatus, PlatformEnvironment, PlatformFamily } from "../platform/types.js";
import { NoteStore } from "../notes/store.js";
import { NoteFileSystem, nodeFileSystem } from "../storage/filesystem.js";
import { Logger } from "../logger.js";

export class FakePlatform implements PlatformEnvironment {
  family: PlatformFamily;
  version: number;
  root: string | null;
  status: PermissionStatus;
  requestAnswer: PermissionStatus;
  requests = 0;
  versionQueries = 0;

  constructor(init: Partial<Pick<FakePlatform, "family" | "version" | "root" | "status" | "requestAnswer">> = {}) {
    this.family = init.family ?? "other";
    this.version = init.version ?? 0;
    this.root = init.root === undefined ? "/storage" : init.root;
    this.status = init.status ?? "granted";
    this.requestAnswer = init.requestAnswer ?? "denied";
  }

  async osVersion(): Promise<number> {
    this.versionQueries++;
    return this.version;
  }

  async storageRoot(): Promise<string | null> {
    return this.root;
  }

  async permissionStatus(): Promise<PermissionStatus> {
    return this.status;
  }

  async requestPermission(): Promise<PermissionStatus> {
    this.requests++;
    return this.requestAnswer;
  }
}

/** Wraps a filesystem and records every call made through it. */
export class RecordingFileSystem implements NoteFileSystem {
  calls: string[] = [];
  private inner: NoteFileSystem;

  constructor(inner: NoteFileSystem = nodeFileSystem) {
    this.inner = inner;
  }

  mkdir(path: string) {
    this.calls.push(`mkdir ${path}`);
    return this.inner.mkdir(path);
  }

  stat(path: string) {
    this.calls.push(`stat ${path}`);
    return this.inner.stat(path);
  }

  readdir(path: string) {
    this.calls.push(`readdir ${path}`);
    return this.inner.readdir(path);
  }

  readFile(path: string) {
    this.calls.push(`readFile ${path}`);
    return this.inner.readFile(path);
  }

  writeFile(path: string, data: string) {
    this.calls.push(`writeFile ${path}`);
    return this.inner.writeFile(path, data);
  }

  rename(from: string, to: string) {
    this.calls.push(`rename ${from} ${to}`);
    return this.inner.rename(from, to);
  }

  unlink(path: string) {
    this.calls.push(`unlink ${path}`);
    return this.inner.unlink(path);
  }
}

export interface LogLine {
  level: keyof Logger;
  message: string;
}

export function memoryLogger(): Logger & { lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    lines,
    debug: (message) => lines.push({ level: "debug", message }),
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "filenotes-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function makeStore(
  platform: PlatformEnvironment,
  options: { fs?: NoteFileSystem; logger?: Logger } = {}
): NoteStore {
  const gate = new PermissionGate(platform, { logger: options.logger });
  return new NoteStore({ platform, gate, fs: options.fs, logger: options.logger });
}
