export type NotesErrorCode =
  | "PERMISSION_DENIED"
  | "STORAGE_UNAVAILABLE"
  | "IO_ERROR"
  | "DESERIALIZATION_ERROR"
  | "INVALID_NOTE";

export class NotesError extends Error {
  readonly code: NotesErrorCode;

  constructor(code: NotesErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PermissionDeniedError extends NotesError {
  constructor(message = "Storage permission not granted") {
    super("PERMISSION_DENIED", message);
  }
}

export class StorageUnavailableError extends NotesError {
  constructor(message = "Storage directory not available") {
    super("STORAGE_UNAVAILABLE", message);
  }
}

export class StorageIOError extends NotesError {
  readonly path: string;

  constructor(operation: string, path: string, cause: unknown) {
    super("IO_ERROR", `Failed to ${operation} ${path}: ${describeError(cause)}`, { cause });
    this.path = path;
  }
}

/** Raised while reading a single note file. `NoteStore.list` skips these. */
export class NoteDeserializationError extends NotesError {
  readonly source: string;

  constructor(source: string, reason: string, cause?: unknown) {
    super("DESERIALIZATION_ERROR", `Invalid note in ${source}: ${reason}`, { cause });
    this.source = source;
  }
}

export class InvalidNoteError extends NotesError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_NOTE", `Invalid note: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
