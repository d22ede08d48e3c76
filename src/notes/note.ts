import { v4 as uuidv4 } from "uuid";
import type { ZodError } from "zod";
import { InvalidNoteError, NoteDeserializationError, describeError } from "../errors.js";
import { DEFAULT_COLOR } from "./colors.js";
import { Note, NoteSchema, NewNoteInput, NoteChanges } from "./types.js";

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".");
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}

export function generateNoteId(): string {
  return uuidv4();
}

/** Validate an in-memory value as a note. */
export function parseNote(value: unknown): Note {
  const result = NoteSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidNoteError(formatIssues(result.error));
  }
  return result.data;
}

// Field order is fixed so files diff cleanly.
export function toRecord(note: Note): Note {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    date: note.date,
    color: note.color,
  };
}

export function serializeNote(note: Note): string {
  return JSON.stringify(toRecord(note), null, 2) + "\n";
}

export function deserializeNote(raw: string, source = "<input>"): Note {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new NoteDeserializationError(source, describeError(error), error);
  }

  const result = NoteSchema.safeParse(parsed);
  if (!result.success) {
    throw new NoteDeserializationError(source, formatIssues(result.error).join("; "), result.error);
  }
  return result.data;
}

export function createNote(input: NewNoteInput, now: Date = new Date()): Note {
  return parseNote({
    id: generateNoteId(),
    title: input.title,
    content: input.content,
    date: now.toISOString(),
    color: input.color ?? DEFAULT_COLOR,
  });
}

/** Apply edits to a saved note. The id is kept and the date moves to `now`. */
export function updateNote(existing: Note, changes: NoteChanges, now: Date = new Date()): Note {
  return parseNote({
    id: existing.id,
    title: changes.title ?? existing.title,
    content: changes.content ?? existing.content,
    date: now.toISOString(),
    color: changes.color ?? existing.color,
  });
}
