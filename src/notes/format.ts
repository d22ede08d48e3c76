import { NoteDeserializationError } from "../errors.js";
import { colorName, formatColor } from "./colors.js";
import type { NoteStore } from "./store.js";
import { Note } from "./types.js";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

export interface DateFormatOptions {
  utc?: boolean;
}

/** "MMM dd, yyyy HH:mm", in local time unless `utc` is set. */
export function formatNoteDate(iso: string, options: DateFormatOptions = {}): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) {
    return iso;
  }

  const utc = options.utc ?? false;
  const month = utc ? d.getUTCMonth() : d.getMonth();
  const day = utc ? d.getUTCDate() : d.getDate();
  const year = utc ? d.getUTCFullYear() : d.getFullYear();
  const hours = utc ? d.getUTCHours() : d.getHours();
  const minutes = utc ? d.getUTCMinutes() : d.getMinutes();

  return `${MONTHS[month]} ${pad(day)}, ${year} ${pad(hours)}:${pad(minutes)}`;
}

export function describeColor(color: number): string {
  const name = colorName(color);
  const hex = formatColor(color);
  return name ? `${name} (${hex})` : hex;
}

/** First line of the content, cut to `max` characters. */
export function previewContent(content: string, max = 60): string {
  const firstLine = content.split(/\r\n|\n|\r/).find((line) => line.trim().length > 0) ?? "";
  const trimmed = firstLine.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max - 3)}...` : trimmed;
}

export function formatNoteSummary(note: Note, options: DateFormatOptions = {}): string {
  return `**${formatNoteDate(note.date, options)}** - ${note.title} (id: ${note.id})`;
}

export function formatNoteDetail(note: Note, options: DateFormatOptions = {}): string {
  return [
    `# ${note.title}`,
    "",
    `**Id:** ${note.id}`,
    `**Date:** ${formatNoteDate(note.date, options)}`,
    `**Color:** ${describeColor(note.color)}`,
    "",
    "---",
    "",
    note.content,
  ].join("\n");
}

/**
 * Label for a note in a prompt: its quoted title, or the bare id when the
 * note is missing or its file cannot be parsed.
 */
export async function noteLabel(store: Pick<NoteStore, "get">, id: string): Promise<string> {
  try {
    const note = await store.get(id);
    return note ? `"${note.title}"` : id;
  } catch (error) {
    if (error instanceof NoteDeserializationError) {
      return id;
    }
    throw error;
  }
}
