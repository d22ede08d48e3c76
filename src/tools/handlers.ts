import { InvalidNoteError, describeError } from "../errors.js";
import { DEFAULT_COLOR, parseColor } from "../notes/colors.js";
import { DateFormatOptions, formatNoteDetail, formatNoteSummary } from "../notes/format.js";
import { createNote, parseNote, updateNote } from "../notes/note.js";
import { NoteStore } from "../notes/store.js";
import { Note } from "../notes/types.js";
import {
  DeleteNoteSchema,
  ExportNotesSchema,
  GetNoteSchema,
  ListNotesSchema,
  SaveNoteInput,
  SaveNoteSchema,
} from "./definitions.js";

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

export interface ToolContext {
  store: NoteStore;
  now?: () => Date;
  dateFormat?: DateFormatOptions;
}

function text(value: string, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: "text", text: value }] };
  if (isError) {
    result.isError = true;
  }
  return result;
}

export function resolveColor(color: string | number | undefined): number | undefined {
  if (color === undefined || typeof color === "number") {
    return color;
  }
  const parsed = parseColor(color);
  if (parsed === null) {
    throw new InvalidNoteError([`color: unrecognised value '${color}'`]);
  }
  return parsed;
}

async function buildNote(store: NoteStore, input: SaveNoteInput, now: Date): Promise<Note> {
  const color = resolveColor(input.color);

  if (input.id === undefined) {
    return createNote({ title: input.title, content: input.content, color }, now);
  }

  const existing = await store.get(input.id);
  if (existing) {
    return updateNote(existing, { title: input.title, content: input.content, color }, now);
  }

  return parseNote({
    id: input.id,
    title: input.title,
    content: input.content,
    date: now.toISOString(),
    color: color ?? DEFAULT_COLOR,
  });
}

export async function handleToolCall(
  context: ToolContext,
  name: string,
  args: unknown
): Promise<ToolResult> {
  const { store } = context;
  const now = context.now ?? (() => new Date());

  try {
    switch (name) {
      case "save_note": {
        const input = SaveNoteSchema.parse(args);
        const note = await buildNote(store, input, now());
        await store.save(note);
        return text(`Saved note ${note.id}: ${note.title}`);
      }

      case "list_notes": {
        const input = ListNotesSchema.parse(args ?? {});
        const notes = await store.list();
        if (notes.length === 0) {
          return text("No notes found.");
        }
        const shown = input.limit ? notes.slice(0, input.limit) : notes;
        const formatted = shown.map((n) => formatNoteSummary(n, context.dateFormat)).join("\n");
        const header =
          shown.length < notes.length
            ? `Showing ${shown.length} of ${notes.length} notes:`
            : `Found ${notes.length} notes:`;
        return text(`${header}\n\n${formatted}`);
      }

      case "get_note": {
        const input = GetNoteSchema.parse(args);
        const note = await store.get(input.id);
        if (!note) {
          return text(`No note found with id ${input.id}.`);
        }
        return text(formatNoteDetail(note, context.dateFormat));
      }

      case "delete_note": {
        const input = DeleteNoteSchema.parse(args);
        await store.delete(input.id);
        return text(`Deleted note ${input.id}.`);
      }

      case "export_notes": {
        ExportNotesSchema.parse(args ?? {});
        const artifact = await store.exportAll();
        return text(`Exported ${artifact.noteCount} notes to ${artifact.path}`);
      }

      default:
        return text(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    return text(`Error: ${describeError(error)}`, true);
  }
}
