import { z } from "zod";

export const SaveNoteSchema = z.object({
  id: z.string().optional().describe("Id of an existing note to overwrite (omit to create a new note)"),
  title: z.string().describe("Title of the note"),
  content: z.string().describe("Body of the note"),
  color: z
    .union([z.string(), z.number().int()])
    .optional()
    .describe("Preset name, #RRGGBB, #AARRGGBB or packed integer (defaults to white)"),
});

export const ListNotesSchema = z.object({
  limit: z.number().int().min(1).optional().describe("Maximum notes to return (default: all)"),
});

export const GetNoteSchema = z.object({
  id: z.string().describe("Id of the note"),
});

export const DeleteNoteSchema = z.object({
  id: z.string().describe("Id of the note to delete"),
});

export const ExportNotesSchema = z.object({});

export type SaveNoteInput = z.infer<typeof SaveNoteSchema>;
export type ListNotesInput = z.infer<typeof ListNotesSchema>;
export type GetNoteInput = z.infer<typeof GetNoteSchema>;
export type DeleteNoteInput = z.infer<typeof DeleteNoteSchema>;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, object>;
    required?: string[];
  };
}

export const TOOLS: ToolDefinition[] = [
  {
    name: "save_note",
    description:
      "Save a note. Without an id a new note is created; with the id of an existing note it is overwritten and its date moves to now.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Id of an existing note to overwrite" },
        title: { type: "string", description: "Title of the note" },
        content: { type: "string", description: "Body of the note" },
        color: {
          type: ["string", "integer"],
          description: "Preset name (white, yellow, blue, green, orange, pink), #RRGGBB, #AARRGGBB or packed integer",
        },
      },
      required: ["title", "content"],
    },
  },
  {
    name: "list_notes",
    description: "List notes, most recently saved first.",
    inputSchema: {
      type: "object",
      properties: {
        limit: { type: "integer", description: "Maximum notes to return (default: all)" },
      },
    },
  },
  {
    name: "get_note",
    description: "Read one note by id.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Id of the note" },
      },
      required: ["id"],
    },
  },
  {
    name: "delete_note",
    description: "Delete a note by id. Deleting a note that does not exist succeeds.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Id of the note to delete" },
      },
      required: ["id"],
    },
  },
  {
    name: "export_notes",
    description: "Write all notes as one JSON array to the export file and return its path.",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];
