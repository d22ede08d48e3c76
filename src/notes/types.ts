import { z } from "zod";

export const EXPORT_FILE_STEM = "notes_export";

export const NoteIdSchema = z
  .string()
  .min(1, "id is required")
  .max(200, "id is too long")
  .regex(/^[A-Za-z0-9._-]+$/, "id may only contain letters, digits, '.', '_' and '-'")
  .refine((id) => !id.startsWith("."), "id may not start with '.'")
  .refine((id) => id !== EXPORT_FILE_STEM, `id '${EXPORT_FILE_STEM}' is reserved`);

export const NoteSchema = z.object({
  id: NoteIdSchema,
  title: z.string().refine((title) => title.trim().length > 0, "title may not be empty"),
  content: z.string(),
  date: z.string().refine((date) => !Number.isNaN(Date.parse(date)), "date must be a timestamp"),
  color: z.number().int("color must be an integer"),
});

export type Note = Readonly<z.infer<typeof NoteSchema>>;

export interface NewNoteInput {
  title: string;
  content: string;
  color?: number;
}

export interface NoteChanges {
  title?: string;
  content?: string;
  color?: number;
}

export interface ExportArtifact {
  path: string;
  noteCount: number;
}
