#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import prompts from "prompts";
import { spawn } from "child_process";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import { z } from "zod";
import {
  Config,
  loadConfig,
  configExists,
  getConfigPath,
  getStorageRoot,
  getLogFilePath,
} from "./config/index.js";
import { describeError } from "./errors.js";
import { runInteractiveSetup } from "./setup/interactive.js";
import { PRESET_COLORS, formatColor, parseColor } from "./notes/colors.js";
import { openNoteStore } from "./notes/factory.js";
import { describeColor, formatNoteDate, noteLabel, previewContent } from "./notes/format.js";
import { createNote, updateNote } from "./notes/note.js";
import { NOTES_DIRECTORY_NAME, NoteStore } from "./notes/store.js";
import { NoteChanges } from "./notes/types.js";
import { resolveFamily } from "./platform/node.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")));

function requireConfig(): Config {
  if (!configExists()) {
    console.error(chalk.red("No configuration found. Run 'filenotes init' first."));
    process.exit(1);
  }
  return loadConfig();
}

function openStore(config: Config): NoteStore {
  return openNoteStore(config, { persistConsent: true });
}

function colorOption(value: string): number {
  const color = parseColor(value);
  if (color === null) {
    console.error(chalk.red(`Unrecognised color: ${value}. Run 'filenotes colors' for the presets.`));
    process.exit(1);
  }
  return color;
}

// Errors from the store become a red message and exit status 1
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(chalk.red(describeError(error)));
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name("filenotes")
  .description("Personal notes kept as one JSON file per note")
  .version(packageJson.version);

// Init command
program
  .command("init")
  .description("Initialize filenotes with interactive setup")
  .option("-f, --force", "Overwrite existing configuration")
  .action(
    action(async (options: { force?: boolean }) => {
      await runInteractiveSetup({ force: options.force });
    })
  );

// Serve command (MCP server)
program
  .command("serve")
  .description("Start the MCP server on stdio")
  .action(() => {
    requireConfig();

    const serverPath = join(__dirname, "index.js");
    const child = spawn(process.execPath, [serverPath], {
      stdio: "inherit",
    });

    child.on("error", (error) => {
      console.error(chalk.red(`Failed to start MCP server: ${error.message}`));
      process.exit(1);
    });

    child.on("exit", (code) => {
      process.exit(code || 0);
    });
  });

program
  .command("add")
  .description("Create a new note")
  .requiredOption("-t, --title <title>", "Note title")
  .option("-c, --content <content>", "Note content", "")
  .option("--color <color>", "Preset name, #RRGGBB, #AARRGGBB or packed integer", colorOption)
  .action(
    action(async (options: { title: string; content: string; color?: number }) => {
      const store = openStore(requireConfig());
      const note = createNote({
        title: options.title,
        content: options.content,
        color: options.color,
      });
      await store.save(note);
      console.log(chalk.green(`Created note ${note.id}`));
    })
  );

program
  .command("edit <id>")
  .description("Change an existing note")
  .option("-t, --title <title>", "New title")
  .option("-c, --content <content>", "New content")
  .option("--color <color>", "Preset name, #RRGGBB, #AARRGGBB or packed integer", colorOption)
  .action(
    action(async (id: string, options: NoteChanges) => {
      const store = openStore(requireConfig());
      const existing = await store.get(id);
      if (!existing) {
        console.error(chalk.red(`No note with id ${id}.`));
        process.exitCode = 1;
        return;
      }

      const note = updateNote(existing, {
        title: options.title,
        content: options.content,
        color: options.color,
      });
      await store.save(note);
      console.log(chalk.green(`Updated note ${note.id}`));
    })
  );

program
  .command("list")
  .description("List notes, most recent first")
  .option("--json", "Print the notes as a JSON array")
  .action(
    action(async (options: { json?: boolean }) => {
      const store = openStore(requireConfig());
      const notes = await store.list();

      if (options.json) {
        console.log(JSON.stringify(notes, null, 2));
        return;
      }

      if (notes.length === 0) {
        console.log(chalk.yellow("No notes yet."));
        return;
      }

      console.log(chalk.bold(`\nNotes (${notes.length}):\n`));
      for (const note of notes) {
        console.log(
          `${chalk.cyan(formatNoteDate(note.date))} - ${chalk.bold(note.title)} ${chalk.dim(`[${note.id}]`)}`
        );
        const preview = previewContent(note.content);
        if (preview) {
          console.log(chalk.dim(`  ${preview}`));
        }
      }
    })
  );

program
  .command("show <id>")
  .description("Print one note")
  .action(
    action(async (id: string) => {
      const store = openStore(requireConfig());
      const note = await store.get(id);

      if (!note) {
        console.log(chalk.yellow(`No note with id ${id}.`));
        return;
      }

      console.log(chalk.bold(`\n${note.title}\n`));
      console.log(chalk.dim(`Id: ${note.id}`));
      console.log(chalk.dim(`Date: ${formatNoteDate(note.date)}`));
      console.log(chalk.dim(`Color: ${describeColor(note.color)}\n`));
      console.log(note.content);
    })
  );

program
  .command("delete <id>")
  .description("Delete a note")
  .option("-y, --yes", "Do not ask for confirmation")
  .action(
    action(async (id: string, options: { yes?: boolean }) => {
      const store = openStore(requireConfig());

      if (!options.yes) {
        const label = await noteLabel(store, id);
        const { confirmed } = await prompts({
          type: "confirm",
          name: "confirmed",
          message: `Delete note ${label}?`,
          initial: false,
        });
        if (confirmed !== true) {
          console.log(chalk.yellow("Nothing deleted."));
          return;
        }
      }

      await store.delete(id);
      console.log(chalk.green("Note deleted"));
    })
  );

program
  .command("export")
  .description("Write all notes to a single JSON file and print its path")
  .action(
    action(async () => {
      const store = openStore(requireConfig());
      const artifact = await store.exportAll();
      console.log(chalk.green(`Exported ${artifact.noteCount} notes`));
      console.log(artifact.path);
    })
  );

program
  .command("colors")
  .description("List the preset note colors")
  .action(() => {
    console.log(chalk.bold("\nPreset colors:\n"));
    for (const [name, value] of Object.entries(PRESET_COLORS)) {
      console.log(`  ${chalk.cyan(name.padEnd(8))} ${formatColor(value)}`);
    }
  });

// Config command
program
  .command("config")
  .description("Show current configuration")
  .action(() => {
    const config = requireConfig();
    const root = getStorageRoot(config);

    console.log(chalk.bold("\nConfiguration:\n"));
    console.log(`Config file: ${getConfigPath()}`);
    console.log(`Notes directory: ${root ? join(root, NOTES_DIRECTORY_NAME) : "unavailable"}`);
    console.log(`Platform: ${resolveFamily(config.platform.family)} (configured: ${config.platform.family})`);
    console.log(`OS version: ${config.platform.osVersion ?? "unset"}`);
    console.log(`Storage consent: ${config.permissions.storageGranted ? "granted" : "not granted"}`);
    console.log(`Log level: ${config.logging.level}`);
    console.log(`Log file: ${getLogFilePath(config) ?? "none"}`);
  });

program.parse();
