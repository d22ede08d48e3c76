import prompts from "prompts";
import chalk from "chalk";
import { join } from "path";
import {
  Config,
  ConfigSchema,
  DEFAULT_CONFIG,
  saveConfig,
  getConfigPath,
  configExists,
  getStorageRoot,
} from "../config/index.js";
import { describeError } from "../errors.js";
import { openNoteStore } from "../notes/factory.js";
import { NOTES_DIRECTORY_NAME } from "../notes/store.js";
import { resolveFamily } from "../platform/node.js";

export async function runInteractiveSetup(
  options: { force?: boolean } = {}
): Promise<Config | null> {
  console.log(chalk.bold("\nfilenotes setup\n"));

  if (configExists() && !options.force) {
    const { overwrite } = await prompts({
      type: "confirm",
      name: "overwrite",
      message: `Config already exists at ${getConfigPath()}. Overwrite?`,
      initial: false,
    });

    if (overwrite !== true) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  let cancelled = false;
  const responses = await prompts(
    [
      {
        type: "text",
        name: "storageRoot",
        message: "Where should the Notes directory be created?",
        initial: DEFAULT_CONFIG.storageRoot,
        validate: (value: string) => {
          if (!value.trim()) return "Directory path is required";
          return true;
        },
      },
      {
        type: "select",
        name: "family",
        message: "Platform",
        choices: [
          { title: `Detect (${resolveFamily("auto")})`, value: "auto" },
          { title: "Android", value: "android" },
          { title: "iOS", value: "ios" },
          { title: "Other", value: "other" },
        ],
        initial: 0,
      },
      {
        type: (_, values) =>
          resolveFamily(values.family) === "android" ? "number" : null,
        name: "osVersion",
        message: "Android API level?",
        initial: DEFAULT_CONFIG.platform.scopedStorageMinVersion,
        min: 1,
      },
      {
        type: "confirm",
        name: "storageGranted",
        message: "Allow filenotes to read and write notes in that directory?",
        initial: true,
      },
      {
        type: "select",
        name: "logLevel",
        message: "Log level",
        choices: [
          { title: "info", value: "info" },
          { title: "debug", value: "debug" },
          { title: "warn", value: "warn" },
          { title: "error", value: "error" },
        ],
        initial: 0,
      },
    ],
    {
      onCancel: () => {
        cancelled = true;
      },
    }
  );

  if (cancelled) {
    console.log(chalk.yellow("\nSetup cancelled."));
    return null;
  }

  const config = ConfigSchema.parse({
    storageRoot: responses.storageRoot,
    platform: {
      family: responses.family,
      osVersion: responses.osVersion,
      scopedStorageMinVersion: DEFAULT_CONFIG.platform.scopedStorageMinVersion,
    },
    permissions: {
      storageGranted: responses.storageGranted,
    },
    logging: {
      level: responses.logLevel,
    },
  });

  console.log(chalk.dim("\nCreating configuration..."));
  saveConfig(config);
  console.log(chalk.green(`✓ Created ${getConfigPath()}`));

  console.log(chalk.dim("Creating notes directory..."));
  const notesDir = join(getStorageRoot(config) ?? config.storageRoot, NOTES_DIRECTORY_NAME);
  try {
    // Goes through the permission gate, which creates the directory on success
    const notes = await openNoteStore(config, { interactive: false }).list();
    console.log(chalk.green(`✓ Ready: ${notesDir} (${notes.length} notes)`));
  } catch (error) {
    console.log(chalk.yellow(`⚠ Could not prepare ${notesDir}: ${describeError(error)}`));
  }

  console.log(chalk.bold.green("\n✨ Setup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  1. Create your first note:"));
  console.log(chalk.dim("     ") + "filenotes add --title 'My first note'");
  console.log(chalk.dim("  2. Configure your MCP client to use:"));
  console.log(chalk.dim("     ") + "filenotes serve\n");

  return config;
}
