import { readFileSync, writeFileSync, existsSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { Config, ConfigSchema, DEFAULT_CONFIG } from "./schema.js";

const CONFIG_FILENAME = ".filenotes.json";

export function getConfigPath(): string {
  return join(homedir(), CONFIG_FILENAME);
}

export function expandPath(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

export function configExists(configPath: string = getConfigPath()): boolean {
  return existsSync(configPath);
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  const raw = readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${configPath}`);
    }
    throw error;
  }
  return ConfigSchema.parse(parsed);
}

export function saveConfig(config: Config, configPath: string = getConfigPath()): void {
  const validated = ConfigSchema.parse(config);
  writeFileSync(configPath, JSON.stringify(validated, null, 2) + "\n");
}

/** Expanded storage root, or null when the configured value is blank. */
export function getStorageRoot(config: Config): string | null {
  const root = config.storageRoot.trim();
  return root ? expandPath(root) : null;
}

export function getLogFilePath(config: Config): string | undefined {
  return config.logging.logFile ? expandPath(config.logging.logFile) : undefined;
}

export * from "./schema.js";
