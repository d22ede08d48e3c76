import { Config, getLogFilePath, saveConfig } from "../config/index.js";
import { Logger, createLogger } from "../logger.js";
import { PermissionGate } from "../permissions/gate.js";
import { NodePlatform } from "../platform/node.js";
import { NoteStore } from "./store.js";

export interface OpenNoteStoreOptions {
  interactive?: boolean;
  logger?: Logger;
  /** Where granted consent is written back; omit to keep it for this run only. */
  configPath?: string;
  persistConsent?: boolean;
}

export function createConfigLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    logFile: getLogFilePath(config),
  });
}

export function openNoteStore(config: Config, options: OpenNoteStoreOptions = {}): NoteStore {
  const logger = options.logger ?? createConfigLogger(config);

  const platform = new NodePlatform(config, {
    interactive: options.interactive,
    onConsentGranted: options.persistConsent
      ? () => {
          saveConfig(
            { ...config, permissions: { ...config.permissions, storageGranted: true } },
            options.configPath
          );
          logger.info("Storage consent saved to configuration");
        }
      : undefined,
  });

  const gate = new PermissionGate(platform, {
    scopedStorageMinVersion: config.platform.scopedStorageMinVersion,
    logger,
  });

  return new NoteStore({ platform, gate, logger });
}
