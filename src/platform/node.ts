import { stat } from "fs/promises";
import prompts from "prompts";
import { Config, getStorageRoot } from "../config/index.js";
import { PermissionStatus, PlatformEnvironment, PlatformFamily } from "./types.js";

export interface NodePlatformOptions {
  /** False where no one can answer a prompt, such as the MCP server. */
  interactive?: boolean;
  /** Called once the user grants consent, so it can be remembered. */
  onConsentGranted?: () => Promise<void> | void;
  hostPlatform?: NodeJS.Platform;
}

export function resolveFamily(
  configured: Config["platform"]["family"],
  hostPlatform: NodeJS.Platform = process.platform
): PlatformFamily {
  if (configured !== "auto") {
    return configured;
  }
  // Termux reports "android"; Node has no iOS host
  return hostPlatform === "android" ? "android" : "other";
}

export class NodePlatform implements PlatformEnvironment {
  readonly family: PlatformFamily;
  private config: Config;
  private interactive: boolean;
  private onConsentGranted?: () => Promise<void> | void;
  private granted: boolean;

  constructor(config: Config, options: NodePlatformOptions = {}) {
    this.config = config;
    this.family = resolveFamily(config.platform.family, options.hostPlatform);
    this.interactive = options.interactive ?? Boolean(process.stdin.isTTY && process.stdout.isTTY);
    this.onConsentGranted = options.onConsentGranted;
    this.granted = config.permissions.storageGranted;
  }

  async osVersion(): Promise<number> {
    return this.config.platform.osVersion ?? 0;
  }

  async storageRoot(): Promise<string | null> {
    const root = getStorageRoot(this.config);
    if (!root) {
      return null;
    }

    try {
      const stats = await stat(root);
      return stats.isDirectory() ? root : null;
    } catch (error) {
      if (error instanceof Error && "code" in error) {
        if (error.code === "ENOENT") {
          // Created along with the notes directory
          return root;
        }
        if (error.code === "ENOTDIR") {
          // A parent segment is a regular file
          return null;
        }
      }
      throw error;
    }
  }

  async permissionStatus(): Promise<PermissionStatus> {
    return this.granted ? "granted" : "denied";
  }

  async requestPermission(): Promise<PermissionStatus> {
    if (!this.interactive) {
      return "denied";
    }

    const root = getStorageRoot(this.config) ?? this.config.storageRoot;
    let cancelled = false;
    const { allow } = await prompts(
      {
        type: "confirm",
        name: "allow",
        message: `Allow filenotes to read and write notes under ${root}?`,
        initial: true,
      },
      {
        onCancel: () => {
          cancelled = true;
        },
      }
    );

    if (cancelled || allow !== true) {
      return "denied";
    }

    this.granted = true;
    await this.onConsentGranted?.();
    return "granted";
  }
}
