import { PermissionDeniedError } from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import { PlatformEnvironment } from "../platform/types.js";

export const DEFAULT_SCOPED_STORAGE_MIN_VERSION = 29;

export interface PermissionGateOptions {
  scopedStorageMinVersion?: number;
  logger?: Logger;
}

export class PermissionGate {
  private platform: PlatformEnvironment;
  private scopedStorageMinVersion: number;
  private logger: Logger;

  constructor(platform: PlatformEnvironment, options: PermissionGateOptions = {}) {
    this.platform = platform;
    this.scopedStorageMinVersion =
      options.scopedStorageMinVersion ?? DEFAULT_SCOPED_STORAGE_MIN_VERSION;
    this.logger = options.logger ?? silentLogger;
  }

  private async checkOrRequest(): Promise<boolean> {
    let status = await this.platform.permissionStatus();
    if (status !== "granted") {
      this.logger.debug("Storage permission not granted, requesting consent");
      status = await this.platform.requestPermission();
    }
    this.logger.debug(`Storage permission ${status}`);
    return status === "granted";
  }

  /**
   * Decide whether the notes directory may be used, prompting for consent
   * where the platform requires it.
   */
  async ensureAccess(): Promise<boolean> {
    switch (this.platform.family) {
      case "android": {
        const version = await this.platform.osVersion();
        if (version >= this.scopedStorageMinVersion) {
          // App-scoped storage, no consent needed
          this.logger.debug(`Android ${version}: app-scoped storage, access granted`);
          return true;
        }
        return this.checkOrRequest();
      }
      case "ios":
        this.logger.debug("iOS: app documents directory, access granted");
        return true;
      default:
        return this.checkOrRequest();
    }
  }

  async assertAccess(): Promise<void> {
    if (!(await this.ensureAccess())) {
      throw new PermissionDeniedError();
    }
  }
}
