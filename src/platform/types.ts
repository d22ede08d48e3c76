export type PlatformFamily = "android" | "ios" | "other";

export type PermissionStatus = "granted" | "denied";

/**
 * Everything the notes core asks of the host platform. Passed in explicitly
 * so the permission gate and the store can run against fakes.
 */
export interface PlatformEnvironment {
  readonly family: PlatformFamily;
  osVersion(): Promise<number>;
  /** Root under which the `Notes` directory lives, or null when unavailable. */
  storageRoot(): Promise<string | null>;
  permissionStatus(): Promise<PermissionStatus>;
  /** May prompt the user and wait for the answer. */
  requestPermission(): Promise<PermissionStatus>;
}
