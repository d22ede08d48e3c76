import { z } from "zod";

export const PlatformConfigSchema = z.object({
  family: z.enum(["auto", "android", "ios", "other"]).default("auto"),
  osVersion: z.number().int().min(0).optional(),
  // First android API level where app-scoped storage needs no consent
  scopedStorageMinVersion: z.number().int().min(0).default(29),
});

export const PermissionsConfigSchema = z.object({
  storageGranted: z.boolean().default(false),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  logFile: z.string().optional(),
});

export const ConfigSchema = z.object({
  storageRoot: z.string().default("~/.filenotes"),
  platform: PlatformConfigSchema.default({}),
  permissions: PermissionsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;
export type PermissionsConfig = z.infer<typeof PermissionsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
