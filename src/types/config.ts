/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const TargetConfigSchema = z.object({
  url: z.string(),
  token: z.string(),
});

export const MigrationOptionsSchema = z.object({
  dryRun: z.boolean(),
  skipImages: z.boolean(),
  importTag: z.string().min(1),
  favoriteTag: z.string().min(1),
  wantToCookTag: z.string().min(1),
  // Retries with a " (n)" suffix after the first stub attempt collides
  maxRenameAttempts: z.number().int().nonnegative(),
  // Pause between recipes in live runs, in milliseconds
  requestDelay: z.number().int().nonnegative(),
});

export const HttpConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  retries: z.number().int().nonnegative(),
  backoff: z.number().int().nonnegative(), // Base delay, doubled per attempt
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const MigrationConfigSchema = z.object({
  source: z.string(), // Export file or directory to migrate
  target: TargetConfigSchema,
  migration: MigrationOptionsSchema,
  http: HttpConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialMigrationConfigSchema = MigrationConfigSchema.partial().extend({
  target: TargetConfigSchema.partial().optional(),
  migration: MigrationOptionsSchema.partial().optional(),
  http: HttpConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type TargetConfig = z.infer<typeof TargetConfigSchema>;
export type MigrationOptions = z.infer<typeof MigrationOptionsSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type MigrationConfig = z.infer<typeof MigrationConfigSchema>;
export type PartialMigrationConfig = z.infer<typeof PartialMigrationConfigSchema>;

export interface ConfigIssue {
  path: string;
  error: unknown;
}
