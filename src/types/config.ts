/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

export const ApiConfigSchema = z.object({
  // Empty means "not configured"; the CLI flag must then provide it
  key: z.string(),
});

export const OutputConfigSchema = z.object({
  directory: z.string().min(1),
});

export const SearchConfigSchema = z.object({
  query: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const HarvestConfigSchema = z.object({
  api: ApiConfigSchema,
  output: OutputConfigSchema,
  search: SearchConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialHarvestConfigSchema = z.object({
  api: ApiConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  search: SearchConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
export type PartialHarvestConfig = z.infer<typeof PartialHarvestConfigSchema>;

/**
 * A user or custom config file that failed to load
 */
export interface ConfigIssue {
  path: string;
  error: unknown;
}
