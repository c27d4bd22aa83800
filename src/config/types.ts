/**
 * Config schema definitions using Zod.
 * Defines the config file shape and the resolved settings for a run.
 *
 * @module src/config/types
 */

import { z } from 'zod';
import { DEFAULT_MAX_SIZE_MB } from '../app/constants';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Current config version */
export const CONFIG_VERSION = '1.0';

/** Non-negative integer depth */
export const depthSchema = z
  .number()
  .int('Depth must be an integer')
  .nonnegative('Depth must be >= 0');

/** Non-negative size in megabytes */
export const sizeMbSchema = z.number().nonnegative('Max size must be >= 0');

// ─────────────────────────────────────────────────────────────────────────────
// Defaults Schema
// ─────────────────────────────────────────────────────────────────────────────

/** Run defaults a config file may set; CLI flags override each one */
export const DefaultsSchema = z.object({
  includeHidden: z.boolean().optional(),
  followSymlinks: z.boolean().optional(),
  /** Deepest directory level (omit for unlimited) */
  maxDepth: depthSchema.optional(),
  /** Size limit in MB (0 disables the limit) */
  maxSizeMb: sizeMbSchema.optional(),
  append: z.boolean().optional(),
  encodingReport: z.boolean().optional(),
});

export type Defaults = z.infer<typeof DefaultsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Config Schema (root)
// ─────────────────────────────────────────────────────────────────────────────

export const ConfigSchema = z.object({
  /** Config schema version */
  version: z.literal(CONFIG_VERSION),

  /** Run defaults */
  defaults: DefaultsSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Resolved Run Settings
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What discovery needs, after flags and file are merged.
 */
export const SourceSettingsSchema = z.object({
  /** Input paths (absolute), in the order given */
  roots: z.array(z.string().min(1)).min(1, 'At least one input is required'),
  includeHidden: z.boolean().default(false),
  followSymlinks: z.boolean().default(false),
  /** Undefined = unlimited */
  maxDepth: depthSchema.optional(),
});

export type SourceSettings = z.infer<typeof SourceSettingsSchema>;

/**
 * Everything a collect run needs.
 */
export const RunSettingsSchema = SourceSettingsSchema.extend({
  /** Destination file (absolute) */
  outputPath: z.string().min(1),
  /** Undefined = no limit */
  maxSizeBytes: z.number().int().nonnegative().optional(),
  append: z.boolean().default(false),
  encodingReport: z.boolean().default(false),
  /** Reserved; processing is sequential */
  workers: z.number().int().positive('Workers must be >= 1').default(1),
});

export type RunSettings = z.infer<typeof RunSettingsSchema>;

/**
 * Convert a size in MB to bytes (undefined = default size, 0 = no limit).
 */
export function maxSizeMbToBytes(
  sizeMb: number | undefined = DEFAULT_MAX_SIZE_MB
): number | undefined {
  if (sizeMb === 0) {
    return undefined;
  }
  return Math.floor(sizeMb * 1024 * 1024);
}
