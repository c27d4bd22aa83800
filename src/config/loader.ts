/**
 * Config loading and validation.
 * Loads YAML config and validates against Zod schema.
 *
 * @module src/config/loader
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ENV_CONFIG_FILE } from '../app/constants';
import { expandPath } from './paths';
import { CONFIG_VERSION, type Config, ConfigSchema } from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Result Types
// ─────────────────────────────────────────────────────────────────────────────

export type LoadResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LoadError };

export type LoadError =
  | { code: 'NOT_FOUND'; message: string; path: string }
  | { code: 'PARSE_ERROR'; message: string; details: string }
  | { code: 'VALIDATION_ERROR'; message: string; issues: ZodError['issues'] }
  | {
      code: 'VERSION_MISMATCH';
      message: string;
      found: string;
      expected: string;
    }
  | { code: 'IO_ERROR'; message: string; cause: Error };

// ─────────────────────────────────────────────────────────────────────────────
// Loading Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolve which config file to load, if any.
 * Priority: configPath arg > COLLATE_CONFIG env > none
 */
export function resolveConfigPath(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): string | null {
  const target = configPath ?? env[ENV_CONFIG_FILE];
  if (!target) {
    return null;
  }
  return expandPath(target);
}

/**
 * Load config from a specific file path.
 */
export async function loadConfigFromPath(
  filePath: string
): Promise<LoadResult<Config>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (cause) {
    const err = cause instanceof Error ? cause : new Error(String(cause));
    if ('code' in err && err.code === 'ENOENT') {
      return {
        ok: false,
        error: {
          code: 'NOT_FOUND',
          message: `Config file not found: ${filePath}`,
          path: filePath,
        },
      };
    }
    return {
      ok: false,
      error: {
        code: 'IO_ERROR',
        message: `Failed to read config file: ${filePath}`,
        cause: err,
      },
    };
  }

  // Parse YAML
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (cause) {
    return {
      ok: false,
      error: {
        code: 'PARSE_ERROR',
        message: 'Invalid YAML syntax',
        details: cause instanceof Error ? cause.message : String(cause),
      },
    };
  }

  // Check version before full validation
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    parsed.version !== CONFIG_VERSION
  ) {
    return {
      ok: false,
      error: {
        code: 'VERSION_MISMATCH',
        message: `Config version mismatch. Found "${String(parsed.version)}", expected "${CONFIG_VERSION}"`,
        found: String(parsed.version),
        expected: CONFIG_VERSION,
      },
    };
  }

  // Validate against schema
  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    return {
      ok: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Config validation failed',
        issues: result.error.issues,
      },
    };
  }

  return { ok: true, value: result.data };
}

/**
 * Load the config named by arg or env, or null when none is named.
 * A named file that fails to load is returned as an error.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadResult<Config | null>> {
  const target = resolveConfigPath(configPath, env);
  if (!target) {
    return { ok: true, value: null };
  }
  return loadConfigFromPath(target);
}
