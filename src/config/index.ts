/**
 * Config module public API.
 *
 * @module src/config
 */

export { createDefaultConfig } from './defaults';
// Loading
export {
  type LoadError,
  type LoadResult,
  loadConfig,
  loadConfigFromPath,
  resolveConfigPath,
} from './loader';

// Path utilities
export {
  defaultOutputFileName,
  expandPath,
  fileTimestamp,
  pathExists,
  resolveOutputPath,
  toAbsolutePath,
} from './paths';
// Types and schemas
export {
  CONFIG_VERSION,
  type Config,
  ConfigSchema,
  type Defaults,
  DefaultsSchema,
  depthSchema,
  maxSizeMbToBytes,
  type RunSettings,
  RunSettingsSchema,
  sizeMbSchema,
  type SourceSettings,
  SourceSettingsSchema,
} from './types';
