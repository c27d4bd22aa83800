/**
 * Default config factory for Collate.
 *
 * @module src/config/defaults
 */

import { CONFIG_VERSION, type Config } from './types';

/**
 * Create a default config object.
 * Used when no config file is named.
 */
export function createDefaultConfig(): Config {
  return {
    version: CONFIG_VERSION,
    defaults: {},
  };
}
