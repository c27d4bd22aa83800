/**
 * Central constants for Collate - all user-visible identifiers and limits.
 * Renaming Collate is a single-module change by modifying values here.
 *
 * @module src/app/constants
 */

import pkg from '../../package.json';

// ─────────────────────────────────────────────────────────────────────────────
// Brand / Product Identity
// ─────────────────────────────────────────────────────────────────────────────

/** Product name (display) */
export const PRODUCT_NAME = 'Collate';

/** CLI binary name */
export const CLI_NAME = 'collate';

/** Version from package.json (single source of truth) */
export const VERSION = pkg.version;

// ─────────────────────────────────────────────────────────────────────────────
// Environment Variable Names
// ─────────────────────────────────────────────────────────────────────────────

/** Env var naming a config file when --config is absent */
export const ENV_CONFIG_FILE = 'COLLATE_CONFIG';

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

/** Prefix for generated output file names */
export const OUTPUT_FILE_PREFIX = 'collected_files_';

/** Marker line written before each file's path */
export const FRAME_SEPARATOR = '----';

// ─────────────────────────────────────────────────────────────────────────────
// Ingestion Limits
// ─────────────────────────────────────────────────────────────────────────────

/** Default --max-size in megabytes */
export const DEFAULT_MAX_SIZE_MB = 200;

/** Leading bytes read per file for binary sniffing */
export const SAMPLE_BYTES = 8192;

/** Read size for the remainder of a file */
export const CHUNK_BYTES = 65_536;

/** Bytes of the sample the binary heuristic looks at */
export const BINARY_PROBE_BYTES = 1024;

/** Max encodings listed by --encoding-report */
export const ENCODING_REPORT_LIMIT = 10;
