/**
 * Ingestion subsystem types.
 * Defines the output sink, run statistics and pipeline options.
 *
 * @module src/ingestion/types
 */

import type { DiscoveryOptions } from '../discovery/types';
import type { EncodingLabel } from './encoding';

// ─────────────────────────────────────────────────────────────────────────────
// Sink
// ─────────────────────────────────────────────────────────────────────────────

/** Byte destination for framed output; receives UTF-8 only */
export type OutputSink = {
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
};

// ─────────────────────────────────────────────────────────────────────────────
// Progress
// ─────────────────────────────────────────────────────────────────────────────

/** Progress port handed to the pipeline by the caller */
export type ProgressReporter = {
  /** Mark `n` more files as done (default: 1) */
  advance(n?: number): void;
  /** Stop rendering; called once after the last file */
  finish(): void;
};

// ─────────────────────────────────────────────────────────────────────────────
// Run Statistics
// ─────────────────────────────────────────────────────────────────────────────

/** Counters for one run; only the pipeline mutates them */
export type RunStats = {
  totalFiles: number;
  processed: number;
  skippedBinary: number;
  skippedLarge: number;
  errors: number;
  /** Path -> label of the last decoded chunk (when requested) */
  encodings: Map<string, EncodingLabel>;
};

export function createRunStats(): RunStats {
  return {
    totalFiles: 0,
    processed: 0,
    skippedBinary: 0,
    skippedLarge: 0,
    errors: 0,
    encodings: new Map(),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-file Outcome
// ─────────────────────────────────────────────────────────────────────────────

export type FileOutcome = (
  | { status: 'processed'; path: string; encoding: EncodingLabel }
  | { status: 'skipped-large'; path: string; size: number }
  | { status: 'skipped-binary'; path: string }
  | { status: 'error'; path: string; stage: 'sample' | 'content'; message: string }
) & {
  /** close() rejected after the outcome was reached */
  closeError?: string;
};

export type FileOutcomeObserver = (outcome: FileOutcome) => void;

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

/** Pipeline configuration */
export type CollectOptions = {
  /** Files strictly larger are skipped unopened (undefined = no limit) */
  maxSizeBytes?: number;
  /** Fill `RunStats.encodings` */
  recordEncodings?: boolean;
  progress?: ProgressReporter;
  /** Receives the outcome of every file */
  onFileEvent?: FileOutcomeObserver;
};

/** File-list gathering configuration */
export type GatherOptions = DiscoveryOptions & {
  /** Output file to exclude from the list */
  outputPath?: string;
};
