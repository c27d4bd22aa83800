/**
 * Ingestion subsystem - public exports.
 *
 * @module src/ingestion
 */

// Classifier
export { looksBinary, NON_TEXT_RATIO_THRESHOLD } from './classifier';
// Encoding resolver
export type {
  CleanEncodingLabel,
  DecodeResult,
  EncodingLabel,
} from './encoding';
export {
  decodeBytes,
  ENCODING_LABELS,
  incompleteUtf8TailLength,
  splitAtUtf8Boundary,
  splitAtUtf16Boundary,
} from './encoding';
// Gathering
export { gatherFileList } from './gather';
// Pipeline
export { collectFiles, frameHeader, outputBanner } from './pipeline';
// Sinks
export { createMemorySink, type MemorySink, openFileSink } from './sink';
// Types
export type {
  CollectOptions,
  FileOutcome,
  FileOutcomeObserver,
  GatherOptions,
  OutputSink,
  ProgressReporter,
  RunStats,
} from './types';
export { createRunStats } from './types';
