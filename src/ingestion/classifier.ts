/**
 * Binary-vs-text heuristic over a leading byte sample.
 *
 * @module src/ingestion/classifier
 */

import { BINARY_PROBE_BYTES } from '../app/constants';

/** Fraction of disallowed bytes above which a sample is binary */
export const NON_TEXT_RATIO_THRESHOLD = 0.3;

/** Control bytes common in text: BEL, BS, TAB, LF, FF, CR, ESC */
const TEXT_CONTROL_BYTES: ReadonlySet<number> = new Set([
  7, 8, 9, 10, 12, 13, 27,
]);

function isTextByte(byte: number): boolean {
  return byte >= 0x20 || TEXT_CONTROL_BYTES.has(byte);
}

/**
 * Decide whether a sample looks binary.
 * Any NUL in the probe window is binary; otherwise the share of bytes
 * outside the text set must stay at or below the threshold.
 */
export function looksBinary(sample: Uint8Array): boolean {
  if (sample.length === 0) {
    return false;
  }

  const probe = sample.subarray(0, BINARY_PROBE_BYTES);
  if (probe.includes(0)) {
    return true;
  }

  let nonText = 0;
  for (const byte of probe) {
    if (!isTextByte(byte)) {
      nonText += 1;
    }
  }
  return nonText / probe.length > NON_TEXT_RATIO_THRESHOLD;
}
