/**
 * Encoding resolver.
 * Tries a fixed list of text encodings and returns the first that decodes
 * cleanly, falling back to lossy UTF-8.
 *
 * @module src/ingestion/encoding
 */

import { isUtf8 } from 'node:buffer';
import { TextDecoder } from 'node:util';

// ─────────────────────────────────────────────────────────────────────────────
// Labels
// ─────────────────────────────────────────────────────────────────────────────

export const ENCODING_LABELS = [
  'utf-8',
  'utf-8-sig',
  'utf-16',
  'utf-16-le',
  'utf-16-be',
  'latin-1',
  'cp1252',
  'utf-8-replace',
  'latin1-replace',
] as const;

export type EncodingLabel = (typeof ENCODING_LABELS)[number];

/** Labels produced by a clean decode (everything but the lossy fallbacks) */
export type CleanEncodingLabel = Exclude<
  EncodingLabel,
  'utf-8-replace' | 'latin1-replace'
>;

export type DecodeResult = {
  text: string;
  encoding: EncodingLabel;
};

// ─────────────────────────────────────────────────────────────────────────────
// Decoders
// ─────────────────────────────────────────────────────────────────────────────

const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

/**
 * Windows-1252 code points for 0x80-0x9F; everything else matches Latin-1.
 * Zero marks the five bytes the code page leaves unassigned.
 */
const CP1252_HIGH: readonly number[] = [
  0x20ac, 0, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021, 0x02c6, 0x2030,
  0x0160, 0x2039, 0x0152, 0, 0x017d, 0, 0, 0x2018, 0x2019, 0x201c, 0x201d,
  0x2022, 0x2013, 0x2014, 0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, 0, 0x017e,
  0x0178,
];

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lossyUtf8 = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });
const strictUtf16le = new TextDecoder('utf-16le', {
  fatal: true,
  ignoreBOM: true,
});

function latin1(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString(
    'latin1'
  );
}

function cp1252CodePoint(byte: number): number {
  if (byte < 0x80 || byte > 0x9f) {
    return byte;
  }
  return CP1252_HIGH[byte - 0x80] ?? 0;
}

function decodeCp1252(data: Uint8Array): string {
  const units: string[] = [];
  for (const byte of data) {
    const codePoint = cp1252CodePoint(byte);
    if (codePoint === 0 && byte !== 0) {
      throw new RangeError(
        `Byte 0x${byte.toString(16)} is undefined in Windows-1252`
      );
    }
    units.push(String.fromCharCode(codePoint));
  }
  return units.join('');
}

function hasUtf8Bom(data: Uint8Array): boolean {
  return (
    data[0] === UTF8_BOM[0] && data[1] === UTF8_BOM[1] && data[2] === UTF8_BOM[2]
  );
}

/** Byte order announced by a leading UTF-16 BOM */
export function utf16Bom(data: Uint8Array): 'le' | 'be' | null {
  if (data[0] === 0xff && data[1] === 0xfe) {
    return 'le';
  }
  if (data[0] === 0xfe && data[1] === 0xff) {
    return 'be';
  }
  return null;
}

function decodeUtf16(data: Uint8Array, order: 'le' | 'be'): string {
  if (data.length % 2 !== 0) {
    throw new RangeError('Truncated UTF-16 code unit');
  }
  if (order === 'le') {
    return strictUtf16le.decode(data);
  }
  // Swap into little-endian order on a copy
  return strictUtf16le.decode(Buffer.from(data).swap16());
}

/**
 * BOM-less UTF-16 shows up as NULs in the high byte of ASCII code units.
 * `parity` is the offset parity NULs must all sit on (1 = LE, 0 = BE).
 */
function nulsOnParity(data: Uint8Array, parity: 0 | 1): boolean {
  let found = false;
  for (let i = 0; i < data.length; i++) {
    if (data[i] === 0) {
      if (i % 2 !== parity) {
        return false;
      }
      found = true;
    }
  }
  return found;
}

function hasByteInRange(data: Uint8Array, lo: number, hi: number): boolean {
  return data.some((b) => b >= lo && b <= hi);
}

/** No byte falls on one of the five holes Windows-1252 leaves undefined */
function cp1252Plausible(data: Uint8Array): boolean {
  return !data.some((b) => b !== 0 && cp1252CodePoint(b) === 0);
}

type Candidate = {
  label: CleanEncodingLabel;
  /** Structural precondition checked before decoding in the fixed order */
  plausible: (data: Uint8Array) => boolean;
  /** Decode, throwing on malformed input */
  decode: (data: Uint8Array) => string;
};

/** Fixed priority order */
const ENCODING_CANDIDATES: readonly Candidate[] = Object.freeze([
  {
    label: 'utf-8',
    plausible: (data) => !hasUtf8Bom(data),
    decode: (data) => strictUtf8.decode(data),
  },
  {
    label: 'utf-8-sig',
    plausible: hasUtf8Bom,
    decode: (data) =>
      strictUtf8.decode(hasUtf8Bom(data) ? data.subarray(3) : data),
  },
  {
    label: 'utf-16',
    plausible: (data) => utf16Bom(data) !== null,
    decode: (data) => {
      const order = utf16Bom(data);
      if (!order) {
        throw new RangeError('Missing UTF-16 byte order mark');
      }
      return decodeUtf16(data.subarray(2), order);
    },
  },
  {
    label: 'utf-16-le',
    plausible: (data) => utf16Bom(data) === null && nulsOnParity(data, 1),
    decode: (data) => decodeUtf16(data, 'le'),
  },
  {
    label: 'utf-16-be',
    plausible: (data) => utf16Bom(data) === null && nulsOnParity(data, 0),
    decode: (data) => decodeUtf16(data, 'be'),
  },
  {
    label: 'latin-1',
    // C1 bytes go to cp1252 unless it has no mapping for one of them
    plausible: (data) =>
      !hasByteInRange(data, 0x80, 0x9f) || !cp1252Plausible(data),
    decode: latin1,
  },
  {
    label: 'cp1252',
    plausible: cp1252Plausible,
    decode: decodeCp1252,
  },
] satisfies Candidate[]);

function tryCandidate(
  candidate: Candidate,
  data: Uint8Array
): DecodeResult | null {
  try {
    return { text: candidate.decode(data), encoding: candidate.label };
  } catch {
    return null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decode bytes with the first encoding that parses cleanly.
 * Never throws: malformed input falls back to lossy UTF-8.
 *
 * @param preferred - Tried first, without its structural precondition.
 *   Used for chunks after the first of a BOM-marked UTF-16 file.
 */
export function decodeBytes(
  data: Uint8Array,
  preferred?: CleanEncodingLabel
): DecodeResult {
  if (preferred) {
    const candidate = ENCODING_CANDIDATES.find((c) => c.label === preferred);
    const result = candidate ? tryCandidate(candidate, data) : null;
    if (result) {
      return result;
    }
  }

  for (const candidate of ENCODING_CANDIDATES) {
    if (!candidate.plausible(data)) {
      continue;
    }
    const result = tryCandidate(candidate, data);
    if (result) {
      return result;
    }
  }

  try {
    return { text: lossyUtf8.decode(data), encoding: 'utf-8-replace' };
  } catch {
    return {
      text: latin1(data),
      encoding: 'latin1-replace',
    };
  }
}

/**
 * Length of an incomplete UTF-8 sequence at the end of `data` (0-3).
 */
export function incompleteUtf8TailLength(data: Uint8Array): number {
  const end = data.length;
  for (let back = 1; back <= Math.min(4, end); back++) {
    const byte = data[end - back];
    if (byte === undefined) {
      return 0;
    }
    if (byte < 0x80) {
      return 0;
    }
    if (byte >= 0xc0) {
      let need = 0;
      if (byte >= 0xf0 && byte <= 0xf7) {
        need = 4;
      } else if (byte >= 0xe0) {
        need = 3;
      } else {
        need = 2;
      }
      return back < need ? back : 0;
    }
    // Continuation byte: keep scanning back for the lead byte
  }
  return 0;
}

/**
 * Split a chunk so that a UTF-8 character cut by the read boundary moves
 * into the next chunk. Only splits when the remaining head is valid UTF-8;
 * other encodings are returned unchanged.
 */
export function splitAtUtf8Boundary(
  data: Uint8Array
): [head: Uint8Array, carry: Uint8Array] {
  const tail = incompleteUtf8TailLength(data);
  if (tail === 0) {
    return [data, data.subarray(data.length)];
  }
  const head = data.subarray(0, data.length - tail);
  if (!isUtf8(head)) {
    return [data, data.subarray(data.length)];
  }
  return [head, data.subarray(data.length - tail)];
}

/**
 * Split a UTF-16 chunk so that an odd trailing byte, and a high surrogate
 * whose low half is still unread, move into the next chunk.
 */
export function splitAtUtf16Boundary(
  data: Uint8Array,
  order: 'le' | 'be'
): [head: Uint8Array, carry: Uint8Array] {
  let end = data.length - (data.length % 2);
  const first = data[end - 2];
  const second = data[end - 1];
  if (first !== undefined && second !== undefined) {
    const unit =
      order === 'le' ? (second << 8) | first : (first << 8) | second;
    if (unit >= 0xd800 && unit <= 0xdbff) {
      end -= 2;
    }
  }
  return [data.subarray(0, end), data.subarray(end)];
}
