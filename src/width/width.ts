/**
 * Terminal column width and byte-budget truncation.
 *
 * Byte counts are UTF-8 lengths, the unit the renderer budgets its output
 * in. Widths follow wcwidth conventions: combining marks and format
 * characters take no column, East Asian wide and fullwidth characters take
 * two, everything else one.
 *
 * An unpaired surrogate is the one encoding error a JavaScript string can
 * hold. `charLen` reports it with a negative byte length; every other
 * function counts it as one byte and one column.
 */

import { eastAsianWidth } from "get-east-asian-width";

export interface WidthOptions {
  /** Count East Asian ambiguous-width characters as two columns. */
  ambiguousAsWide?: boolean;
}

/** Size of one character. */
export interface CharSize {
  /** UTF-8 byte length; -1 for an invalid encoding, 0 at end of string. */
  bytes: number;
  /** Display width in columns. */
  width: number;
  /** Length in UTF-16 code units, for slicing. */
  units: number;
}

/** Size of a whole-character prefix chosen by `truncate`. */
export interface TruncateResult {
  bytes: number;
  width: number;
  units: number;
}

const ZERO_WIDTH_RE = /^[\p{Mn}\p{Me}\p{Cf}]$/u;
const CONTROL_RE = /^\p{Cc}$/u;

/**
 * Display width of a single code point.
 */
export function codePointWidth(cp: number, options: WidthOptions = {}): number {
  if (cp < 0x7f) {
    // Printable ASCII and C0 controls alike occupy one column
    return 1;
  }
  const ch = String.fromCodePoint(cp);
  if (CONTROL_RE.test(ch)) return 1;
  if (ZERO_WIDTH_RE.test(ch)) return 0;
  // Hangul Jamo medial vowels and final consonants join the preceding syllable
  if (cp >= 0x1160 && cp <= 0x11ff) return 0;
  return eastAsianWidth(cp, { ambiguousAsWide: options.ambiguousAsWide ?? false });
}

function utf8Length(cp: number): number {
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

/**
 * Byte length and display width of the character starting at `index`.
 */
export function charLen(s: string, index = 0, options: WidthOptions = {}): CharSize {
  const cp = s.codePointAt(index);
  if (cp === undefined) {
    return { bytes: 0, width: 0, units: 0 };
  }
  if (cp >= 0xd800 && cp <= 0xdfff) {
    return { bytes: -1, width: 1, units: 1 };
  }
  return {
    bytes: utf8Length(cp),
    width: codePointWidth(cp, options),
    units: cp > 0xffff ? 2 : 1,
  };
}

/**
 * Like `charLen`, with an invalid character counted as one byte of width one.
 */
export function charSize(s: string, index = 0, options: WidthOptions = {}): CharSize {
  const size = charLen(s, index, options);
  return size.bytes < 0 ? { bytes: 1, width: 1, units: size.units } : size;
}

/**
 * Total display width of `s`.
 */
export function stringWidth(s: string, options: WidthOptions = {}): number {
  let width = 0;
  for (let i = 0; i < s.length; ) {
    const size = charSize(s, i, options);
    width += size.width;
    i += size.units;
  }
  return width;
}

/**
 * Total UTF-8 byte length of `s`.
 */
export function byteLength(s: string): number {
  let bytes = 0;
  for (let i = 0; i < s.length; ) {
    const size = charSize(s, i);
    bytes += size.bytes;
    i += size.units;
  }
  return bytes;
}

/**
 * Longest whole-character prefix of `s` that fits in `maxBytes` bytes and
 * `maxWidth` columns.
 */
export function truncate(
  s: string,
  maxBytes: number,
  maxWidth: number,
  options: WidthOptions = {}
): TruncateResult {
  let bytes = 0;
  let width = 0;
  let units = 0;
  while (units < s.length) {
    const size = charSize(s, units, options);
    if (bytes + size.bytes > maxBytes || width + size.width > maxWidth) {
      break;
    }
    bytes += size.bytes;
    width += size.width;
    units += size.units;
  }
  return { bytes, width, units };
}

/**
 * Slice of `s` kept by `truncate`.
 */
export function truncateText(
  s: string,
  maxBytes: number,
  maxWidth: number,
  options: WidthOptions = {}
): string {
  return s.slice(0, truncate(s, maxBytes, maxWidth, options).units);
}
