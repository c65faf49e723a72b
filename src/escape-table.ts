import type { EscapeTableEntry } from './types.js';

/**
 * Code points at or above this value are never escaped, whatever the table
 * holds.
 */
export const ESCAPE_RANGE_LIMIT = 63;

const CP_QUOTE = 0x22; // "
const CP_AMP = 0x26; // &
const CP_APOS = 0x27; // '
const CP_LT = 0x3c; // <
const CP_GT = 0x3e; // >

function entry (replacement: string): EscapeTableEntry {
  return Object.freeze({
    replacement,
    extraWidth: replacement.length - 1,
  });
}

/**
 * Code point to entity mapping, built once on module load.
 */
const escapeTable: ReadonlyMap<number, EscapeTableEntry> = new Map([
  [ CP_QUOTE, entry('&#34;') ],
  [ CP_APOS, entry('&#39;') ],
  [ CP_AMP, entry('&amp;') ],
  [ CP_LT, entry('&lt;') ],
  [ CP_GT, entry('&gt;') ],
]);

/**
 * Whether the code point is one of the quote characters that are only
 * escaped when quote escaping is enabled.
 *
 * @param codePoint - Code point (or UTF-16 code unit) to check.
 */
export function isQuote (codePoint: number): boolean {
  return codePoint === CP_QUOTE || codePoint === CP_APOS;
}

/**
 * Look up the escape entry for a code point under the given quotes policy.
 *
 * @param codePoint - Code point (or UTF-16 code unit) to look up.
 * @param quotes - Whether `"` and `'` are escaped.
 * @returns The entry, or `undefined` if the code point passes through as-is.
 */
export function escapeTableEntry (codePoint: number, quotes: boolean): EscapeTableEntry | undefined {
  if (codePoint >= ESCAPE_RANGE_LIMIT) return undefined;
  if (!quotes && isQuote(codePoint)) return undefined;
  return escapeTable.get(codePoint);
}

/**
 * Extra code units an escaped code point adds to the output, `0` if the code
 * point is not escaped.
 *
 * @param codePoint - Code point (or UTF-16 code unit) to look up.
 * @param quotes - Whether `"` and `'` are escaped.
 */
export function extraWidth (codePoint: number, quotes: boolean): number {
  return escapeTableEntry(codePoint, quotes)?.extraWidth ?? 0;
}
