import { Markup } from './markup.js';

import {
  escapeTableEntry,
  extraWidth,
} from './escape-table.js';

import type {
  EscapeProbe,
  EscapeScalar,
  HtmlRenderable,
} from './types.js';

/**
 * Max code units passed to a single `String.fromCharCode` call when decoding
 * the output buffer (keeps the argument list below engine limits).
 */
const DECODE_CHUNK_SIZE = 8192;

/**
 * Type guard for values exposing the `toHTML()` capability.
 *
 * @param value - Value to check.
 */
export function isHtmlRenderable (value: unknown): value is HtmlRenderable {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) return false;
  return 'toHTML' in value && typeof value.toHTML === 'function';
}

function isEscapeScalar (value: unknown): value is EscapeScalar {
  return value === null
    || value === undefined
    || typeof value === 'number'
    || typeof value === 'bigint'
    || typeof value === 'boolean';
}

function decodeBuffer (buf: Uint16Array): string {
  let out = '';
  for (let i = 0; i < buf.length; i += DECODE_CHUNK_SIZE) {
    out += String.fromCharCode(...buf.subarray(i, i + DECODE_CHUNK_SIZE));
  }
  return out;
}

/**
 * Replace the special characters in a string by their entities.
 *
 * `&`, `<` and `>` are always escaped; `"` and `'` only if `quotes` is set.
 * When nothing needs escaping the input string itself is returned and no
 * buffer is allocated.
 *
 * The string is scanned twice: once to measure the exact output length and
 * count the substitutions, once to copy into a buffer of that length.
 *
 * @param text - Text to escape.
 * @param quotes - Whether to escape `"` and `'` as well.
 * @param probe - Optional allocation probe.
 * @returns The escaped text.
 */
export function escapeScalarText (text: string, quotes: boolean, probe?: EscapeProbe): string {
  const len = text.length;

  // measure
  let delta = 0;
  let count = 0;
  for (let i = 0; i < len; i++) {
    const w = extraWidth(text.charCodeAt(i), quotes);
    if (w > 0) {
      delta += w;
      count++;
    }
  }

  if (count === 0) return text;

  const outLen = len + delta;
  const out = new Uint16Array(outLen);
  probe?.onAllocate?.(outLen);

  let outPos = 0;
  let inPos = 0;
  while (count-- > 0) {
    // find next substitution site
    let next = inPos;
    let entry = escapeTableEntry(text.charCodeAt(next), quotes);
    while (!entry) {
      next++;
      entry = escapeTableEntry(text.charCodeAt(next), quotes);
    }

    for (let i = inPos; i < next; i++) {
      out[outPos++] = text.charCodeAt(i);
    }

    const repl = entry.replacement;
    for (let i = 0; i < repl.length; i++) {
      out[outPos++] = repl.charCodeAt(i);
    }

    inPos = next + 1;
  }

  for (let i = inPos; i < len; i++) {
    out[outPos++] = text.charCodeAt(i);
  }

  return decodeBuffer(out);
}

/**
 * Escape a value for HTML/XML output and mark the result as safe.
 *
 * - `Markup` values are returned as-is (never escaped twice).
 * - Numbers, bigints, booleans, `null` and `undefined` are wrapped without
 *   scanning.
 * - Objects with a `toHTML()` method are rendered by that method; its result
 *   is returned unchanged.
 * - Anything else is converted with `String()`, escaped and wrapped.
 *
 * Errors thrown by `String()` or `toHTML()` are not caught.
 *
 * @param text - Value to escape.
 * @param quotes - Whether to escape `"` and `'` as well.
 * @returns Safe markup, or the `toHTML()` result for renderable values. Callers
 *          passing `unknown` get `unknown` back since the value may be renderable.
 *
 * @example
 * ```ts
 * escape('a<b>&c"d\'e').toString();
 * // 'a&lt;b&gt;&amp;c&#34;d&#39;e'
 * ```
 */
export function escape (text: Markup | string | EscapeScalar, quotes?: boolean): Markup;
export function escape<R> (text: { toHTML: () => R }, quotes?: boolean): R;
export function escape (text: unknown, quotes?: boolean): unknown;
export function escape (text: unknown, quotes = true): unknown {
  if (text instanceof Markup) return text;

  if (isEscapeScalar(text)) return new Markup(String(text));

  if (isHtmlRenderable(text)) return text.toHTML();

  const str = (typeof text === 'string') ? text : String(text);
  return new Markup(escapeScalarText(str, quotes));
}
