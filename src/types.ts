/**
 * Replacement info for a single escaped code point.
 */
export interface EscapeTableEntry {
  /** Entity written in place of the code point, e.g. `&lt;`. */
  replacement: string;
  /**
   * Code units the replacement adds over the single code point it replaces
   * (`replacement.length - 1`).
   */
  extraWidth: number;
}

/**
 * Values that render their own safe HTML.
 *
 * Anything exposing a zero-argument `toHTML()` is trusted by `escape()`: the
 * method result is returned verbatim, without escaping or re-wrapping.
 */
export interface HtmlRenderable {
  toHTML: () => unknown;
}

/**
 * Optional instrumentation hook for `escapeScalarText()`.
 */
export interface EscapeProbe {
  /**
   * Called once per output buffer allocation with the buffer length in code
   * units. Never called on the fast path.
   */
  onAllocate?: (length: number) => void;
}

/**
 * Values that `escape()` wraps without scanning for special characters.
 */
export type EscapeScalar = number | bigint | boolean | null | undefined;
