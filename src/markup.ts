import { escape } from './escaper.js';

import {
  stripEntities,
  stripTags,
  unescape,
} from './html-utils.js';

import type {
  EscapeScalar,
  HtmlRenderable,
} from './types.js';

/**
 * Coerce the result of `escape()` into a string.
 *
 * `escape()` returns `Markup` for everything except renderable values, whose
 * `toHTML()` result is taken as already safe.
 */
function escapedString (value: unknown, quotes = true): string {
  return String(escape(value, quotes));
}

/**
 * Plain object usable as the mapping of named format arguments.
 */
function isFormatMapping (value: unknown): value is Record<string, unknown> {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && !(value instanceof Markup);
}

/**
 * String wrapper marking text as safe for HTML/XML output.
 *
 * `escape()` returns a `Markup` unchanged, so wrapped text is never escaped
 * twice. Operations combining a `Markup` with other values escape those
 * values first and return a new `Markup`.
 *
 * @example
 * ```ts
 * const link = new Markup('<a href="%s">%s</a>').format('/?a=1&b=2', 'Tom & Jerry');
 * // <a href="/?a=1&amp;b=2">Tom &amp; Jerry</a>
 * ```
 */
export class Markup implements HtmlRenderable {
  private readonly text: string;

  /**
   * Wrap text as markup. The text is NOT escaped; use `Markup.escape()` for
   * untrusted input.
   *
   * @param text - Safe text. Converted with `String()`, empty if omitted.
   */
  constructor (text?: unknown) {
    this.text = (text === undefined) ? '' : String(text);
  }

  /**
   * Same as the module level `escape()`.
   */
  static escape (text: Markup | string | EscapeScalar, quotes?: boolean): Markup;
  static escape<R> (text: { toHTML: () => R }, quotes?: boolean): R;
  static escape (text: unknown, quotes?: boolean): unknown;
  static escape (text: unknown, quotes = true): unknown {
    return escape(text, quotes);
  }

  /** Length of the wrapped text in UTF-16 code units. */
  get length (): number {
    return this.text.length;
  }

  toString (): string {
    return this.text;
  }

  valueOf (): string {
    return this.text;
  }

  toJSON (): string {
    return this.text;
  }

  /**
   * Markup renders as itself.
   */
  toHTML (): Markup {
    return this;
  }

  /**
   * Compare the wrapped text with another markup or plain string.
   */
  equals (other: Markup | string): boolean {
    return this.text === String(other);
  }

  /**
   * Append values, escaping every value that is not already markup.
   */
  concat (...others: unknown[]): Markup {
    return new Markup(this.text + others.map((o) => escapedString(o)).join(''));
  }

  /**
   * Join items with this markup as separator, escaping each item.
   *
   * @param items - Items to join.
   * @param escapeQuotes - Whether quotes in the items are escaped.
   */
  join (items: Iterable<unknown>, escapeQuotes = true): Markup {
    const parts: string[] = [];
    for (const item of items) {
      parts.push(escapedString(item, escapeQuotes));
    }
    return new Markup(parts.join(this.text));
  }

  /**
   * Replace placeholders by escaped arguments.
   *
   * - `%s` takes the next positional argument.
   * - `%(name)s` takes the own property `name` of the first argument, which
   *   must be a plain object.
   * - `%%` yields a literal `%`.
   *
   * @example
   * ```ts
   * new Markup('<b>%(user)s</b> wrote %(count)s posts').format({ user: 'A&B', count: 3 });
   * // <b>A&amp;B</b> wrote 3 posts
   * ```
   *
   * @throws {RangeError} if there are fewer arguments than placeholders or a
   *         named argument is missing.
   * @throws {TypeError} if named placeholders are used without a mapping.
   */
  format (...args: unknown[]): Markup {
    let idx = 0;
    const out = this.text.replace(/%%|%(?:\(([^)]*)\))?s/g, (m: string, name: string | undefined) => {
      if (m === '%%') return '%';

      if (name !== undefined) {
        const mapping = args[0];
        if (!isFormatMapping(mapping)) {
          throw new TypeError('Format requires a mapping');
        }
        if (!Object.prototype.hasOwnProperty.call(mapping, name)) {
          throw new RangeError(`Missing format key: ${name}`);
        }
        return escapedString(mapping[name]);
      }

      if (idx >= args.length) {
        throw new RangeError('Not enough arguments for format string');
      }
      return escapedString(args[idx++]);
    });
    return new Markup(out);
  }

  /**
   * Repeat the markup `count` times.
   *
   * @throws {RangeError} for negative or non-integer counts.
   */
  repeat (count: number): Markup {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Invalid repeat count: ${count}`);
    }
    return new Markup(this.text.repeat(count));
  }

  /**
   * Reverse the escaping, returning plain (unsafe) text.
   */
  unescape (): string {
    return unescape(this.text);
  }

  /**
   * Replace character and numeric entities by the characters they stand for.
   *
   * @param keepXmlEntities - Keep `&amp;`, `&lt;`, `&gt;`, `&quot;` and `&apos;`.
   */
  stripEntities (keepXmlEntities = false): Markup {
    return new Markup(stripEntities(this.text, keepXmlEntities));
  }

  /**
   * Remove comments and tags.
   */
  stripTags (): Markup {
    return new Markup(stripTags(this.text));
  }
}
