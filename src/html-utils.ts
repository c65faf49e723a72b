import type { Markup } from './markup.js';

import { lookupEntity } from './html-entities.js';

const XML_ENTITY_NAMES = new Set([ 'amp', 'apos', 'gt', 'lt', 'quot' ]);

const MAX_CODE_POINT = 0x10ffff;

/**
 * Unescape a string from HTML into plain text.
 *
 * Implementation detail: reverts the entities produced by `escape()`
 * (`&amp;`, `&lt;`, `&gt;`, `&#34;`, `&#39;`) plus `&quot;` and `&apos;`,
 * in a single pass, so `&amp;lt;` becomes `&lt;` and not `<`.
 *
 * @param text The markup or string to unescape.
 * @returns The unescaped string.
 *
 * @example
 * ```ts
 * const safeString = '&lt;script&gt;alert(&#34;XSS&#34;)&lt;/script&gt;';
 * const unsafeString = unescape(safeString);
 * // unsafeString will be '<script>alert("XSS")</script>'
 * ```
 */
export function unescape (text: Markup | string | null | undefined): string {
  if (text === null || text === undefined) return '';
  const s = String(text);
  return s.replace(/&(amp|lt|gt|quot|apos|#34|#39);/g, (_m: string, ent: string) => {
    switch (ent) {
      case 'amp': return '&';
      case 'lt': return '<';
      case 'gt': return '>';
      case 'quot':
      case '#34': return '"';
      default: return "'";
    }
  });
}

/**
 * Replace character and numeric entities by the characters they stand for.
 *
 * Numeric references may omit the trailing `;`. Named references are looked
 * up in the HTML 4 entity table; with `keepXmlEntities` the five XML
 * entities are left alone and unknown names become `&amp;name;`, otherwise
 * unknown names are reduced to the bare name. Numeric references outside the
 * Unicode range are left untouched.
 *
 * @param text The text to process.
 * @param keepXmlEntities Keep `&amp;`, `&lt;`, `&gt;`, `&quot;` and `&apos;`.
 * @returns The text without entities.
 *
 * @example
 * ```ts
 * stripEntities('1 &lt; 2 &hellip;');
 * // '1 < 2 …'
 * stripEntities('1 &lt; 2 &hellip;', true);
 * // '1 &lt; 2 …'
 * ```
 */
export function stripEntities (text: string, keepXmlEntities = false): string {
  return text.replace(/&(?:#(\d+|[xX][0-9a-fA-F]+);?|(\w+);)/g, (m: string, num: string | undefined, name: string | undefined) => {
    if (num !== undefined) {
      const cp = (num[0] === 'x' || num[0] === 'X')
        ? Number.parseInt(num.slice(1), 16)
        : Number.parseInt(num, 10);
      return (cp <= MAX_CODE_POINT) ? String.fromCodePoint(cp) : m;
    }

    const ref = name ?? '';
    if (keepXmlEntities && XML_ENTITY_NAMES.has(ref)) return `&${ref};`;

    const cp = lookupEntity(ref);
    if (cp !== undefined) return String.fromCodePoint(cp);

    return keepXmlEntities ? `&amp;${ref};` : ref;
  });
}

/**
 * Remove comments and tags from markup text.
 *
 * Not an HTML sanitizer: this is a plain pattern replacement of `<!-- ... -->`
 * and `<...>` spans.
 *
 * @param text The text to process.
 * @returns The text content.
 *
 * @example
 * ```ts
 * stripTags('<em>Foo</em> <!-- note -->&amp; Bar');
 * // 'Foo &amp; Bar'
 * ```
 */
export function stripTags (text: string): string {
  return text.replace(/<!--[\s\S]*?-->|<[^>]*>/g, '');
}
