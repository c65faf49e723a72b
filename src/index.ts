/*!
 * safemark
 *
 * HTML/XML escaping with a safe-markup type that is never escaped twice.
 *
 * Licensed under the MIT License.
 */

export {
  escape,
  escapeScalarText,
  isHtmlRenderable,
} from './escaper.js';

export {
  Markup,
} from './markup.js';

export {
  stripEntities,
  stripTags,
  unescape,
} from './html-utils.js';

export {
  ESCAPE_RANGE_LIMIT,
} from './escape-table.js';

export type {
  EscapeProbe,
  EscapeScalar,
  EscapeTableEntry,
  HtmlRenderable,
} from './types.js';
