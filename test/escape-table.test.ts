import { assert } from 'chai';

import {
  ESCAPE_RANGE_LIMIT,
  escapeTableEntry,
  extraWidth,
  isQuote,
} from '../src/escape-table.js';

const cp = (ch: string): number => ch.charCodeAt(0);

describe('escape table', function () {
  it('should map the special characters to their entities', function () {
    assert.deepEqual(escapeTableEntry(cp('"'), true), { replacement: '&#34;', extraWidth: 4 });
    assert.deepEqual(escapeTableEntry(cp("'"), true), { replacement: '&#39;', extraWidth: 4 });
    assert.deepEqual(escapeTableEntry(cp('&'), true), { replacement: '&amp;', extraWidth: 4 });
    assert.deepEqual(escapeTableEntry(cp('<'), true), { replacement: '&lt;', extraWidth: 3 });
    assert.deepEqual(escapeTableEntry(cp('>'), true), { replacement: '&gt;', extraWidth: 3 });
  });

  it('should hide quotes when quote escaping is disabled', function () {
    assert.isUndefined(escapeTableEntry(cp('"'), false));
    assert.isUndefined(escapeTableEntry(cp("'"), false));
    assert.strictEqual(extraWidth(cp('"'), false), 0);
    assert.strictEqual(extraWidth(cp('&'), false), 4);
    assert.strictEqual(extraWidth(cp('<'), false), 3);
  });

  it('should report no entry for other code points', function () {
    assert.isUndefined(escapeTableEntry(cp('a'), true));
    assert.isUndefined(escapeTableEntry(cp(' '), true));
    assert.isUndefined(escapeTableEntry(0, true));
    assert.strictEqual(extraWidth(cp('='), true), 0);
  });

  it('should never escape code points at or above the range limit', function () {
    assert.strictEqual(ESCAPE_RANGE_LIMIT, 63);
    assert.isUndefined(escapeTableEntry(ESCAPE_RANGE_LIMIT, true));
    assert.isUndefined(escapeTableEntry(cp('@'), true));
    // fullwidth less-than sign
    assert.isUndefined(escapeTableEntry(0xff1c, true));
    // a code point 256 above `<`
    assert.isUndefined(escapeTableEntry(cp('<') + 256, true));
  });

  it('should freeze the entries', function () {
    const entry = escapeTableEntry(cp('<'), true);
    assert.isTrue(Object.isFrozen(entry));
  });

  it('should identify quotes', function () {
    assert.isTrue(isQuote(cp('"')));
    assert.isTrue(isQuote(cp("'")));
    assert.isFalse(isQuote(cp('`')));
  });
});
