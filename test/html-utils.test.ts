import { assert } from 'chai';

import {
  stripEntities,
  stripTags,
  unescape,
} from '../src/html-utils.js';

import { escape } from '../src/escaper.js';
import { lookupEntity } from '../src/html-entities.js';
import { Markup } from '../src/markup.js';

describe('html utils', function () {
  describe('unescape', function () {
    it('should unescape the entities produced by escape', function () {
      const input = '&lt;div&gt;Hello &amp; &#34;World&#34; &#39;!&#39;&lt;/div&gt;';
      assert.strictEqual(unescape(input), '<div>Hello & "World" \'!\'</div>');
    });

    it('should unescape &quot; and &apos; as well', function () {
      assert.strictEqual(unescape('&quot;&apos;'), '"\'');
    });

    it('should unescape in a single pass', function () {
      assert.strictEqual(unescape('&amp;lt;'), '&lt;');
    });

    it('should be inverse of escape for typical inputs', function () {
      const original = '<p class="x">Me & You\'re</p>';
      assert.strictEqual(unescape(escape(original)), original);
    });

    it('should handle empty and nullish input', function () {
      assert.strictEqual(unescape(''), '');
      assert.strictEqual(unescape(null), '');
      assert.strictEqual(unescape(undefined), '');
      assert.strictEqual(unescape(new Markup()), '');
    });

    it('should leave plain strings and other entities unchanged', function () {
      assert.strictEqual(unescape('plain'), 'plain');
      assert.strictEqual(unescape('&nbsp;&#65;'), '&nbsp;&#65;');
    });
  });

  describe('stripEntities', function () {
    it('should replace decimal and hexadecimal references', function () {
      assert.strictEqual(stripEntities('&#65;&#x42;&#X43;'), 'ABC');
    });

    it('should accept numeric references without semicolon', function () {
      assert.strictEqual(stripEntities('&#65 &#x42'), 'A B');
    });

    it('should replace named entities', function () {
      assert.strictEqual(stripEntities('1 &lt; 2 &hellip; &copy;&nbsp;x'), '1 < 2 … ©\u00a0x');
    });

    it('should keep XML entities when asked', function () {
      assert.strictEqual(stripEntities('&amp; &lt; &gt; &quot; &apos; &eacute;', true), '&amp; &lt; &gt; &quot; &apos; é');
    });

    it('should handle unknown names depending on the mode', function () {
      assert.strictEqual(stripEntities('a &foo; b'), 'a foo b');
      assert.strictEqual(stripEntities('a &foo; b', true), 'a &amp;foo; b');
      // &apos; is XML only, not an HTML 4 entity
      assert.strictEqual(stripEntities('&apos;'), 'apos');
    });

    it('should leave out-of-range numeric references untouched', function () {
      assert.strictEqual(stripEntities('&#1114112;'), '&#1114112;');
    });

    it('should leave text without entities unchanged', function () {
      assert.strictEqual(stripEntities('a & b'), 'a & b');
    });
  });

  describe('stripTags', function () {
    it('should remove tags', function () {
      assert.strictEqual(stripTags('<em>Foo</em> &amp; Bar'), 'Foo &amp; Bar');
    });

    it('should remove comments including tags inside them', function () {
      assert.strictEqual(stripTags('a<!-- <b>x</b> -->b'), 'ab');
      assert.strictEqual(stripTags('a<!--\nmulti\nline\n-->b'), 'ab');
    });

    it('should remove tags spanning lines and with attributes', function () {
      assert.strictEqual(stripTags('<a\n  href="/x">link</a>'), 'link');
    });
  });

  describe('lookupEntity', function () {
    it('should find HTML 4 entities case sensitively', function () {
      assert.strictEqual(lookupEntity('amp'), 38);
      assert.strictEqual(lookupEntity('Eacute'), 201);
      assert.strictEqual(lookupEntity('eacute'), 233);
      assert.strictEqual(lookupEntity('euro'), 8364);
      assert.isUndefined(lookupEntity('EUro'));
    });
  });
});
