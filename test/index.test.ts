import { assert } from 'chai';

import * as safemark from '../src/index.js';

import {
  escape,
  Markup,
  stripTags,
  unescape,
} from '../src/index.js';

describe('package entrypoint', function () {
  it('exposes the public API', function () {
    assert.isFunction(safemark.escape);
    assert.isFunction(safemark.escapeScalarText);
    assert.isFunction(safemark.isHtmlRenderable);
    assert.isFunction(safemark.Markup);
    assert.isFunction(safemark.unescape);
    assert.isFunction(safemark.stripEntities);
    assert.isFunction(safemark.stripTags);
    assert.strictEqual(safemark.ESCAPE_RANGE_LIMIT, 63);
  });

  it('escapes user input into markup that is not escaped again', function () {
    const name = '<script>alert("x")</script>';
    const row = new Markup('<td>%s</td>').format(name);

    assert.strictEqual(row.toString(), '<td>&lt;script&gt;alert(&#34;x&#34;)&lt;/script&gt;</td>');
    assert.strictEqual(escape(row), row);
    assert.strictEqual(unescape(stripTags(row.toString())), name);
  });
});
