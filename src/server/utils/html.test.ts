import { describe, it, expect } from 'vitest';
import { escapeHtml, toScriptJson } from './html.js';

describe('escapeHtml', () => {
  it('escapes markup and quote characters', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#039;Jerry&#039;&lt;/a&gt;'
    );
  });

  it('escapes ampersands of existing entities', () => {
    expect(escapeHtml('&lt;')).toBe('&amp;lt;');
  });
});

describe('toScriptJson', () => {
  it('escapes characters that could close or confuse a script block', () => {
    expect(toScriptJson({ text: '</script>&\u2028' })).toBe('{"text":"\\u003c/script\\u003e\\u0026\\u2028"}');
  });

  it('still parses back to the original value', () => {
    const value = { road: '<A-1> & N-2', km: 12.5 };
    expect(JSON.parse(toScriptJson(value))).toEqual(value);
  });
});
