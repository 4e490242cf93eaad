import {describe, expect, it} from 'vitest';

import {accessCookieName, accessCookiePath, renderForbiddenTemplate} from '../index';

describe('access cookies', () => {
  it('percent-encodes the canonical path into the cookie name', () => {
    expect(accessCookieName({cookiePrefix: 'token_gate_', protectedPath: 'protected/'})).toBe('token_gate_protected%2F');
    expect(accessCookieName({cookiePrefix: 'token_gate_', protectedPath: 'blog/<int:year>/<str:slug>/'})).toBe(
      'token_gate_blog%2F%3Cint%3Ayear%3E%2F%3Cstr%3Aslug%3E%2F'
    );
  });

  it('scopes the cookie to the literal part of the pattern', () => {
    expect(accessCookiePath('protected/')).toBe('/protected/');
    expect(accessCookiePath('admin')).toBe('/admin');
    expect(accessCookiePath('blog/<int:year>/<str:slug>/')).toBe('/blog/');
    expect(accessCookiePath('<str:visibility>/<str:post>/')).toBe('/');
  });
});

describe('renderForbiddenTemplate', () => {
  it('substitutes the escaped request path', () => {
    expect(
      renderForbiddenTemplate({template: '<p>No access to {{ path }} ({{path}})</p>', path: '/a<b>&"\''})
    ).toBe('<p>No access to /a&lt;b&gt;&amp;&quot;&#x27; (/a&lt;b&gt;&amp;&quot;&#x27;)</p>');
  });

  it('leaves templates without a placeholder untouched', () => {
    expect(renderForbiddenTemplate({template: '<h1>Forbidden</h1>', path: '/protected/'})).toBe('<h1>Forbidden</h1>');
  });
});
