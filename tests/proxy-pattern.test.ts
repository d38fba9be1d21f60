import { test } from 'node:test';
import assert from 'node:assert/strict';

import { compileMatcher, compilePathPattern, PatternCompileError } from '../src/routing/proxy-pattern.js';

test('Proxy pattern - :name* matches zero or more segments under the prefix', () => {
  assert.equal(compilePathPattern('/api/:path*'), '^/api/.*(/.*)?$');

  const matcher = compileMatcher(['/api/:path*']);
  assert.equal(matcher.matches('/api/v1/users/123'), true);
  assert.equal(matcher.matches('/api/'), true);
  assert.equal(matcher.matches('/public/file.js'), false);
});

test('Proxy pattern - wildcard forms match every path', () => {
  for (const pattern of ['*', '/*', '']) {
    assert.equal(compilePathPattern(pattern), '.*');
    const matcher = compileMatcher([pattern]);
    assert.equal(matcher.matches(''), true);
    assert.equal(matcher.matches('/anything/at/all'), true);
  }
});

test('Proxy pattern - empty matcher list fails open', () => {
  const matcher = compileMatcher([]);
  assert.equal(matcher.matches('/'), true);
  assert.equal(matcher.matches('/admin/settings'), true);
  assert.deepEqual(matcher.patterns, []);
});

test('Proxy pattern - :name matches exactly one segment and tolerates trailing content', () => {
  assert.equal(compilePathPattern('/users/:id'), '^/users/([^/]+)(/.*)?$');

  const matcher = compileMatcher(['/users/:id']);
  assert.equal(matcher.matches('/users/42'), true);
  assert.equal(matcher.matches('/users/42/posts'), true);
  assert.equal(matcher.matches('/users/'), false);
});

test('Proxy pattern - :name+ needs at least one character, :name? allows none', () => {
  const plus = compileMatcher(['/files/:path+']);
  assert.equal(plus.matches('/files/'), false);
  assert.equal(plus.matches('/files/a/b'), true);

  const optional = compileMatcher(['/posts/:slug?']);
  assert.equal(compilePathPattern('/posts/:slug?'), '^/posts/([^/]*)(/.*)?$');
  assert.equal(optional.matches('/posts/'), true);
  assert.equal(optional.matches('/posts/hello'), true);
});

test('Proxy pattern - inline groups are copied and other metacharacters escaped', () => {
  assert.equal(compilePathPattern('/docs/(intro|setup)'), '^/docs/(intro|setup)(/.*)?$');
  const group = compileMatcher(['/docs/(intro|setup)']);
  assert.equal(group.matches('/docs/setup'), true);
  assert.equal(group.matches('/docs/other'), false);

  assert.equal(compilePathPattern('/feed.json'), '^/feed\\.json(/.*)?$');
  const literal = compileMatcher(['/feed.json']);
  assert.equal(literal.matches('/feed.json'), true);
  assert.equal(literal.matches('/feedXjson'), false);
});

test('Proxy pattern - regex-looking patterns are used directly and anchored', () => {
  assert.equal(compilePathPattern('/(en|de)/docs/'), '^/(en|de)/docs');

  const matcher = compileMatcher(['/(en|de)/docs/']);
  assert.equal(matcher.matches('/de/docs/intro'), true);
  assert.equal(matcher.matches('/fr/docs'), false);
  assert.equal(compilePathPattern('^/admin'), '^/admin');
});

test('Proxy pattern - any listed pattern may match', () => {
  const matcher = compileMatcher(['/admin/:path*', '/account']);
  assert.equal(matcher.matches('/account/settings'), true);
  assert.equal(matcher.matches('/admin/users'), true);
  assert.equal(matcher.matches('/blog'), false);
});

test('Proxy pattern - malformed patterns throw with the pattern in the message', () => {
  assert.throws(() => compileMatcher(['/ok', '/(unclosed']), (error: unknown) => {
    assert.ok(error instanceof PatternCompileError);
    assert.equal(error.pattern, '/(unclosed');
    assert.match(error.message, /^invalid proxy matcher pattern "\/\(unclosed": /);
    return true;
  });
});
