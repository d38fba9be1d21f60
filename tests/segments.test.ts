import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  calculatePriority,
  deriveTitle,
  translatePath,
  translateSegment,
} from '../src/routing/segments.js';

test('Segments - conventions resolve in precedence order', () => {
  assert.deepEqual(translateSegment('[[...slug]]'), { kind: 'wildcard', name: 'slug', optional: true });
  assert.deepEqual(translateSegment('[...slug]'), { kind: 'wildcard', name: 'slug', optional: false });
  assert.deepEqual(translateSegment('(admin)'), { kind: 'group', name: 'admin' });
  assert.deepEqual(translateSegment('[id]'), { kind: 'param', name: 'id' });
  assert.deepEqual(translateSegment('_components'), { kind: 'skip' });
  assert.deepEqual(translateSegment('users'), { kind: 'literal', value: 'users' });
});

test('Segments - literal paths translate to themselves with static priority', () => {
  for (const dir of ['about', 'api/health', 'docs/getting-started/install']) {
    const translated = translatePath(dir);
    assert.equal(translated.pattern, `/${dir}`);
    assert.equal(calculatePriority(translated.pattern), 100);
    assert.deepEqual(translated.params, []);
  }
});

test('Segments - app root translates to slash with empty scope', () => {
  const translated = translatePath('');
  assert.equal(translated.pattern, '/');
  assert.equal(translated.scope, '');
  assert.equal(translated.identifier, 'root');
});

test('Segments - one dynamic segment gives priority 50', () => {
  const translated = translatePath('users/[id]');
  assert.equal(translated.pattern, '/users/{id}');
  assert.deepEqual(translated.params, ['id']);
  assert.equal(translated.catchAll, null);
  assert.equal(calculatePriority(translated.pattern), 50);
  assert.equal(calculatePriority(translatePath('orgs/[org]/repos/[repo]').pattern), 50);
});

test('Segments - any catch-all gives priority 5 regardless of surrounding literals', () => {
  assert.equal(translatePath('docs/[...slug]').pattern, '/docs/*');
  assert.equal(calculatePriority(translatePath('docs/[...slug]').pattern), 5);
  assert.equal(calculatePriority(translatePath('a/b/c/[[...rest]]').pattern), 5);
  assert.equal(calculatePriority(translatePath('[org]/files/[...path]').pattern), 5);
  assert.equal(translatePath('docs/[...slug]').catchAll, 'slug');
});

test('Segments - route groups stay out of the URL but remain in the scope', () => {
  const grouped = translatePath('(admin)/users');
  const plain = translatePath('users');

  assert.equal(grouped.pattern, '/users');
  assert.equal(plain.pattern, '/users');
  assert.equal(grouped.scope, '(admin)/users');
  assert.equal(plain.scope, 'users');
});

test('Segments - private folders mark the path as skipped', () => {
  assert.equal(translatePath('_lib/helpers').skipped, true);
  assert.equal(translatePath('users/_partials').skipped, true);
  assert.equal(translatePath('users').skipped, false);
});

test('Segments - identifiers are JS-safe', () => {
  assert.equal(translatePath('api/users/[id]').identifier, 'api_users_id');
  assert.equal(translatePath('(shop)/cart').identifier, 'shop_cart');
  assert.equal(translatePath('user-list').identifier, 'user_list');
  assert.equal(translatePath('2024/[id]').identifier, '_2024_id');
  assert.equal(translatePath('c#').identifier, 'c_');
});

test('Segments - titles come from the deepest visible segment', () => {
  assert.equal(deriveTitle(''), 'Home');
  assert.equal(deriveTitle('(marketing)'), 'Home');
  assert.equal(deriveTitle('blog-posts'), 'Blog Posts');
  assert.equal(deriveTitle('about/(group)'), 'About');
  assert.equal(deriveTitle('users/[user_id]'), 'User Id');
});
