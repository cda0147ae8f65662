/**
 * Route Trie Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { RouteTrie, type TrieLookup } from '../../framework/router/trie.ts';

function valueOf<T>(result: TrieLookup<T>): T | undefined {
  return result.kind === 'matched' ? result.value : undefined;
}

function add<T>(trie: RouteTrie<T>, method: string, pattern: string, value: T): void {
  assert.equal(trie.insert(method, pattern).setValue(value), true);
}

test('Trie - static lookup', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/users', 'list');

  const result = trie.lookup('GET', '/users');
  assert.equal(result.kind, 'matched');
  assert.equal(valueOf(result), 'list');
  assert.deepEqual(result.params, {});
});

test('Trie - root path', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/', 'home');

  assert.equal(valueOf(trie.lookup('GET', '/')), 'home');
  assert.equal(valueOf(trie.lookup('GET', '')), 'home');
});

test('Trie - methods branch at every depth', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/items', 'get');
  add(trie, 'POST', '/items', 'post');

  assert.equal(valueOf(trie.lookup('GET', '/items')), 'get');
  assert.equal(valueOf(trie.lookup('POST', '/items')), 'post');
  assert.deepEqual(trie.lookup('PUT', '/items'), { kind: 'miss', params: {}, depth: 0 });
  assert.equal(trie.root.children.length, 2);
});

test('Trie - path consumed without a handler', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/a/b', 'ab');

  const result = trie.lookup('GET', '/a');
  assert.equal(result.kind, 'no-handler');
});

test('Trie - miss reports the failing depth', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/a/b', 'ab');

  const result = trie.lookup('GET', '/a/c');
  assert.equal(result.kind, 'miss');
  if (result.kind === 'miss') assert.equal(result.depth, 1);
});

test('Trie - param binds the decoded segment', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/user/:name', 'user');

  const result = trie.lookup('GET', '/user/j%C3%BCrgen');
  assert.equal(valueOf(result), 'user');
  assert.deepEqual(result.params, { name: 'jürgen' });
});

test('Trie - param does not take an empty segment', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/a/:x/b', 'axb');

  assert.equal(valueOf(trie.lookup('GET', '/a/1/b')), 'axb');
  assert.equal(trie.lookup('GET', '/a//b').kind, 'miss');
});

test('Trie - regex segment', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'POST', '/product/{id:[0-9]+}', 'product');

  const hit = trie.lookup('POST', '/product/123');
  assert.equal(valueOf(hit), 'product');
  assert.deepEqual(hit.params, { id: '123' });
  assert.equal(trie.lookup('POST', '/product/abc').kind, 'miss');
});

test('Trie - specificity prefers static over param', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/files/:name', 'param');
  add(trie, 'GET', '/files/latest', 'static');

  assert.equal(valueOf(trie.lookup('GET', '/files/latest')), 'static');
  assert.equal(valueOf(trie.lookup('GET', '/files/other')), 'param');
});

test('Trie - specificity prefers regex over param', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/p/:slug', 'slug');
  add(trie, 'GET', '/p/{id:[0-9]+}', 'id');

  assert.deepEqual(trie.lookup('GET', '/p/12').params, { id: '12' });
  assert.equal(valueOf(trie.lookup('GET', '/p/12')), 'id');
  assert.equal(valueOf(trie.lookup('GET', '/p/ab')), 'slug');
});

test('Trie - registration precedence lets earlier siblings shadow later ones', () => {
  const trie = new RouteTrie<string>({ precedence: 'registration' });
  add(trie, 'GET', '/files/:name', 'param');
  add(trie, 'GET', '/files/latest', 'static');

  assert.equal(valueOf(trie.lookup('GET', '/files/latest')), 'param');
});

test('Trie - no backtracking after a segment is taken', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/a/:x/c', 'param');
  add(trie, 'GET', '/a/b/d', 'static');

  const result = trie.lookup('GET', '/a/b/c');
  assert.equal(result.kind, 'miss');
  if (result.kind === 'miss') assert.equal(result.depth, 2);
  assert.equal(valueOf(trie.lookup('GET', '/a/z/c')), 'param');
});

test('Trie - static segments ignore case by default', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/About', 'about');
  add(trie, 'GET', '/user/:name', 'user');

  assert.equal(valueOf(trie.lookup('GET', '/ABOUT')), 'about');
  assert.deepEqual(trie.lookup('GET', '/USER/Alice').params, { name: 'alice' });
});

test('Trie - regex values are case-folded like the rest of the path', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/tag/{slug:[a-z]+}', 'tag');

  const result = trie.lookup('GET', '/Tag/ABC');
  assert.equal(valueOf(result), 'tag');
  assert.deepEqual(result.params, { slug: 'abc' });
});

test('Trie - case-sensitive mode keeps parameter values as sent', () => {
  const trie = new RouteTrie<string>({ caseSensitive: true });
  add(trie, 'GET', '/user/:name', 'user');

  assert.deepEqual(trie.lookup('GET', '/user/Alice').params, { name: 'Alice' });
});

test('Trie - case-sensitive mode', () => {
  const trie = new RouteTrie<string>({ caseSensitive: true });
  add(trie, 'GET', '/About', 'about');

  assert.equal(valueOf(trie.lookup('GET', '/About')), 'about');
  assert.equal(trie.lookup('GET', '/about').kind, 'miss');
});

test('Trie - terminal value is set once', () => {
  const trie = new RouteTrie<string>();
  const node = trie.insert('GET', '/x');

  assert.equal(node.setValue('first'), true);
  assert.equal(node.setValue('second'), false);
  assert.equal(node.value, 'first');
});

test('Trie - siblings are reused, never duplicated', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/a/b', 'ab');
  add(trie, 'GET', '/a/c', 'ac');
  add(trie, 'GET', '/p/{id:[0-9]+}', 'p');
  add(trie, 'GET', '/p/{id:[0-9]+}/edit', 'edit');

  const [a, p] = trie.root.children;
  assert.equal(trie.root.children.length, 2);
  assert.equal(a.children.length, 2);
  assert.equal(p.children.length, 1);
  assert.equal(p.children[0].fullPath, '/p/{id:[0-9]+}');
  assert.equal(p.children[0].level, 2);
});

test('Trie - onCreate sees only new nodes', () => {
  const trie = new RouteTrie<string>();
  const created: string[] = [];
  const track = (node: { fullPath: string }): void => {
    created.push(node.fullPath);
  };

  trie.insert('GET', '/a/b', track);
  trie.insert('GET', '/a/c', track);

  assert.deepEqual(created, ['/a', '/a/b', '/a/c']);
});

test('Trie - terminals are listed depth-first in registration order', () => {
  const trie = new RouteTrie<string>();
  add(trie, 'GET', '/b', 'b');
  add(trie, 'GET', '/a/x', 'ax');
  add(trie, 'GET', '/a', 'a');

  assert.deepEqual(
    trie.terminals().map((node) => node.value),
    ['b', 'a', 'ax']
  );
});
