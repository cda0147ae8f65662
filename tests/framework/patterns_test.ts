/**
 * Route Pattern Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { InvalidRoutePatternError } from '../../framework/http/errors.ts';
import {
  buildUrl,
  decodeSegment,
  formatSegment,
  joinPaths,
  parsePathParams,
  parseSegment,
  segmentKey,
  splitPath,
} from '../../framework/router/patterns.ts';

test('Patterns - splitPath trims slashes', () => {
  assert.deepEqual(splitPath('/users/42/'), ['users', '42']);
  assert.deepEqual(splitPath('users/42'), ['users', '42']);
  assert.deepEqual(splitPath('/'), ['']);
  assert.deepEqual(splitPath(''), ['']);
});

test('Patterns - splitPath keeps interior empty segments', () => {
  assert.deepEqual(splitPath('/a//b'), ['a', '', 'b']);
});

test('Patterns - joinPaths collapses duplicate slashes', () => {
  assert.equal(joinPaths('/api', '/users'), '/api/users');
  assert.equal(joinPaths('/api/', 'users/'), '/api/users');
  assert.equal(joinPaths('', '/'), '/');
  assert.equal(joinPaths('/api', '/'), '/api');
});

test('Patterns - parseSegment classifies static segments', () => {
  assert.deepEqual(parseSegment('Users'), { kind: 'static', literal: 'users' });
  assert.deepEqual(parseSegment('Users', true), { kind: 'static', literal: 'Users' });
  assert.deepEqual(parseSegment('{id}'), { kind: 'static', literal: '{id}' });
});

test('Patterns - parseSegment classifies params', () => {
  assert.deepEqual(parseSegment(':userId'), { kind: 'param', name: 'userId' });
});

test('Patterns - parseSegment compiles anchored regexes', () => {
  const segment = parseSegment('{id:[0-9]+}');
  assert.equal(segment.kind, 'regex');
  if (segment.kind !== 'regex') return;

  assert.equal(segment.name, 'id');
  assert.equal(segment.source, '[0-9]+');
  assert.equal(segment.matcher.test('123'), true);
  assert.equal(segment.matcher.test('123abc'), false);
  assert.equal(segment.matcher.test('abc123'), false);
});

test('Patterns - regex alternation is anchored as a whole', () => {
  const segment = parseSegment('{fmt:json|xml}');
  if (segment.kind !== 'regex') throw new Error('expected a regex segment');

  assert.equal(segment.matcher.test('json'), true);
  assert.equal(segment.matcher.test('jsonx'), false);
  assert.equal(segment.matcher.test('axml'), false);
});

test('Patterns - regexes ignore case unless case-sensitive', () => {
  const insensitive = parseSegment('{slug:[a-z]+}');
  const sensitive = parseSegment('{slug:[a-z]+}', true);
  if (insensitive.kind !== 'regex' || sensitive.kind !== 'regex') throw new Error('expected regex segments');

  assert.equal(insensitive.matcher.test('ABC'), true);
  assert.equal(sensitive.matcher.test('ABC'), false);
});

test('Patterns - parseSegment rejects malformed segments', () => {
  assert.throws(() => parseSegment(':'), {
    name: 'InvalidRoutePatternError',
    message: "Invalid route pattern ':': parameter name is empty",
  });
  assert.throws(() => parseSegment('{:[0-9]+}'), InvalidRoutePatternError);
  assert.throws(() => parseSegment(':__proto__'), {
    message: "Invalid route pattern ':__proto__': '__proto__' cannot be a parameter name",
  });
  assert.throws(() => parseSegment('{__proto__:[a-z]+}'), InvalidRoutePatternError);
  assert.throws(() => parseSegment('{id:}'), {
    message: "Invalid route pattern '{id:}': regular expression is empty",
  });
  assert.throws(() => parseSegment('{id:[}'), {
    message: "Invalid route pattern '{id:[}': regular expression does not compile",
  });
});

test('Patterns - segmentKey and formatSegment', () => {
  const regex = parseSegment('{id:\\d+}');
  assert.equal(segmentKey(regex), 'id:\\d+');
  assert.equal(formatSegment(regex), '{id:\\d+}');
  assert.equal(segmentKey(parseSegment(':id')), 'id');
  assert.equal(formatSegment(parseSegment(':id')), ':id');
  assert.equal(formatSegment(parseSegment('About')), 'about');
});

test('Patterns - decodeSegment', () => {
  assert.equal(decodeSegment('caf%C3%A9'), 'café');
  assert.equal(decodeSegment('a%20b'), 'a b');
  assert.equal(decodeSegment('plain'), 'plain');
  assert.equal(decodeSegment('%E0%A4%A'), '%E0%A4%A');
});

test('Patterns - parsePathParams lists names in order', () => {
  assert.deepEqual(parsePathParams('/users/:userId/posts/{postId:[0-9]+}'), ['userId', 'postId']);
  assert.deepEqual(parsePathParams('/about'), []);
});

test('Patterns - buildUrl fills and encodes params', () => {
  assert.equal(buildUrl('/users/:name', { name: 'a b' }), '/users/a%20b');
  assert.equal(buildUrl('/product/{id:[0-9]+}', { id: '42' }), '/product/42');
  assert.equal(buildUrl('/', {}), '/');
});

test('Patterns - buildUrl appends a query string', () => {
  assert.equal(buildUrl('/search', {}, { q: 'a b', tag: ['x', 'y'] }), '/search?q=a+b&tag=x&tag=y');
});

test('Patterns - buildUrl rejects missing and invalid values', () => {
  assert.throws(() => buildUrl('/users/:name', {}), {
    message: "Invalid route pattern '/users/:name': missing value for parameter 'name'",
  });
  assert.throws(() => buildUrl('/product/{id:[0-9]+}', { id: 'abc' }), {
    message: "Invalid route pattern '/product/{id:[0-9]+}': value 'abc' does not satisfy {id:[0-9]+}",
  });
});
