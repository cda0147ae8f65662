/**
 * HTTP Request, Response and Context Tests
 */

import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { test } from 'node:test';
import { HttpContext } from '../../framework/http/context.ts';
import { ErrorCode, PayloadTooLargeError } from '../../framework/http/errors.ts';
import { HttpRequest, MAX_FORM_BYTES } from '../../framework/http/request.ts';
import { HttpResponse } from '../../framework/http/response.ts';
import { createTestRequest, MockResponse } from '../helpers.ts';

// HttpRequest

test('HttpRequest - parses method, path and query', () => {
  const request = new HttpRequest(createTestRequest({ method: 'post', url: '/users/42?sort=name&page=2' }));

  assert.equal(request.method, 'POST');
  assert.equal(request.url, '/users/42?sort=name&page=2');
  assert.equal(request.path, '/users/42');
  assert.equal(request.query.get('sort'), 'name');
  assert.equal(request.query.get('page'), '2');
});

test('HttpRequest - keeps the path undecoded', () => {
  const request = new HttpRequest(createTestRequest({ url: '/files/a%2Fb' }));
  assert.equal(request.path, '/files/a%2Fb');
});

test('HttpRequest - route params can be replaced', () => {
  const request = new HttpRequest(createTestRequest(), { id: '1' });
  assert.equal(request.param('id'), '1');

  request.setParams({ slug: 'intro' });
  assert.deepEqual(request.params, { slug: 'intro' });
  assert.equal(request.param('id'), undefined);
});

test('HttpRequest - header lookup ignores case and joins repeats', () => {
  const request = new HttpRequest(createTestRequest({
    headers: { 'content-type': 'application/json', 'x-tag': ['a', 'b'], 'content-length': '12' },
  }));

  assert.equal(request.header('Content-Type'), 'application/json');
  assert.equal(request.header('X-Tag'), 'a, b');
  assert.equal(request.header('X-Missing'), null);
  assert.equal(request.contentLength, 12);
  assert.equal(new HttpRequest(createTestRequest()).contentLength, -1);
});

test('HttpRequest - client address prefers proxy headers', () => {
  assert.equal(new HttpRequest(createTestRequest({ remoteAddress: '10.0.0.9' })).ip, '10.0.0.9');
  assert.equal(
    new HttpRequest(createTestRequest({ headers: { 'x-forwarded-for': '1.1.1.1, 2.2.2.2 ' } })).ip,
    '2.2.2.2'
  );
  assert.equal(
    new HttpRequest(createTestRequest({ headers: { 'x-real-ip': '3.3.3.3', 'x-forwarded-for': '1.1.1.1' } })).ip,
    '3.3.3.3'
  );
});

test('HttpRequest - parses cookies', () => {
  const request = new HttpRequest(createTestRequest({ headers: { cookie: 'session=abc; theme=dark; token=a=b' } }));

  assert.equal(request.cookie('session'), 'abc');
  assert.equal(request.cookie('theme'), 'dark');
  assert.equal(request.cookie('token'), 'a=b');
  assert.equal(request.cookie('missing'), undefined);
  assert.equal(request.cookies.size, 3);
});

test('HttpRequest - reads the body once', async () => {
  const request = new HttpRequest(createTestRequest({ method: 'POST', body: '{"name":"alice"}' }));

  assert.deepEqual(await request.json(), { name: 'alice' });
  assert.equal(await request.text(), '{"name":"alice"}');
});

test('HttpRequest - form bodies need the urlencoded content type', async () => {
  const form = new HttpRequest(createTestRequest({
    method: 'POST',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body: 'name=bob&email=bob%40example.test',
  }));
  assert.equal((await form.form()).get('email'), 'bob@example.test');

  const plain = new HttpRequest(createTestRequest({ method: 'POST', body: 'name=bob' }));
  assert.equal((await plain.form()).get('name'), null);
});

test('HttpRequest - field looks in params, then form, then query', async () => {
  const request = new HttpRequest(
    createTestRequest({
      method: 'POST',
      url: '/x?name=from-query&empty=',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: 'name=from-form&email=e%40x.test&empty=',
    }),
    { id: '7' }
  );

  assert.equal(await request.field('id'), '7');
  assert.equal(await request.field('name'), 'from-form');
  assert.equal(await request.field('email'), 'e@x.test');
  assert.equal(await request.field('empty'), undefined);
});

test('HttpRequest - field falls back to the query string', async () => {
  const request = new HttpRequest(
    createTestRequest({
      method: 'POST',
      url: '/x?page=3&id=from-query',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: 'page=',
    }),
    { id: '7' }
  );

  assert.equal(await request.field('page'), '3');
  assert.equal(await request.field('id'), '7');
  assert.equal(await request.field('missing'), undefined);
});

test('HttpRequest - fields lists form values before query values', async () => {
  const request = new HttpRequest(createTestRequest({
    method: 'POST',
    url: '/x?tag=q1&tag=q2',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body: 'tag=f1&tag=f2',
  }));

  assert.deepEqual(await request.fields('tag'), ['f1', 'f2', 'q1', 'q2']);
  assert.deepEqual(await request.fields('none'), []);
});

const BOUNDARY = 'test-boundary-1234';

function multipartBody(): string {
  return [
    `--${BOUNDARY}`,
    'Content-Disposition: form-data; name="title"',
    '',
    'quarterly report',
    `--${BOUNDARY}`,
    'Content-Disposition: form-data; name="attachment"; filename="notes.txt"',
    'Content-Type: text/plain',
    '',
    'line one',
    `--${BOUNDARY}--`,
    '',
  ].join('\r\n');
}

test('HttpRequest - multipart bodies expose fields and files', async () => {
  const request = new HttpRequest(createTestRequest({
    method: 'POST',
    url: '/upload?title=from-query',
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
    body: multipartBody(),
  }));

  assert.equal(await request.field('title'), 'quarterly report');
  assert.deepEqual(await request.fields('title'), ['quarterly report', 'from-query']);
  assert.equal(await request.field('attachment'), undefined);

  const file = await request.file('attachment');
  assert.ok(file);
  assert.equal(file.name, 'notes.txt');
  assert.equal(file.type, 'text/plain');
  assert.equal(await file.text(), 'line one');
  assert.equal((await request.files('attachment')).length, 1);
  assert.equal(await request.file('title'), undefined);
});

test('HttpRequest - formData is empty for other content types', async () => {
  const request = new HttpRequest(createTestRequest({
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: '{"title":"x"}',
  }));

  assert.deepEqual([...(await request.formData()).keys()], []);
  assert.equal(await request.field('title'), undefined);
});

test('HttpRequest - formData refuses bodies over the size cap', async () => {
  const request = new HttpRequest(createTestRequest({
    method: 'POST',
    headers: {
      'content-type': `multipart/form-data; boundary=${BOUNDARY}`,
      'content-length': String(MAX_FORM_BYTES + 1),
    },
    body: multipartBody(),
  }));

  await assert.rejects(request.formData(), (error: unknown) => {
    assert.ok(error instanceof PayloadTooLargeError);
    assert.equal(error.status, 413);
    assert.equal(error.limit, 32 * 1024 * 1024);
    return true;
  });
  await assert.rejects(request.field('title'), PayloadTooLargeError);
});

// HttpResponse

test('HttpResponse - json sets type and length', () => {
  const sink = new MockResponse();
  new HttpResponse(sink).status(201).json({ ok: true });

  assert.equal(sink.statusCode, 201);
  assert.equal(sink.body, '{"ok":true}');
  assert.equal(sink.header('Content-Type'), 'application/json; charset=utf-8');
  assert.equal(sink.header('Content-Length'), '11');
  assert.equal(sink.writableEnded, true);
});

test('HttpResponse - an explicit content type is kept', () => {
  const sink = new MockResponse();
  new HttpResponse(sink).type('application/vnd.test+json').json([1]);

  assert.equal(sink.header('Content-Type'), 'application/vnd.test+json');
});

test('HttpResponse - html and text', () => {
  const html = new MockResponse();
  new HttpResponse(html).html('<p>hi</p>');
  assert.equal(html.header('Content-Type'), 'text/html; charset=utf-8');

  const text = new MockResponse();
  new HttpResponse(text).text('héllo');
  assert.equal(text.body, 'héllo');
  assert.equal(text.header('Content-Length'), '6');
});

test('HttpResponse - redirect and noContent', () => {
  const moved = new MockResponse();
  new HttpResponse(moved).redirect('/login');
  assert.equal(moved.statusCode, 302);
  assert.equal(moved.header('Location'), '/login');

  const permanent = new MockResponse();
  new HttpResponse(permanent).redirect('/new', 301);
  assert.equal(permanent.statusCode, 301);

  const empty = new MockResponse();
  new HttpResponse(empty).noContent();
  assert.equal(empty.statusCode, 204);
  assert.equal(empty.body, '');
  assert.equal(empty.writableEnded, true);
});

test('HttpResponse - error writes a plain line', () => {
  const sink = new MockResponse();
  new HttpResponse(sink).error(403, '403 - Forbidden');

  assert.equal(sink.statusCode, 403);
  assert.equal(sink.body, '403 - Forbidden\n');
  assert.equal(sink.header('Content-Type'), 'text/plain; charset=utf-8');
  assert.equal(sink.header('X-Content-Type-Options'), 'nosniff');
});

test('HttpResponse - cookies accumulate', () => {
  const sink = new MockResponse();
  new HttpResponse(sink)
    .cookie('session', 'a b', { path: '/', httpOnly: true, sameSite: 'Lax', maxAge: 60 })
    .clearCookie('old');

  assert.deepEqual(sink.getHeader('Set-Cookie'), [
    'session=a%20b; Max-Age=60; Path=/; HttpOnly; SameSite=Lax',
    'old=; Max-Age=0; Expires=Thu, 01 Jan 1970 00:00:00 GMT',
  ]);
});

test('HttpResponse - success envelope', () => {
  const sink = new MockResponse();
  new HttpResponse(sink, '/api/users').success([{ id: 1 }]);

  assert.equal(sink.statusCode, 200);
  assert.deepEqual(JSON.parse(sink.body), { code: 200, url: '/api/users', desc: 'OK', data: [{ id: 1 }] });
});

test('HttpResponse - failure envelope names known codes', () => {
  const sink = new MockResponse();
  new HttpResponse(sink, '/api/users/x').failure(ErrorCode.ParamError, 'id must be numeric');

  assert.equal(sink.statusCode, 200);
  assert.deepEqual(JSON.parse(sink.body), {
    code: 1001,
    url: '/api/users/x',
    desc: 'ParamError',
    data: 'ParamError: id must be numeric',
  });
});

test('HttpResponse - failure envelope with an unknown code keeps the message', () => {
  const sink = new MockResponse();
  new HttpResponse(sink, '/p').failure(42, { reason: 'custom' });

  assert.deepEqual(JSON.parse(sink.body), { code: 42, url: '/p', desc: 'Error', data: { reason: 'custom' } });
});

test('HttpResponse - file is typed by extension', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'switchyard-file-'));
  try {
    const path = join(dir, 'style.CSS');
    await writeFile(path, 'body{}');
    const sink = new MockResponse();

    await new HttpResponse(sink).file(path);

    assert.equal(sink.body, 'body{}');
    assert.equal(sink.header('Content-Type'), 'text/css; charset=utf-8');
    await assert.rejects(new HttpResponse(new MockResponse()).file(dir), /Not a regular file/);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('HttpResponse - finish ends only once', () => {
  const sink = new MockResponse();
  const response = new HttpResponse(sink);

  response.finish();
  response.finish();
  assert.equal(sink.endCalls, 1);
  assert.equal(response.ended, true);
});

// HttpContext

test('HttpContext - exposes request data and scratch state', () => {
  const req = createTestRequest({ method: 'delete', url: '/items/9?force=1' });
  const res = new MockResponse();
  const ctx = new HttpContext(req, res);

  assert.equal(ctx.method, 'DELETE');
  assert.equal(ctx.path, '/items/9');
  assert.equal(ctx.req, req);
  assert.equal(ctx.res, res);

  ctx.setParams({ id: '9' });
  assert.equal(ctx.param('id'), '9');

  ctx.state.set('user', 'alice');
  assert.equal(ctx.state.get('user'), 'alice');
});

test('HttpContext - envelopes use the request path', () => {
  const res = new MockResponse();
  new HttpContext(createTestRequest({ url: '/health?x=1' }), res).response.success(null);

  assert.equal(JSON.parse(res.body).url, '/health');
});
