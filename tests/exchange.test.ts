import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  createPathMatcher,
  decodeBodyText,
  entryFromExchange,
  normalizeHeaders,
  parseStatusList
} from '../src/exchange.js';

test('normalizeHeaders flattens arrays and drops undefined values', () => {
  assert.deepEqual(normalizeHeaders({ accept: '*/*', 'set-cookie': ['a=1', 'b=2'], 'x-empty': undefined }), {
    accept: '*/*',
    'set-cookie': 'a=1, b=2'
  });
});

test('decodeBodyText returns text, null, or a binary marker', () => {
  assert.equal(decodeBodyText(Buffer.from('héllo', 'utf8')), 'héllo');
  assert.equal(decodeBodyText(Buffer.from('')), null);
  assert.equal(decodeBodyText(undefined), null);
  assert.equal(decodeBodyText(Buffer.from([0xff, 0xfe, 0x00])), '<binary 3 bytes>');
});

test('createPathMatcher supports substrings and /regex/', () => {
  assert.equal(createPathMatcher()('/anything'), true);
  assert.equal(createPathMatcher('users')('/api/users/1'), true);
  assert.equal(createPathMatcher('users')('/api/orders'), false);
  assert.equal(createPathMatcher('/^\\/api\\/v\\d+/')('/api/v2/users'), true);
  assert.equal(createPathMatcher('/^\\/api\\/v\\d+/')('/v2/api'), false);
});

test('parseStatusList keeps valid codes only', () => {
  assert.deepEqual(parseStatusList('200, 404,abc,,500'), [200, 404, 500]);
  assert.equal(parseStatusList('abc'), undefined);
  assert.equal(parseStatusList(undefined), undefined);
});

test('entryFromExchange maps a completed exchange', () => {
  const entry = entryFromExchange({
    request: {
      method: 'post',
      url: 'http://api.test/users?page=1&tag=a&tag=b',
      headers: { 'content-type': 'application/json' },
      body: Buffer.from('{"name":"Ada"}')
    },
    response: { status: 201, statusText: 'Created', body: Buffer.from('{"id":7}') },
    latency: 12
  });

  assert.deepEqual(entry.toPayload(), {
    type: 'POST',
    response: '201',
    queryparameter: '{"page":"1","tag":["a","b"]}',
    header: '{"content-type":"application/json"}',
    data: '{"name":"Ada"}',
    response_data: '{"id":7}',
    path: '/users',
    message: 'Created in 12ms',
    curl: "curl -X POST 'http://api.test/users?page=1&tag=a&tag=b' -H 'content-type: application/json' --data '{\"name\":\"Ada\"}'"
  });
});

test('entryFromExchange falls back to the status code when there is no status text', () => {
  const entry = entryFromExchange({
    request: { method: 'GET', url: 'http://api.test/ping', headers: {} },
    response: { status: 204, statusText: '' },
    latency: 5
  });
  assert.equal(entry.message, '204 in 5ms');
  assert.equal(entry.responseData, null);
});

test('entryFromExchange records a failed exchange', () => {
  const entry = entryFromExchange({
    request: { method: 'GET', url: 'http://api.test/ping', headers: {} },
    error: 'fetch failed',
    latency: 3
  });

  assert.deepEqual(entry.toPayload(), {
    type: 'GET',
    response: null,
    queryparameter: null,
    header: '{}',
    data: null,
    response_data: null,
    path: '/ping',
    message: 'fetch failed',
    curl: "curl -X GET 'http://api.test/ping'"
  });
});

test('entryFromExchange leaves binary request bodies out of the curl command', () => {
  const entry = entryFromExchange({
    request: {
      method: 'POST',
      url: 'http://api.test/upload',
      headers: {},
      body: Buffer.from([0xff, 0xfe, 0x00])
    },
    response: { status: 200, statusText: 'OK' },
    latency: 1
  });

  assert.equal(entry.requestData, '<binary 3 bytes>');
  assert.equal(entry.curl, "curl -X POST 'http://api.test/upload'");
});
