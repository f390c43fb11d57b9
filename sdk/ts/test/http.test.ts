import { test } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';

import { ApiPayloadError, ApiRequestError, JsonApiClient } from '../src/index.js';
import { createFakeFetch } from './fake-fetch.js';

const ItemSchema = z.object({ id: z.number(), name: z.string() });

test('resolves relative paths below the base path', async () => {
  const { fetchImpl, calls } = createFakeFetch({
    'https://example.test/api/v2/items/7': { body: { id: 7, name: 'seven' } },
  });
  const client = new JsonApiClient({ baseUrl: 'https://example.test/api/v2', fetchImpl });

  const item = await client.get('/items/7', ItemSchema);

  assert.deepEqual(item, { id: 7, name: 'seven' });
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, 'https://example.test/api/v2/items/7');
  assert.equal(calls[0]?.headers.get('accept'), 'application/json');
  assert.equal(calls[0]?.headers.get('user-agent'), 'gamedata-pipelines/0.1');
});

test('accepts absolute URLs on another path of the same host', async () => {
  const { fetchImpl, calls } = createFakeFetch({
    'https://example.test/other/1/': { body: { id: 1, name: 'one' } },
  });
  const client = new JsonApiClient({ baseUrl: 'https://example.test/api/v2/', fetchImpl });

  await client.get('https://example.test/other/1/', ItemSchema);

  assert.equal(calls[0]?.url, 'https://example.test/other/1/');
});

test('retries a 429 after the Retry-After interval', async () => {
  const { fetchImpl, calls } = createFakeFetch({
    'https://example.test/items/1': [
      { status: 429, body: { error: 'slow down' }, headers: { 'retry-after': '2' } },
      { body: { id: 1, name: 'one' } },
    ],
  });
  const delays: number[] = [];
  const client = new JsonApiClient({
    baseUrl: 'https://example.test/',
    fetchImpl,
    retry: { attempts: 3, backoffMs: 100 },
    delay: async (ms) => {
      delays.push(ms);
    },
  });

  const item = await client.get('items/1', ItemSchema);

  assert.equal(item.name, 'one');
  assert.equal(calls.length, 2);
  assert.deepEqual(delays, [2000]);
});

test('backs off exponentially and gives up after the configured attempts', async () => {
  const { fetchImpl, calls } = createFakeFetch({
    'https://example.test/items/2': { status: 503, body: { error: 'unavailable' } },
  });
  const delays: number[] = [];
  const client = new JsonApiClient({
    baseUrl: 'https://example.test/',
    fetchImpl,
    retry: { attempts: 3, backoffMs: 100 },
    delay: async (ms) => {
      delays.push(ms);
    },
  });

  await assert.rejects(client.get('items/2', ItemSchema), (err: unknown) => {
    assert.ok(err instanceof ApiRequestError);
    assert.equal(err.status, 503);
    assert.equal(err.url, 'https://example.test/items/2');
    assert.deepEqual(err.body, { error: 'unavailable' });
    return true;
  });
  assert.equal(calls.length, 3);
  assert.deepEqual(delays, [100, 200]);
});

test('does not retry statuses outside the retry policy', async () => {
  const { fetchImpl, calls } = createFakeFetch({});
  const client = new JsonApiClient({
    baseUrl: 'https://example.test/',
    fetchImpl,
    retry: { attempts: 5 },
  });

  await assert.rejects(client.get('missing', ItemSchema), /failed with status 404/);
  assert.equal(calls.length, 1);
});

test('rejects payloads that do not match the schema', async () => {
  const { fetchImpl } = createFakeFetch({
    'https://example.test/items/3': { body: { id: 'three', name: 'three' } },
  });
  const client = new JsonApiClient({ baseUrl: 'https://example.test/', fetchImpl });

  await assert.rejects(client.get('items/3', ItemSchema), (err: unknown) => {
    assert.ok(err instanceof ApiPayloadError);
    assert.equal(err.url, 'https://example.test/items/3');
    assert.deepEqual(err.issues[0]?.path, ['id']);
    return true;
  });
});
