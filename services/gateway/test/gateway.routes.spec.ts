import { connect } from 'net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ResourceStore } from '../src/contracts/resourceStore';
import { notFound, type StoreResult } from '../src/errors';
import { initialState, type GatewayState } from '../src/lifecycle/state';
import type { WireError } from '../src/routes/reply';
import { buildApp, type GatewayApp } from '../src/server';
import { MemoryResourceStore } from '../src/storage/memoryResourceStore';
import type { Resource } from '../src/types';
import { Deferred, flush, ONION } from './helpers';

let app: GatewayApp;
let store: ResourceStore;
let state: GatewayState;

beforeEach(async () => {
  store = new MemoryResourceStore();
  state = initialState(['localhost', ONION]);
  app = await buildApp({ store, state });
});

afterEach(async () => {
  await app.close();
});

async function create(title: string, description?: string): Promise<Resource> {
  const res = await app.inject({ method: 'POST', url: '/resource.create', payload: { title, description } });
  expect(res.statusCode).toBe(201);
  return res.json<Resource>();
}

describe('Gateway listener - resource operations', () => {
  it('create -> get roundtrip', async () => {
    const created = await create('Note A', 'first');
    expect(created).toMatchObject({ title: 'Note A', description: 'first', version: 1 });
    expect(created.updated_at).toBe(created.created_at);

    const read = await app.inject({ method: 'GET', url: `/resource.get?id=${encodeURIComponent(created.id)}` });
    expect(read.statusCode).toBe(200);
    expect(read.json<Resource>()).toEqual(created);
  });

  it('list returns resources in creation order', async () => {
    const a = await create('a');
    const b = await create('b');

    const res = await app.inject({ method: 'GET', url: '/resource.list' });
    expect(res.statusCode).toBe(200);
    const { resources } = res.json<{ resources: Resource[] }>();
    expect(resources.map((r) => r.id)).toEqual([a.id, b.id]);
  });

  it('runs the create / update / conflict / delete scenario', async () => {
    const x = await create('Note A', 'first');

    const v2 = await app.inject({
      method: 'POST',
      url: '/resource.update',
      payload: { id: x.id, expected_version: 1, title: 'Note A2' },
    });
    expect(v2.statusCode).toBe(200);
    expect(v2.json<Resource>()).toMatchObject({ version: 2, title: 'Note A2', description: 'first' });

    const conflict = await app.inject({
      method: 'POST',
      url: '/resource.update',
      payload: { id: x.id, expected_version: 1, title: 'Note A3' },
    });
    expect(conflict.statusCode).toBe(409);
    expect(conflict.json<WireError>()).toEqual({
      error: {
        kind: 'VersionConflict',
        message: `resource ${x.id} is at version 2, expected 1`,
        current_version: 2,
      },
    });

    const del = await app.inject({
      method: 'POST',
      url: '/resource.delete',
      payload: { id: x.id, expected_version: 2 },
    });
    expect(del.statusCode).toBe(200);
    expect(del.json()).toEqual({ deleted: true, id: x.id });

    const gone = await app.inject({ method: 'GET', url: `/resource.get?id=${encodeURIComponent(x.id)}` });
    expect(gone.statusCode).toBe(404);
    expect(gone.json<WireError>()).toEqual({
      error: { kind: 'NotFound', message: `resource ${x.id} not found` },
    });
  });
});

describe('Gateway listener - input validation', () => {
  it('rejects a create without a title', async () => {
    const spy = vi.spyOn(store, 'create');
    const res = await app.inject({ method: 'POST', url: '/resource.create', payload: { description: 'x' } });

    expect(res.statusCode).toBe(400);
    expect(res.json<WireError>()).toEqual({ error: { kind: 'InvalidInput', message: 'title: Required' } });
    expect(spy).not.toHaveBeenCalled();
  });

  it('rejects a blank title', async () => {
    const res = await app.inject({ method: 'POST', url: '/resource.create', payload: { title: '   ' } });
    expect(res.statusCode).toBe(400);
    expect(res.json<WireError>().error.message).toBe('title: title must not be empty');
  });

  it('rejects a non-positive expected_version', async () => {
    const x = await create('Note A');
    const res = await app.inject({
      method: 'POST',
      url: '/resource.update',
      payload: { id: x.id, expected_version: 0, title: 'b' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json<WireError>()).toEqual({
      error: { kind: 'InvalidInput', message: 'expected_version: Number must be greater than 0' },
    });
  });

  it('rejects a get without an id', async () => {
    const res = await app.inject({ method: 'GET', url: '/resource.get' });
    expect(res.statusCode).toBe(400);
    expect(res.json<WireError>().error.kind).toBe('InvalidInput');
  });

  it('maps malformed JSON to InvalidInput', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/resource.create',
      headers: { 'content-type': 'application/json' },
      payload: '{"title":',
    });
    expect(res.statusCode).toBe(400);
    expect(res.json<WireError>().error.kind).toBe('InvalidInput');
  });

  it('maps unknown operations to InvalidInput', async () => {
    const res = await app.inject({ method: 'GET', url: '/resource.purge?id=1' });
    expect(res.statusCode).toBe(400);
    expect(res.json<WireError>()).toEqual({
      error: { kind: 'InvalidInput', message: 'unknown operation: GET /resource.purge' },
    });
  });

  it('hides unexpected failures behind a generic 500', async () => {
    vi.spyOn(store, 'list').mockRejectedValue(new Error('disk on fire'));
    const res = await app.inject({ method: 'GET', url: '/resource.list' });
    expect(res.statusCode).toBe(500);
    expect(res.json<WireError>()).toEqual({ error: { kind: 'Internal', message: 'internal error' } });
  });
});

describe('Gateway listener - host admission', () => {
  const rejected = { error: { kind: 'HostRejected', message: 'host not allowed' } };

  it('admits the onion identity and the loopback alias, with or without a port', async () => {
    for (const host of [ONION, ONION.toUpperCase(), `${ONION}:80`, 'localhost:8080']) {
      const res = await app.inject({ method: 'GET', url: '/resource.list', headers: { host } });
      expect(res.statusCode).toBe(200);
    }
  });

  it('rejects other hosts the same way whether or not the resource exists', async () => {
    const x = await create('secret');
    const getSpy = vi.spyOn(store, 'get');

    const existing = await app.inject({
      method: 'GET',
      url: `/resource.get?id=${encodeURIComponent(x.id)}`,
      headers: { host: 'other.onion' },
    });
    const missing = await app.inject({
      method: 'GET',
      url: '/resource.get?id=does-not-exist',
      headers: { host: 'other.onion' },
    });

    expect(existing.statusCode).toBe(403);
    expect(missing.statusCode).toBe(403);
    expect(existing.json()).toEqual(rejected);
    expect(missing.body).toBe(existing.body);
    expect(getSpy).not.toHaveBeenCalled();
  });

  it('rejects before reading the body', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/resource.create',
      headers: { host: 'other.onion', 'content-type': 'application/json' },
      payload: '{"title":',
    });
    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual(rejected);
  });

  it('guards unknown routes and health too', async () => {
    for (const url of ['/health', '/nope']) {
      const res = await app.inject({ method: 'GET', url, headers: { host: '127.0.0.2' } });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual(rejected);
    }
  });

  it('picks up the guard the supervisor swaps in', async () => {
    const before = await app.inject({ method: 'GET', url: '/resource.list', headers: { host: 'late.onion' } });
    expect(before.statusCode).toBe(403);

    state.guard = state.guard.merge(['late.onion']);
    const after = await app.inject({ method: 'GET', url: '/resource.list', headers: { host: 'late.onion' } });
    expect(after.statusCode).toBe(200);
  });
});

describe('Gateway listener - health', () => {
  it('reports the lifecycle phase and public address', async () => {
    const starting = await app.inject({ method: 'GET', url: '/health' });
    expect(starting.json()).toEqual({ status: 'unavailable', phase: 'starting', address: null });

    state.phase = 'ready';
    state.publicAddress = `http://${ONION}/`;
    const ready = await app.inject({ method: 'GET', url: '/health' });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({ status: 'ok', phase: 'ready', address: `http://${ONION}/` });
  });
});

describe('Gateway listener - closing', () => {
  it('serves requests arriving on open connections while closing, not a bare 503', async () => {
    const slowStore = new MemoryResourceStore();
    const started = new Deferred<void>();
    const gate = new Deferred<StoreResult<Resource>>();
    const routed = new Deferred<void>();
    vi.spyOn(slowStore, 'get').mockImplementation(async () => {
      started.resolve();
      return gate.promise;
    });
    vi.spyOn(slowStore, 'list').mockImplementation(async () => {
      routed.resolve();
      return [];
    });
    const closingApp = await buildApp({ store: slowStore, state: initialState(['127.0.0.1']) });
    const listening = await closingApp.listen({ host: '127.0.0.1', port: 0 });

    const socket = connect(Number(new URL(listening).port), '127.0.0.1');
    socket.setEncoding('utf8');
    let received = '';
    socket.on('data', (chunk: string) => {
      received += chunk;
    });
    const socketClosed = new Promise<void>((resolve) => socket.on('close', () => resolve()));

    socket.write('GET /resource.get?id=slow HTTP/1.1\r\nHost: 127.0.0.1\r\n\r\n');
    await started.promise;

    const closed = closingApp.close();
    while (closingApp.server.listening) await flush();

    socket.write('GET /resource.list HTTP/1.1\r\nHost: 127.0.0.1\r\nConnection: close\r\n\r\n');
    await routed.promise;
    gate.resolve(notFound('slow'));

    await socketClosed;
    await closed;

    const statuses = [...received.matchAll(/^HTTP\/1\.1 (\d{3})/gm)].map((match) => match[1]);
    expect(statuses).toEqual(['404', '200']);
    expect(received).toContain('{"error":{"kind":"NotFound","message":"resource slow not found"}}');
    expect(received).toContain('{"resources":[]}');
  });
});
