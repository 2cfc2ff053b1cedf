/**
 * Route Group Tests
 */

import { afterEach, expect, test, vi } from 'vitest';
import { AddressError, RouteConfigError } from '../../framework/errors.ts';
import type { Handler, Middleware } from '../../framework/http/types.ts';
import { get, testRouter } from '../helpers.ts';

const calls: string[] = [];

const record = (name: string): Middleware => () => {
  calls.push(name);
};

afterEach(() => {
  calls.length = 0;
});

test('Group - global then group middleware, then the handler', async () => {
  const { root } = testRouter();
  root.use(record('A'));
  const api = root.group('/api', record('B'));
  api.use(record('C'));
  api.get('/users', (ctx) => {
    calls.push('handler');
    ctx.write('users');
  });

  const response = await root.handle(get('/api/users'));

  expect(response.status).toBe(200);
  expect(await response.text()).toBe('users');
  expect(calls).toEqual(['A', 'B', 'C', 'handler']);
});

test('Group - routes outside a group skip its middleware', async () => {
  const { root } = testRouter();
  root.use(record('A'));
  root.group('/api', record('B'));
  root.get('/health', () => {
    calls.push('handler');
  });

  await root.handle(get('/health'));

  expect(calls).toEqual(['A', 'handler']);
});

test('Group - nested groups run only their own chain', async () => {
  const { root } = testRouter();
  root.use(record('global'));
  const api = root.group('/api', record('api'));
  const v1 = api.group('/v1', record('v1'));
  v1.get('/items', () => {
    calls.push('handler');
  });

  await root.handle(get('/v1/items'));

  expect(calls).toEqual(['global', 'v1', 'handler']);
});

test('Group - a nested group takes its own pattern as prefix', async () => {
  const { root } = testRouter();
  const v1 = root.group('/api').group('/v1');
  v1.get('/items', (ctx) => ctx.write('items'));

  const nested = await root.handle(get('/v1/items'));
  const joined = await root.handle(get('/api/v1/items'));

  expect(v1.prefix).toBe('/v1');
  expect(nested.status).toBe(200);
  expect(await nested.text()).toBe('items');
  expect(joined.status).toBe(404);
  expect(root.routes()).toEqual([{ method: 'GET', path: '/v1/items' }]);
});

test('Group - middleware added after a route still runs for it', async () => {
  const { root } = testRouter();
  root.get('/late', () => {
    calls.push('handler');
  });
  root.use(record('late'));

  await root.handle(get('/late'));

  expect(calls).toEqual(['late', 'handler']);
});

test('Group - middleware cannot stop the chain', async () => {
  const { root } = testRouter();
  root.use((ctx) => {
    ctx.res.status(401);
    ctx.write('denied;');
  });
  root.get('/secret', (ctx) => {
    ctx.write('secret');
  });

  const response = await root.handle(get('/secret'));

  expect(response.status).toBe(401);
  expect(await response.text()).toBe('denied;secret');
});

test('Group - async middleware is awaited in order', async () => {
  const { root } = testRouter();
  root.use(async () => {
    await new Promise((resolve) => setTimeout(resolve, 5));
    calls.push('slow');
  });
  root.use(record('fast'));
  root.get('/', () => {
    calls.push('handler');
  });

  await root.handle(get('/'));

  expect(calls).toEqual(['slow', 'fast', 'handler']);
});

test('Group - wrong method gets 404', async () => {
  const { root } = testRouter();
  root.get('/only-get', (ctx) => ctx.write('ok'));

  const response = await root.handle(new Request('http://localhost/only-get', { method: 'POST' }));

  expect(response.status).toBe(404);
  expect(await response.text()).toBe('404 page not found\n');
});

test('Group - GET and POST share a path', async () => {
  const { root } = testRouter();
  root.get('/items', (ctx) => ctx.write('list'));
  root.post('/items', async (ctx) => ctx.write(`created ${await ctx.req.text()}`));

  const listed = await root.handle(get('/items'));
  const created = await root.handle(
    new Request('http://localhost/items', { method: 'POST', body: 'pen' })
  );

  expect(await listed.text()).toBe('list');
  expect(await created.text()).toBe('created pen');
});

test('Group - every method helper registers its method', async () => {
  const { root } = testRouter();
  const echo: Handler = (ctx) => ctx.write(ctx.req.method);
  root.put('/m', echo).patch('/m', echo).delete('/m', echo).options('/m', echo);

  for (const method of ['PUT', 'PATCH', 'DELETE', 'OPTIONS']) {
    const response = await root.handle(new Request('http://localhost/m', { method }));
    expect(await response.text()).toBe(method);
  }
  expect(root.routes().map((route) => route.method)).toEqual(['PUT', 'PATCH', 'DELETE', 'OPTIONS']);
});

test('Group - duplicate method and path throws', () => {
  const { root } = testRouter();
  root.get('/a', () => {});

  expect(() => root.get('/a', () => {})).toThrow(RouteConfigError);
  expect(() => root.get('/a', () => {})).toThrow('Multiple registrations for GET /a');
});

test('Group - same path through a group and the root collides', () => {
  const { root } = testRouter();
  root.group('/api').get('/x', () => {});

  expect(() => root.get('/api/x', () => {})).toThrow('Multiple registrations for GET /api/x');
});

test('Group - invalid group patterns throw', () => {
  const { root } = testRouter();

  expect(() => root.group('')).toThrow(RouteConfigError);
  expect(() => root.group('api')).toThrow(
    'Invalid group pattern "api": it can\'t be empty and has to start with /'
  );
});

test('Group - handler errors become a 500 and are logged', async () => {
  const { root, entries } = testRouter();
  root.get('/fail', () => {
    throw new Error('boom');
  });

  const response = await root.handle(get('/fail'));

  expect(response.status).toBe(500);
  expect(await response.text()).toBe('Internal Server Error');
  expect(entries).toHaveLength(1);
  expect(entries[0].level).toBe('error');
  expect(entries[0].message).toBe('Request error');
  expect(entries[0].error?.message).toBe('boom');
  expect(entries[0].context).toEqual({ method: 'GET', path: '/fail', route: '/fail' });
});

test('Group - middleware errors skip the handler', async () => {
  const { root } = testRouter();
  root.use(() => {
    throw new Error('middleware broke');
  });
  root.get('/', () => {
    calls.push('handler');
  });

  const response = await root.handle(get('/'));

  expect(response.status).toBe(500);
  expect(calls).toEqual([]);
});

test('Group - context values do not leak between concurrent requests', async () => {
  const { root } = testRouter();
  root.use(async (ctx) => {
    const user = ctx.req.query.get('user') ?? '';
    ctx.setContextValue('user', user);
    // The first request waits longest so both are in flight together
    await new Promise((resolve) => setTimeout(resolve, user === 'alice' ? 20 : 1));
  });
  root.get('/whoami', (ctx) => {
    ctx.write(String(ctx.getContextValue('user')));
  });

  const [alice, bob] = await Promise.all([
    root.handle(get('/whoami?user=alice')),
    root.handle(get('/whoami?user=bob')),
  ]);

  expect(await alice.text()).toBe('alice');
  expect(await bob.text()).toBe('bob');
});

test('Group - routes are listed with their full paths', () => {
  const { root } = testRouter();
  root.get('/', () => {});
  root.group('/api').post('/items', () => {});

  expect(root.routes()).toEqual([
    { method: 'GET', path: '/' },
    { method: 'POST', path: '/api/items' },
  ]);
});

test('Group - route table is frozen once listening', async () => {
  const { root, entries } = testRouter();
  const api = root.group('/api');
  root.get('/', () => {});

  const serving = root.listen('127.0.0.1:0');
  await vi.waitFor(() => {
    expect(entries.map((entry) => entry.message)).toContain('listening @127.0.0.1:0');
  });
  expect(root.server?.address()?.address).toBe('127.0.0.1');

  expect(() => root.get('/later', () => {})).toThrow(RouteConfigError);
  expect(() => root.group('/more')).toThrow(RouteConfigError);
  expect(() => root.use(() => {})).toThrow(RouteConfigError);
  expect(() => api.use(() => {})).toThrow(RouteConfigError);
  await expect(root.listen('127.0.0.1:0')).rejects.toThrow(RouteConfigError);

  await root.close();
  await serving;
});

test('Group - a bad listen address leaves the router usable', async () => {
  const { root, entries } = testRouter();

  await expect(root.listen('nonsense')).rejects.toThrow(AddressError);
  expect(root.server).toBeNull();

  root.get('/after', (ctx) => ctx.write('after'));
  const serving = root.listen('127.0.0.1:0');
  await vi.waitFor(() => {
    expect(entries.map((entry) => entry.message)).toContain('listening @127.0.0.1:0');
  });

  await root.close();
  await serving;
  expect(root.routes()).toEqual([{ method: 'GET', path: '/after' }]);
});

test('Group - a failed bind unfreezes the route table', async () => {
  const first = testRouter();
  const serving = first.root.listen('127.0.0.1:0');
  await vi.waitFor(() => {
    expect(first.root.server?.address()).not.toBeNull();
  });
  const port = first.root.server?.address()?.port ?? 0;

  const { root } = testRouter();
  const api = root.group('/api');
  await expect(root.listen(`127.0.0.1:${port}`)).rejects.toMatchObject({ code: 'EADDRINUSE' });

  expect(root.server).toBeNull();
  root.use(() => {});
  api.use(() => {});
  api.get('/late', () => {});
  expect(root.routes()).toEqual([{ method: 'GET', path: '/api/late' }]);

  await first.root.close();
  await serving;
});
