/**
 * Multiplexer Tests
 */

import { expect, test } from 'vitest';
import { ServeMux, cleanPath } from '../../framework/router/mux.ts';
import { RouteConfigError } from '../../framework/errors.ts';
import { get } from '../helpers.ts';

const reply = (body: string) => () => new Response(body);

test('ServeMux - exact pattern matches only its path', async () => {
  const mux = new ServeMux();
  mux.handle('/about', reply('about'));

  expect(await (await mux.dispatch(get('/about'))).text()).toBe('about');
  expect((await mux.dispatch(get('/about/team'))).status).toBe(404);
});

test('ServeMux - longest subtree pattern wins', async () => {
  const mux = new ServeMux();
  mux.handle('/', reply('root'));
  mux.handle('/static/', reply('static'));
  mux.handle('/static/img/', reply('img'));

  expect(await (await mux.dispatch(get('/static/img/a.png'))).text()).toBe('img');
  expect(await (await mux.dispatch(get('/static/a.css'))).text()).toBe('static');
  expect(await (await mux.dispatch(get('/anything'))).text()).toBe('root');
});

test('ServeMux - exact pattern beats a subtree', async () => {
  const mux = new ServeMux();
  mux.handle('/', reply('root'));
  mux.handle('/favicon.ico', reply('icon'));

  expect(await (await mux.dispatch(get('/favicon.ico'))).text()).toBe('icon');
});

test('ServeMux - unmatched path gets the plain-text 404', async () => {
  const mux = new ServeMux();
  mux.handle('/a', reply('a'));

  const response = await mux.dispatch(get('/b'));
  expect(response.status).toBe(404);
  expect(response.headers.get('Content-Type')).toBe('text/plain; charset=utf-8');
  expect(response.headers.get('X-Content-Type-Options')).toBe('nosniff');
  expect(await response.text()).toBe('404 page not found\n');
});

test('ServeMux - subtree path without its slash redirects', async () => {
  const mux = new ServeMux();
  mux.handle('/docs/', reply('docs'));

  const response = await mux.dispatch(get('/docs?page=2'));
  expect(response.status).toBe(301);
  expect(response.headers.get('Location')).toBe('/docs/?page=2');
});

test('ServeMux - unclean path redirects to its clean form', async () => {
  const mux = new ServeMux();
  mux.handle('/a/b', reply('ab'));

  const response = await mux.dispatch(get('/a//b'));
  expect(response.status).toBe(301);
  expect(response.headers.get('Location')).toBe('/a/b');
});

test('ServeMux - duplicate pattern throws', () => {
  const mux = new ServeMux();
  mux.handle('/a', reply('a'));

  expect(() => mux.handle('/a', reply('again'))).toThrow(RouteConfigError);
  expect(() => mux.handle('/a', reply('again'))).toThrow('Multiple registrations for /a');
});

test('ServeMux - pattern must start with a slash', () => {
  const mux = new ServeMux();
  expect(() => mux.handle('a', reply('a'))).toThrow('Invalid pattern "a": must start with /');
});

test('ServeMux - frozen mux rejects registrations', () => {
  const mux = new ServeMux();
  mux.setFrozen(true);
  expect(() => mux.handle('/a', reply('a'))).toThrow(RouteConfigError);

  mux.setFrozen(false);
  mux.handle('/a', reply('a'));
  expect(mux.has('/a')).toBe(true);
});

test('ServeMux - patterns are listed in registration order', () => {
  const mux = new ServeMux();
  mux.handle('/b', reply('b'));
  mux.handle('/a/', reply('a'));

  expect(mux.patterns()).toEqual(['/b', '/a/']);
  expect(mux.has('/a/')).toBe(true);
  expect(mux.has('/a')).toBe(false);
});

test('cleanPath - canonical forms', () => {
  expect(cleanPath('')).toBe('/');
  expect(cleanPath('a/b')).toBe('/a/b');
  expect(cleanPath('/a//b/')).toBe('/a/b/');
  expect(cleanPath('/a/./b/../c')).toBe('/a/c');
  expect(cleanPath('/../..')).toBe('/');
  expect(cleanPath('/a/..')).toBe('/');
  expect(cleanPath('/a/../')).toBe('/');
});
