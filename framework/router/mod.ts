/**
 * Routing Layer
 *
 * Maps request paths to handlers and groups routes under shared prefixes
 * and middleware.
 */

export { Group, createRouter, type RouterOptions, type RouteInfo } from './group.ts';
export { ServeMux, cleanPath, notFound, redirect, type MuxEntry } from './mux.ts';
export { adaptHandler, MethodTable, type AdapterScope } from './adapter.ts';
