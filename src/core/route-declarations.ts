import { RouteRegistryBuilder } from './route-registry.js';
import type { RegistryBuildOptions } from './route-registry.js';
import type { HttpMethod, RouteDescriptor, RouteHandler, RouteRegistry } from '../types/routing.js';

/**
 * Process-wide collection of declared routes. Modules call `declareRoute` (or
 * one of the method shorthands) while they load; the server freezes the
 * collection into the global registry before it starts listening.
 */
let builder = new RouteRegistryBuilder();

export function declareRoute(method: HttpMethod, template: string, handler: RouteHandler): RouteDescriptor {
  const descriptor: RouteDescriptor = Object.freeze({ method, template, handler });
  builder.add(descriptor);
  return descriptor;
}

export const get = (template: string, handler: RouteHandler): RouteDescriptor =>
  declareRoute('GET', template, handler);
export const post = (template: string, handler: RouteHandler): RouteDescriptor =>
  declareRoute('POST', template, handler);
export const put = (template: string, handler: RouteHandler): RouteDescriptor =>
  declareRoute('PUT', template, handler);
export const patch = (template: string, handler: RouteHandler): RouteDescriptor =>
  declareRoute('PATCH', template, handler);
export const del = (template: string, handler: RouteHandler): RouteDescriptor =>
  declareRoute('DELETE', template, handler);
export const head = (template: string, handler: RouteHandler): RouteDescriptor =>
  declareRoute('HEAD', template, handler);
export const options = (template: string, handler: RouteHandler): RouteDescriptor =>
  declareRoute('OPTIONS', template, handler);

export function declaredRoutes(): readonly RouteDescriptor[] {
  return builder.snapshot();
}

export function isDeclarationFrozen(): boolean {
  return builder.frozen;
}

/**
 * Builds the global registry from everything declared so far. Only the first
 * call compiles; later calls return the same registry and ignore `buildOptions`.
 */
export function freezeDeclaredRoutes(buildOptions?: RegistryBuildOptions): RouteRegistry {
  return builder.freeze(buildOptions);
}

export function __resetRouteDeclarationsForTests(): void {
  builder = new RouteRegistryBuilder();
}
