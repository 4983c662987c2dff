export {
  declareRoute,
  declaredRoutes,
  freezeDeclaredRoutes,
  isDeclarationFrozen,
  get,
  post,
  put,
  patch,
  del,
  head,
  options,
} from './core/route-declarations.js';
export { compileTemplate, matchTemplate, splitPath } from './core/path-template.js';
export { buildRouteRegistry, RouteRegistryBuilder } from './core/route-registry.js';
export type { RegistryBuildOptions } from './core/route-registry.js';
export { createDispatcher } from './core/dispatcher.js';
export type { Dispatcher, DispatcherOptions, RouteMatch } from './core/dispatcher.js';
export { createRequestListener } from './server/transport.js';
export type { RequestListener, RequestListenerOptions } from './server/transport.js';
export { Server, startServer, parseBindAddress, DEFAULT_HOST, DEFAULT_PORT } from './server/index.js';
export type { ServerHandle, ServerOptions, StartServerOptions, BindAddress } from './server/index.js';
export * from './infrastructure/errors/index.js';
export { createLogger, createConsoleLogger, createSilentLogger } from './infrastructure/logging/logger.js';
export type { Logger, LogLevel, LoggerOptions } from './infrastructure/logging/logger.js';
export * from './types/routing.js';
