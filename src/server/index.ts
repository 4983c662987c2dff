import http from 'node:http';
import { DEFAULT_HOST, DEFAULT_PORT, LOG_SCOPE } from '../config/constants.js';
import { createDispatcher } from '../core/dispatcher.js';
import { freezeDeclaredRoutes } from '../core/route-declarations.js';
import { buildRouteRegistry } from '../core/route-registry.js';
import { InvalidBindAddressError } from '../infrastructure/errors/index.js';
import { createConsoleLogger } from '../infrastructure/logging/logger.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import type { RouteDescriptor, RouteRegistry } from '../types/routing.js';
import { createRequestListener } from './transport.js';

export { DEFAULT_HOST, DEFAULT_PORT };

export interface ServerOptions {
  /** Pre-built registry; takes precedence over `descriptors` */
  registry?: RouteRegistry;
  /** Explicit route list; when absent the globally declared routes are frozen */
  descriptors?: readonly RouteDescriptor[];
  logger?: Logger;
  exposeErrors?: boolean;
  maxBodySize?: number;
}

export interface StartServerOptions extends ServerOptions {
  host?: string;
  port?: number;
}

export interface ServerHandle {
  server: http.Server;
  host: string;
  port: number;
  registry: RouteRegistry;
  close: () => Promise<void>;
}

export interface BindAddress {
  host: string;
  port: number;
}

/**
 * Parses `host:port`, `[ipv6]:port` or `:port`.
 */
export function parseBindAddress(address: string): BindAddress {
  const trimmed = address.trim();
  const match = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d+)$/.exec(trimmed);
  if (!match) {
    throw new InvalidBindAddressError(address);
  }

  const host = match[1] ?? match[2] ?? '';
  const port = Number.parseInt(match[3] ?? '', 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidBindAddressError(address);
  }
  return { host: host || DEFAULT_HOST, port };
}

export function resolveRegistry(options: ServerOptions, logger: Logger): RouteRegistry {
  if (options.registry) {
    return options.registry;
  }
  if (options.descriptors) {
    return buildRouteRegistry(options.descriptors, { logger });
  }
  return freezeDeclaredRoutes({ logger });
}

export function describeRoutes(registry: RouteRegistry): string[] {
  return registry.entries().map((entry) => `${entry.method.padEnd(7)} ${entry.template}`);
}

function listen(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

/**
 * Freezes the route registry, then binds the HTTP server. Resolves once the
 * server is listening.
 */
export async function startServer(options: StartServerOptions = {}): Promise<ServerHandle> {
  const logger = options.logger ?? createConsoleLogger({ level: 'info', scope: LOG_SCOPE });
  const host = options.host ?? DEFAULT_HOST;
  const requestedPort = options.port ?? DEFAULT_PORT;

  const registry = resolveRegistry(options, logger);
  for (const line of describeRoutes(registry)) {
    logger.info(`Registered ${line}`);
  }
  if (registry.entries().length === 0) {
    logger.warn('No routes declared; every request will answer 404');
  }

  const dispatcher = createDispatcher(registry, { logger, exposeErrors: options.exposeErrors });
  const listener = createRequestListener(dispatcher, {
    logger,
    exposeErrors: options.exposeErrors,
    maxBodySize: options.maxBodySize,
  });

  const server = http.createServer((req, res) => {
    listener(req, res).catch((error: unknown) => {
      logger.error('Unhandled request failure:', error);
    });
  });

  await listen(server, requestedPort, host);

  const address = server.address();
  const port = address && typeof address === 'object' ? address.port : requestedPort;
  logger.info(`Listening on http://${host.includes(':') ? `[${host}]` : host}:${port}`);

  const close = () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close((error) => (error ? reject(error) : resolve()));
    });

  return { server, host, port, registry, close };
}

/**
 * Single-entry lifecycle: `start` blocks until the server closes.
 */
export class Server {
  private handle: ServerHandle | null = null;

  constructor(private readonly options: ServerOptions = {}) {}

  get address(): BindAddress | null {
    return this.handle ? { host: this.handle.host, port: this.handle.port } : null;
  }

  async start(bindAddress: string): Promise<void> {
    if (this.handle) {
      throw new Error('Server already started');
    }
    const { host, port } = parseBindAddress(bindAddress);
    const handle = await startServer({ ...this.options, host, port });
    this.handle = handle;

    await new Promise<void>((resolve, reject) => {
      handle.server.once('close', resolve);
      handle.server.once('error', reject);
    });
  }

  async stop(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    await handle.close();
  }
}
