import { LOG_SCOPE } from '../config/constants.js';
import { createConsoleLogger } from '../infrastructure/logging/logger.js';
import { startServer } from '../server/index.js';
import { loadRouteModules } from './route-loader.js';
import type { ResolvedConfig } from './types.js';

interface ServerStarterDependencies {
  startServer: typeof startServer;
  loadRouteModules: typeof loadRouteModules;
}

const defaultDependencies: ServerStarterDependencies = {
  startServer,
  loadRouteModules,
};

let activeDependencies: ServerStarterDependencies = { ...defaultDependencies };

export function __setServerStarterTestOverrides(overrides?: Partial<ServerStarterDependencies>): void {
  activeDependencies = overrides ? { ...defaultDependencies, ...overrides } : { ...defaultDependencies };
}

/**
 * Loads route modules (declaration phase), then starts the server, which
 * freezes the registry before it binds.
 */
export async function startAppServer(config: ResolvedConfig): Promise<void> {
  const logger = createConsoleLogger({ level: config.logLevel, scope: LOG_SCOPE });

  const loaded = await activeDependencies.loadRouteModules(config.routes);
  for (const modulePath of loaded) {
    logger.debug(`Loaded routes from ${modulePath}`);
  }

  const { close } = await activeDependencies.startServer({
    host: config.host,
    port: config.port,
    logger,
    exposeErrors: config.exposeErrors,
    maxBodySize: config.maxBodySize,
  });

  setupShutdownHandlers(close);
}

function setupShutdownHandlers(close: () => Promise<void>): void {
  let shuttingDown = false;

  const shutdown = () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    process.stdout.write('\nShutting down...\n');
    close()
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Error during shutdown: ${message}\n`);
      })
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
