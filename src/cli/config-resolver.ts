import path from 'node:path';
import { DEFAULT_HOST, DEFAULT_LOG_LEVEL, DEFAULT_PORT, MAX_REQUEST_BODY_SIZE } from '../config/constants.js';
import { parseBindAddress } from '../server/index.js';
import type { FileConfig, ParsedArgs, ResolvedConfig } from './types.js';

function resolveValue<T>(
  provided: boolean,
  cliValue: T,
  configValue: T | undefined,
  defaultValue: T,
): T {
  if (provided) {
    return cliValue;
  }
  return configValue ?? defaultValue;
}

/**
 * Merges CLI arguments over file config over defaults. `--listen` replaces
 * both host and port. Route module paths resolve against `cwd`.
 */
export function resolveConfig(
  args: ParsedArgs,
  fileConfig: FileConfig,
  cwd: string = process.cwd(),
): ResolvedConfig {
  const { _provided: provided } = args;
  const fc = fileConfig;

  let host = resolveValue(provided['host'] ?? false, args.host, fc.host, DEFAULT_HOST);
  let port = resolveValue(provided['port'] ?? false, args.port, fc.port, DEFAULT_PORT);
  if (args.listen) {
    ({ host, port } = parseBindAddress(args.listen));
  }

  const routeInputs = args.routes.length > 0 ? args.routes : fc.routes ?? [];
  const routes = routeInputs.map((entry) => path.resolve(cwd, entry));

  const logLevel = args.logLevel ?? fc.logLevel ?? DEFAULT_LOG_LEVEL;
  const exposeErrors = args.exposeErrors || (fc.exposeErrors ?? false);
  const maxBodySize = args.maxBodySize ?? fc.maxBodySize ?? MAX_REQUEST_BODY_SIZE;

  return {
    port,
    host,
    routes,
    logLevel,
    exposeErrors,
    maxBodySize,
  };
}
