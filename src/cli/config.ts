import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  validatePort,
  validateString,
  validateLogLevel,
  validateBoolean,
  validatePositiveInteger,
  validateStringList,
  pickFirst,
  warnConfig,
} from './validation.js';
import type { FileConfig, NormalizedConfig } from './types.js';

export const CONFIG_DIR_NAME = '.declaroute';
export const CONFIG_FILE_NAME = 'config.json';
export const CONFIG_PATH_ENV = 'DECLAROUTE_CONFIG';

/**
 * `DECLAROUTE_CONFIG` names the config file outright (relative paths resolve
 * against `cwd`); otherwise `~/.declaroute/config.json`. Null when there is no
 * home directory to look in.
 */
export function getConfigFilePath(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
  cwd: string = process.cwd(),
): string | null {
  const explicit = env[CONFIG_PATH_ENV]?.trim();
  if (explicit) {
    return path.resolve(cwd, explicit);
  }
  if (!homeDir) {
    return null;
  }
  return path.join(homeDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function extractNestedObject(config: Record<string, unknown>, key: string): Record<string, unknown> | null {
  const nested = config[key];
  return isRecord(nested) ? nested : null;
}

export function normalizeConfig(rawConfig: unknown, configPath: string): FileConfig {
  if (!isRecord(rawConfig)) {
    if (rawConfig !== undefined) {
      warnConfig(`Ignoring config at ${configPath || 'config'} because it is not a JSON object.`);
    }
    return {};
  }

  const config = rawConfig;
  const normalized: FileConfig = {};
  const server = extractNestedObject(config, 'server');
  const logging = extractNestedObject(config, 'logging');

  // Port
  const port = pickFirst(
    [
      { value: config['port'], name: 'port' },
      { value: server?.['port'], name: 'server.port' },
    ],
    validatePort,
    configPath,
  );
  if (port !== undefined) normalized.port = port;

  // Host
  const host = pickFirst(
    [
      { value: config['host'], name: 'host' },
      { value: server?.['host'], name: 'server.host' },
    ],
    validateString,
    configPath,
  );
  if (host !== undefined) normalized.host = host;

  // Route modules
  const routes = validateStringList(config['routes'], 'routes', configPath);
  if (routes !== undefined) normalized.routes = routes;

  // Logging
  const logLevel = pickFirst(
    [
      { value: config['logLevel'], name: 'logLevel' },
      { value: logging?.['level'], name: 'logging.level' },
    ],
    validateLogLevel,
    configPath,
  );
  if (logLevel !== undefined) normalized.logLevel = logLevel;

  // Error exposure
  const exposeErrors = validateBoolean(config['exposeErrors'], 'exposeErrors', configPath);
  if (exposeErrors !== undefined) normalized.exposeErrors = exposeErrors;

  // Body limit
  const maxBodySize = pickFirst(
    [
      { value: config['maxBodySize'], name: 'maxBodySize' },
      { value: server?.['maxBodySize'], name: 'server.maxBodySize' },
    ],
    validatePositiveInteger,
    configPath,
  );
  if (maxBodySize !== undefined) normalized.maxBodySize = maxBodySize;

  return normalized;
}

function errorCode(error: unknown): string | undefined {
  if (isRecord(error) && typeof error['code'] === 'string') {
    return error['code'];
  }
  return undefined;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function loadConfig(configPath: string | null = getConfigFilePath()): Promise<NormalizedConfig> {
  if (!configPath) {
    return { values: {}, path: null };
  }

  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return { values: {}, path: configPath };
    }
    warnConfig(`Failed to read config at ${configPath}: ${errorText(error)}`);
    return { values: {}, path: configPath };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    warnConfig(`Failed to parse config at ${configPath}: ${errorText(error)}`);
    return { values: {}, path: configPath };
  }

  return { values: normalizeConfig(parsed, configPath), path: configPath };
}
