import type { LogLevel } from '../infrastructure/logging/logger.js';

export interface CliConfig {
  port: number;
  host: string;
  listen: string | null;
  routes: string[];
  logLevel: LogLevel | null;
  exposeErrors: boolean;
  maxBodySize: number | null;
  help: boolean;
  version: boolean;
}

export interface ParsedArgs extends CliConfig {
  _provided: Record<string, boolean>;
}

export interface RoutesCommandOptions {
  routes: string[];
  help: boolean;
}

export interface NormalizedConfig {
  values: FileConfig;
  path: string | null;
}

/**
 * Values accepted from the config file after normalization
 */
export interface FileConfig {
  port?: number;
  host?: string;
  routes?: string[];
  logLevel?: LogLevel;
  exposeErrors?: boolean;
  maxBodySize?: number;
}

export interface ResolvedConfig {
  port: number;
  host: string;
  routes: string[];
  logLevel: LogLevel;
  exposeErrors: boolean;
  maxBodySize: number;
}
