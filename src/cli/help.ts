import fs from 'node:fs/promises';
import { DEFAULT_HOST, DEFAULT_PORT } from '../config/constants.js';
import { LOG_LEVELS } from '../infrastructure/logging/logger.js';

export function printHelp(): void {
  const helpText = `Usage: declaroute [options]
       declaroute routes [-r <module>...]

Options:
  -p, --port <number>      Port to bind the HTTP server (default: ${DEFAULT_PORT})
  -H, --host <host>        Host interface to bind (default: ${DEFAULT_HOST})
  -l, --listen <host:port> Bind address in one flag; replaces --host and --port
  -r, --routes <module>    Module that declares routes when imported (repeatable)
      --log-level <level>  One of ${LOG_LEVELS.join(', ')} (default: info)
      --expose-errors      Include handler failure messages in 500 responses
      --max-body-size <n>  Largest accepted request body in bytes (default: 1048576)
  -h, --help               Display this help message
  -v, --version            Output the version number

Commands:
  routes                   Print the resolved route table and exit

Configuration is read from ~/.declaroute/config.json, or from the file named
by DECLAROUTE_CONFIG. Command-line options take precedence.
`;
  process.stdout.write(helpText);
}

export async function readPackageVersion(): Promise<string> {
  const raw = await fs.readFile(new URL('../../package.json', import.meta.url), 'utf8');
  const pkg: unknown = JSON.parse(raw);
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export async function printVersion(): Promise<void> {
  process.stdout.write(`${await readPackageVersion()}\n`);
}
