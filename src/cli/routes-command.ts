import path from 'node:path';
import { freezeDeclaredRoutes } from '../core/route-declarations.js';
import { LOG_SCOPE } from '../config/constants.js';
import { createConsoleLogger } from '../infrastructure/logging/logger.js';
import { parseRoutesCommandArgs } from './arg-parser.js';
import { loadRouteModules } from './route-loader.js';
import type { ModuleImporter } from './route-loader.js';
import type { RouteRegistry } from '../types/routing.js';

export function printRoutesHelp(): void {
  const helpText = `Usage: declaroute routes [options]

Loads the given route modules, builds the registry and prints the route
table in match order.

Options:
  -r, --routes <module>  Module that declares routes when imported (repeatable)
  -h, --help             Show this help message
`;
  process.stdout.write(helpText);
}

export function formatRouteTable(registry: RouteRegistry): string {
  const entries = registry.entries();
  if (entries.length === 0) {
    return 'No routes declared.\n';
  }

  const methodWidth = Math.max('METHOD'.length, ...entries.map((entry) => entry.method.length));
  const templateWidth = Math.max('TEMPLATE'.length, ...entries.map((entry) => entry.template.length));
  const lines = [
    `${'METHOD'.padEnd(methodWidth)}  ${'TEMPLATE'.padEnd(templateWidth)}  SPECIFICITY`,
    ...entries.map(
      (entry) => `${entry.method.padEnd(methodWidth)}  ${entry.template.padEnd(templateWidth)}  ${entry.specificity}`,
    ),
  ];
  return `${lines.join('\n')}\n`;
}

export async function handleRoutesCommand(
  argv: string[],
  importer?: ModuleImporter,
  cwd: string = process.cwd(),
): Promise<void> {
  const options = parseRoutesCommandArgs(argv);
  if (options.help) {
    printRoutesHelp();
    return;
  }

  await loadRouteModules(
    options.routes.map((entry) => path.resolve(cwd, entry)),
    importer,
  );
  const logger = createConsoleLogger({ level: 'warn', scope: LOG_SCOPE });
  const registry = freezeDeclaredRoutes({ logger });
  process.stdout.write(formatRouteTable(registry));
}
