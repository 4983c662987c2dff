import { pathToFileURL } from 'node:url';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

/**
 * Imports each route module in order. Modules register their routes as a side
 * effect of loading, so order here is declaration order in the registry.
 */
export async function loadRouteModules(
  modulePaths: readonly string[],
  importer: ModuleImporter = defaultImporter,
): Promise<string[]> {
  const loaded: string[] = [];
  for (const modulePath of modulePaths) {
    const specifier = pathToFileURL(modulePath).href;
    try {
      await importer(specifier);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load routes from ${modulePath}: ${detail}`, { cause: error });
    }
    loaded.push(modulePath);
  }
  return loaded;
}
