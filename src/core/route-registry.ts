import { compileTemplate, countStaticSegments } from './path-template.js';
import { RegistryBuildError, RegistryFrozenError } from '../infrastructure/errors/index.js';
import { createSilentLogger } from '../infrastructure/logging/logger.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { HTTP_METHODS } from '../types/routing.js';
import type { CompiledTemplate, HttpMethod, RouteDescriptor, RouteEntry, RouteRegistry } from '../types/routing.js';

export interface RegistryBuildOptions {
  /** Warned once per route shadowed by an identical earlier template */
  logger?: Logger;
}

const EMPTY_ENTRIES: readonly RouteEntry[] = Object.freeze([]);

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

function compileEntry(descriptor: RouteDescriptor, order: number): RouteEntry {
  const method = String(descriptor.method).toUpperCase();
  if (!isHttpMethod(method)) {
    throw new RegistryBuildError(
      String(descriptor.method),
      descriptor.template,
      new Error(`unsupported HTTP method "${String(descriptor.method)}"`),
    );
  }
  if (typeof descriptor.handler !== 'function') {
    throw new RegistryBuildError(method, descriptor.template, new Error('handler is not a function'));
  }

  let compiled: CompiledTemplate;
  try {
    compiled = compileTemplate(descriptor.template);
  } catch (error) {
    throw new RegistryBuildError(
      method,
      descriptor.template,
      error instanceof Error ? error : new Error(String(error)),
    );
  }

  return Object.freeze({
    method,
    template: descriptor.template,
    compiled,
    handler: descriptor.handler,
    specificity: countStaticSegments(compiled),
    order,
  });
}

function bySpecificity(a: RouteEntry, b: RouteEntry): number {
  return b.specificity - a.specificity || a.order - b.order;
}

function templateKey(entry: RouteEntry): string {
  return entry.compiled.segments
    .map((segment) => (segment.kind === 'static' ? `/${segment.text}` : '/:'))
    .join('');
}

/**
 * Compiles every descriptor and groups the entries per method, most specific
 * first. Equal specificity keeps declaration order, so the first declared of
 * two overlapping templates wins.
 * @throws {RegistryBuildError} on the first descriptor that fails to compile
 */
export function buildRouteRegistry(
  descriptors: readonly RouteDescriptor[],
  options: RegistryBuildOptions = {},
): RouteRegistry {
  const logger = options.logger ?? createSilentLogger();
  const grouped = new Map<HttpMethod, RouteEntry[]>();
  const seen = new Map<string, RouteEntry>();

  descriptors.forEach((descriptor, index) => {
    const entry = compileEntry(descriptor, index);

    const key = `${entry.method} ${templateKey(entry)}`;
    const shadowing = seen.get(key);
    if (shadowing) {
      logger.warn(
        `Route ${entry.method} ${entry.template} is shadowed by ${shadowing.method} ${shadowing.template} and will never match`,
      );
    } else {
      seen.set(key, entry);
    }

    const list = grouped.get(entry.method) ?? [];
    list.push(entry);
    grouped.set(entry.method, list);
  });

  const table = new Map<string, readonly RouteEntry[]>();
  for (const method of HTTP_METHODS) {
    const list = grouped.get(method);
    if (list) {
      table.set(method, Object.freeze([...list].sort(bySpecificity)));
    }
  }

  const methods = Object.freeze([...table.keys()].filter(isHttpMethod));
  const all = Object.freeze([...table.values()].flat());

  return Object.freeze({
    methods,
    entriesFor(method: string): readonly RouteEntry[] {
      return table.get(method.toUpperCase()) ?? EMPTY_ENTRIES;
    },
    entries(): readonly RouteEntry[] {
      return all;
    },
  });
}

/**
 * Two-phase holder for route descriptors: mutable until `freeze()`, read-only
 * afterwards. `freeze()` is idempotent and always returns the same registry.
 */
export class RouteRegistryBuilder {
  private readonly descriptors: RouteDescriptor[] = [];
  private registry: RouteRegistry | null = null;

  constructor(private readonly options: RegistryBuildOptions = {}) {}

  get frozen(): boolean {
    return this.registry !== null;
  }

  add(descriptor: RouteDescriptor): this {
    if (this.registry) {
      throw new RegistryFrozenError(`register ${descriptor.method} ${descriptor.template}`);
    }
    this.descriptors.push(Object.freeze({ ...descriptor }));
    return this;
  }

  snapshot(): readonly RouteDescriptor[] {
    return [...this.descriptors];
  }

  freeze(options: RegistryBuildOptions = this.options): RouteRegistry {
    if (!this.registry) {
      this.registry = buildRouteRegistry(this.descriptors, options);
    }
    return this.registry;
  }
}
