import { InvalidTemplateError } from '../infrastructure/errors/index.js';
import type { CompiledTemplate, ParamMap, Segment } from '../types/routing.js';

const PARAM_PREFIX = ':';

/**
 * Splits a template or request path on `/`, dropping the empty segment produced
 * by a single leading and a single trailing slash. `/` and `` yield no segments.
 */
export function splitPath(path: string): string[] {
  const parts = path.split('/');
  if (parts.length > 0 && parts[0] === '') {
    parts.shift();
  }
  if (parts.length > 0 && parts[parts.length - 1] === '') {
    parts.pop();
  }
  return parts;
}

export function compileTemplate(template: string): CompiledTemplate {
  const seen = new Set<string>();
  const segments = splitPath(template).map((part): Segment => {
    if (!part) {
      throw new InvalidTemplateError(template, 'empty path segment');
    }
    if (!part.startsWith(PARAM_PREFIX)) {
      return { kind: 'static', text: part };
    }

    const name = part.slice(PARAM_PREFIX.length);
    if (!name) {
      throw new InvalidTemplateError(template, 'empty parameter name');
    }
    if (seen.has(name)) {
      throw new InvalidTemplateError(template, `duplicate parameter "${name}"`);
    }
    seen.add(name);
    return { kind: 'param', name };
  });

  return Object.freeze({ template, segments: Object.freeze(segments) });
}

export function countStaticSegments(compiled: CompiledTemplate): number {
  return compiled.segments.filter((segment) => segment.kind === 'static').length;
}

/**
 * Matches a request path against a compiled template.
 * @returns the parameter bindings, or null when the path does not fit
 */
export function matchTemplate(compiled: CompiledTemplate, path: string): ParamMap | null {
  const parts = splitPath(path);
  if (parts.length !== compiled.segments.length) {
    return null;
  }

  const bindings: Array<[string, string]> = [];
  for (let i = 0; i < parts.length; i += 1) {
    const segment = compiled.segments[i];
    const part = parts[i];
    if (segment === undefined || part === undefined) {
      return null;
    }
    if (segment.kind === 'static') {
      if (segment.text !== part) {
        return null;
      }
    } else {
      if (!part) {
        return null;
      }
      bindings.push([segment.name, part]);
    }
  }
  // fromEntries defines own properties, so `__proto__` binds like any other name
  return Object.fromEntries(bindings);
}
