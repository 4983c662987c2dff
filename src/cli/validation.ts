import { LOG_SCOPE } from '../config/constants.js';
import { LOG_LEVELS, isLogLevel } from '../infrastructure/logging/logger.js';
import type { LogLevel } from '../infrastructure/logging/logger.js';

export function warnConfig(message: string): void {
  process.stderr.write(`[${LOG_SCOPE}] ${message}\n`);
}

function where(configPath: string): string {
  return configPath || 'config';
}

export function validatePort(value: unknown, name: string, configPath: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  let portValue: number;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) {
      warnConfig(`Ignoring empty ${name} in ${where(configPath)}`);
      return undefined;
    }
    portValue = Number.parseInt(trimmed, 10);
  } else if (typeof value === 'number') {
    portValue = value;
  } else {
    portValue = Number.NaN;
  }

  if (!Number.isInteger(portValue) || portValue < 1 || portValue > 65535) {
    warnConfig(`Ignoring invalid ${name} in ${where(configPath)}; expected port between 1-65535.`);
    return undefined;
  }

  return portValue;
}

export function validateString(value: unknown, name: string, configPath: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    warnConfig(`Ignoring non-string ${name} in ${where(configPath)}.`);
    return undefined;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    warnConfig(`Ignoring empty ${name} in ${where(configPath)}.`);
    return undefined;
  }

  return trimmed;
}

export function validateLogLevel(value: unknown, name: string, configPath: string): LogLevel | undefined {
  const stringValue = validateString(value, name, configPath);
  if (stringValue === undefined) {
    return undefined;
  }

  const lower = stringValue.toLowerCase();
  if (!isLogLevel(lower)) {
    warnConfig(`Ignoring invalid ${name} in ${where(configPath)}; expected one of ${LOG_LEVELS.join(', ')}.`);
    return undefined;
  }

  return lower;
}

export function validateBoolean(value: unknown, name: string, configPath: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  warnConfig(`Ignoring invalid ${name} in ${where(configPath)}; expected true or false.`);
  return undefined;
}

export function validatePositiveInteger(value: unknown, name: string, configPath: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 1) {
    warnConfig(`Ignoring invalid ${name} in ${where(configPath)}; expected a positive integer.`);
    return undefined;
  }
  return parsed;
}

/**
 * Accepts a single string or an array of strings; non-string entries are dropped
 */
export function validateStringList(value: unknown, name: string, configPath: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const items: unknown[] = Array.isArray(value) ? value : [value];
  const result: string[] = [];
  items.forEach((item, index) => {
    const label = Array.isArray(value) ? `${name}[${index}]` : name;
    const validated = validateString(item, label, configPath);
    if (validated !== undefined) {
      result.push(validated);
    }
  });

  return result.length > 0 ? result : undefined;
}

export function pickFirst<T>(
  sources: Array<{ value: unknown; name: string }>,
  validator: (value: unknown, name: string, configPath: string) => T | undefined,
  configPath: string,
): T | undefined {
  for (const { value, name } of sources) {
    if (value === undefined || value === null) {
      continue;
    }
    const validated = validator(value, name, configPath);
    if (validated !== undefined) {
      return validated;
    }
  }
  return undefined;
}
