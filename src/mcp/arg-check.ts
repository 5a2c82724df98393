/**
 * Shallow argument check against a tool's JSON schema
 */

import { isRecord } from './session';

function matchesType(value: unknown, type: string): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isRecord(value);
    case 'null':
      return value === null;
    default:
      return true;
  }
}

/**
 * Problems with `args`: missing required keys, top-level type mismatches
 * and unknown keys when the schema closes its properties. Empty when valid.
 */
export function checkArgs(schema: Record<string, unknown>, args: Record<string, unknown>): string[] {
  const problems: string[] = [];
  const properties = isRecord(schema.properties) ? schema.properties : {};

  if (Array.isArray(schema.required)) {
    for (const key of schema.required) {
      if (typeof key === 'string' && !(key in args)) {
        problems.push(`missing required argument "${key}"`);
      }
    }
  }

  for (const [key, value] of Object.entries(args)) {
    const property = properties[key];
    if (property === undefined) {
      if (schema.additionalProperties === false) {
        problems.push(`unexpected argument "${key}"`);
      }
      continue;
    }
    if (!isRecord(property)) continue;

    const types = Array.isArray(property.type) ? property.type : [property.type];
    const declared = types.filter((t): t is string => typeof t === 'string');
    if (declared.length > 0 && !declared.some((t) => matchesType(value, t))) {
      problems.push(`argument "${key}" should be ${declared.join(' | ')}`);
    }
  }

  return problems;
}
