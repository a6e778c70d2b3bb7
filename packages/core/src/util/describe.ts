import { runtimeTypeOf, typeName } from '../types/type-token.js';

const MAX_EXCERPT = 80;

/**
 * Short human-readable rendering of an arbitrary value for error messages
 * and trace lines.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  switch (typeof value) {
    case 'undefined':
      return 'undefined';
    case 'string':
      return JSON.stringify(truncate(value));
    case 'bigint':
      return `${value}n`;
    case 'number':
    case 'boolean':
    case 'symbol':
      return String(value);
    case 'function':
      return describeRule(value);
    default:
      break;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  const type = runtimeTypeOf(value);
  return type ? `${typeName(type)} instance` : 'object';
}

/**
 * Rules and generators are plain functions; their name is the best handle.
 */
export function describeRule(rule: unknown): string {
  if (typeof rule === 'function' && rule.name) {
    return `rule '${rule.name}'`;
  }
  return 'anonymous rule';
}

function truncate(text: string): string {
  return text.length > MAX_EXCERPT ? `${text.slice(0, MAX_EXCERPT)}…` : text;
}
