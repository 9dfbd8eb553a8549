/**
 * Lenient attribute accessors used by the block builder
 *
 * They coerce where a sensible reading exists and return undefined
 * otherwise; strict type checking is the validator's job.
 */

import type { AttributeMap, AttributeValue } from './types.js';

/**
 * First present key among `keys` (canonical name first, then aliases)
 */
export function lookup(attributes: AttributeMap, keys: readonly string[]): AttributeValue | undefined {
  for (const key of keys) {
    const value = attributes.get(key);
    if (value !== undefined) return value;
  }
  return undefined;
}

export function attrText(attributes: AttributeMap, ...keys: string[]): string | undefined {
  const value = lookup(attributes, keys);
  if (!value) return undefined;
  switch (value.kind) {
    case 'string':
    case 'symbol':
      return value.value;
    case 'number':
      return String(value.value);
    case 'boolean':
      return String(value.value);
    case 'list':
      return value.value.join(', ');
  }
}

export function attrNumber(attributes: AttributeMap, ...keys: string[]): number | undefined {
  const value = lookup(attributes, keys);
  return value?.kind === 'number' ? value.value : undefined;
}

export function attrFlag(attributes: AttributeMap, ...keys: string[]): boolean {
  const value = lookup(attributes, keys);
  return value?.kind === 'boolean' && value.value;
}

/**
 * List values, or a comma-separated string split into items
 */
export function attrList(attributes: AttributeMap, ...keys: string[]): string[] {
  const value = lookup(attributes, keys);
  if (!value) return [];
  if (value.kind === 'list') return [...value.value];
  if (value.kind === 'string' || value.kind === 'symbol') {
    return value.value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
  return [];
}

/**
 * Enum choice, or undefined when the value is not one of `choices`
 */
export function attrChoice<T extends string>(
  attributes: AttributeMap,
  key: string,
  choices: readonly T[]
): T | undefined {
  const text = attrText(attributes, key);
  if (text === undefined) return undefined;
  const normalized = text.toLowerCase();
  return choices.find(choice => choice === normalized);
}

/**
 * Source-like rendering of a value, used in messages and degraded output
 */
export function formatAttributeValue(value: AttributeValue): string {
  switch (value.kind) {
    case 'string':
      return JSON.stringify(value.value);
    case 'number':
    case 'boolean':
      return String(value.value);
    case 'symbol':
      return value.value;
    case 'list':
      return `[${value.value.map(item => JSON.stringify(item)).join(', ')}]`;
  }
}
