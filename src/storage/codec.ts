/**
 * Entity codec
 * @module storage/codec
 *
 * JSON encoding that preserves `Date` values by tagging them as
 * `{ "$date": "<iso>" }`. Objects are rebuilt with `Object.fromEntries` so
 * a `__proto__` key stays an own property.
 */

import type { AttrValue, EntityAttrs } from './entity-store.js';

const DATE_TAG = '$date';

export type Encoded =
  | string
  | number
  | boolean
  | null
  | Encoded[]
  | { [key: string]: Encoded };

export function encodeValue(value: AttrValue): Encoded {
  if (value instanceof Date) {
    return { [DATE_TAG]: value.toISOString() };
  }
  if (Array.isArray(value)) {
    return value.map(encodeValue);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, nested]): [string, Encoded] => [key, encodeValue(nested)]));
  }
  return value;
}

/**
 * Decode a parsed JSON value. Unknown input shapes (undefined, functions)
 * decode to null.
 */
export function decodeValue(value: unknown): AttrValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(decodeValue);
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value);
    const first = entries[0];
    if (entries.length === 1 && first && first[0] === DATE_TAG) {
      const iso = first[1];
      if (typeof iso === 'string') {
        const date = new Date(iso);
        if (!Number.isNaN(date.getTime())) {
          return date;
        }
      }
    }
    return Object.fromEntries(entries.map(([key, nested]): [string, AttrValue] => [key, decodeValue(nested)]));
  }
  return null;
}

export function encodeAttrs(attrs: EntityAttrs): { [key: string]: Encoded } {
  return Object.fromEntries(Object.entries(attrs).map(([key, value]): [string, Encoded] => [key, encodeValue(value)]));
}

export function decodeAttrs(value: unknown): EntityAttrs | null {
  const decoded = decodeValue(value);
  if (decoded === null || typeof decoded !== 'object' || Array.isArray(decoded) || decoded instanceof Date) {
    return null;
  }
  return decoded;
}

/**
 * Decode a container (id → attrs map), dropping entries that are not objects
 */
export function decodeContainer(value: unknown): Map<string, EntityAttrs> {
  const container = new Map<string, EntityAttrs>();
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return container;
  }
  for (const [id, raw] of Object.entries(value)) {
    const attrs = decodeAttrs(raw);
    if (attrs) {
      container.set(id, attrs);
    }
  }
  return container;
}

export function encodeContainer(container: Map<string, EntityAttrs>): { [id: string]: Encoded } {
  return Object.fromEntries([...container].map(([id, attrs]): [string, Encoded] => [id, encodeAttrs(attrs)]));
}
