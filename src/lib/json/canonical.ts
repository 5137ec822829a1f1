import { createHash } from 'crypto';
import jcs from 'canonicalize';
import { EncodeError } from './errors.js';
import { isJsonSerializable, isPlainObject, type JsonValue } from './types.js';

/**
 * Fully serialize a value into plain JSON.
 *
 * Objects implementing `toJSON` are expanded through it, arrays and plain
 * objects recursively; `undefined` object members are dropped and `undefined`
 * array items become `null`, as `JSON.stringify` does.
 */
export function toJsonValue(value: unknown, path = ''): JsonValue {
  return serialize(value, path, new Set());
}

function serialize(value: unknown, path: string, seen: Set<object>): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw EncodeError.notSerializable(path, value);
    }
    return value;
  }

  if (typeof value !== 'object') {
    throw EncodeError.notSerializable(path, value);
  }

  if (seen.has(value)) {
    throw EncodeError.cyclic(path);
  }
  seen.add(value);

  try {
    if (isJsonSerializable(value)) {
      return value.toJSON();
    }

    if (Array.isArray(value)) {
      return value.map((item, index) =>
        item === undefined ? null : serialize(item, `${path}[${index}]`, seen),
      );
    }

    if (isPlainObject(value)) {
      const result: { [key: string]: JsonValue } = {};
      for (const [key, item] of Object.entries(value)) {
        if (item !== undefined) {
          result[key] = serialize(item, path ? `${path}.${key}` : key, seen);
        }
      }
      return result;
    }

    throw EncodeError.notSerializable(path, value);
  } finally {
    seen.delete(value);
  }
}

/**
 * Deterministic serialization (RFC 8785 JSON Canonicalization Scheme)
 */
export function canonicalize(value: JsonValue): string {
  const canonical = jcs(value);
  if (canonical === undefined) {
    throw EncodeError.notSerializable('', value);
  }
  return canonical;
}

/**
 * SHA-256 (hex) of the canonical serialization
 */
export function hashJson(value: JsonValue): string {
  return createHash('sha256').update(canonicalize(value)).digest('hex');
}
