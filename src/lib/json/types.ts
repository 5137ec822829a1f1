/**
 * JSON value types shared by the message framework
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Anything that knows its own wire form.
 *
 * `toPartialJSON` may return a shallow mapping whose values are themselves
 * `JsonSerializable`; `toJSON` always returns plain JSON.
 */
export interface JsonSerializable {
  toPartialJSON(): unknown;
  toJSON(): JsonValue;
}

/**
 * Policy for keys a decoder does not recognize
 */
export type UnknownFieldPolicy = 'ignore' | 'reject';

export interface DecodeOptions {
  /** Defaults to {@link DEFAULT_UNKNOWN_FIELDS} */
  unknownFields?: UnknownFieldPolicy;
}

export function isJsonSerializable(value: unknown): value is JsonSerializable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toPartialJSON' in value &&
    typeof value.toPartialJSON === 'function' &&
    'toJSON' in value &&
    typeof value.toJSON === 'function'
  );
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
