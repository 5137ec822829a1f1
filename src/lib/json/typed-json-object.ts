/**
 * Typed JSON objects
 *
 * Immutable objects with a fixed set of declared fields. Each class passes
 * its {@link FieldSchema} to the base constructor and gets partial and full
 * serialization, structural equality, hashing and copy-on-update from it.
 *
 * @example
 * ```typescript
 * interface IdentifierFields { typ: Constant<'dns'>; value: string }
 *
 * class Identifier extends TypedJsonObject<IdentifierFields, Identifier> {
 *   static readonly schema: FieldSchema<IdentifierFields> = {
 *     typ: field('type', IdentifierType.schema),
 *     value: field('value', z.string()),
 *   };
 *   ...
 * }
 * ```
 */

import { debugDecode, debugEncode } from '../../logger.js';
import { DEFAULT_UNKNOWN_FIELDS } from '../constants/defaults.js';
import { canonicalize, hashJson, toJsonValue } from './canonical.js';
import { DecodeError, EncodeError } from './errors.js';
import { resolveDecoder, type FieldSchema, type FieldSpec } from './field.js';
import {
  isJsonSerializable,
  isPlainObject,
  type DecodeOptions,
  type JsonObject,
  type JsonSerializable,
} from './types.js';

function schemaKeys<F extends object>(schema: FieldSchema<F>): Array<keyof F & string> {
  return Object.keys(schema) as Array<keyof F & string>;
}

function isEmpty<T>(spec: FieldSpec<T>, value: T): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (Array.isArray(value) && value.length === 0) {
    return true;
  }
  if (spec.fallback) {
    return (
      canonicalize(toJsonValue(encodeValue(spec, spec.fallback.value))) ===
      canonicalize(toJsonValue(encodeValue(spec, value)))
    );
  }
  return false;
}

function encodeValue<T>(spec: FieldSpec<T>, value: T): unknown {
  if (value === undefined || value === null) {
    return null;
  }
  return spec.encoder ? spec.encoder(value) : value;
}

function embeddedPart(typeName: string, value: unknown, full: boolean): Record<string, unknown> {
  if (!isJsonSerializable(value)) {
    throw EncodeError.notSerializable(typeName, value);
  }
  const part = full ? value.toJSON() : value.toPartialJSON();
  if (!isPlainObject(part)) {
    throw EncodeError.notSerializable(typeName, part);
  }
  return part;
}

/**
 * Decode a wire mapping into the field record of `schema`.
 *
 * `null` values are read as absent. Fields with a default take it when
 * absent; other absent fields are handed to their decoder as `undefined`,
 * so optional decoders accept them and required ones fail. `extraKeys` are
 * wire keys the caller consumes itself, such as a discriminant.
 */
export function decodeFields<F extends object>(
  schema: FieldSchema<F>,
  json: unknown,
  typeName: string,
  options: DecodeOptions = {},
  extraKeys: readonly string[] = [],
): F {
  if (!isPlainObject(json)) {
    throw DecodeError.notAnObject(typeName, json);
  }

  const result: Partial<F> = {};
  const known = new Set<string>(extraKeys);

  for (const key of schemaKeys(schema)) {
    const spec = schema[key];

    const decoder = resolveDecoder(spec, options);

    if (spec.embedded) {
      const parsed = decoder.safeParse(json);
      if (!parsed.success) {
        debugDecode('%s: embedded field %s rejected: %o', typeName, key, parsed.error.issues);
        throw DecodeError.invalidField(typeName, key, parsed.error.issues);
      }
      for (const wireKey of Object.keys(embeddedPart(typeName, parsed.data, true))) {
        known.add(wireKey);
      }
      result[key] = parsed.data;
      continue;
    }

    known.add(spec.json);
    const raw = json[spec.json] ?? undefined;

    if (raw === undefined && spec.fallback) {
      result[key] = spec.fallback.value;
      continue;
    }

    const parsed = decoder.safeParse(raw);
    if (!parsed.success) {
      debugDecode('%s: field %s rejected: %o', typeName, spec.json, parsed.error.issues);
      throw raw === undefined
        ? DecodeError.missingField(typeName, spec.json)
        : DecodeError.invalidField(typeName, spec.json, parsed.error.issues);
    }
    result[key] = parsed.data;
  }

  const unknown = Object.keys(json).filter((wireKey) => !known.has(wireKey));
  if (unknown.length > 0) {
    if ((options.unknownFields ?? DEFAULT_UNKNOWN_FIELDS) === 'reject') {
      throw DecodeError.unknownFields(typeName, unknown);
    }
    debugDecode('%s: ignoring unrecognized field(s) %s', typeName, unknown.join(', '));
  }

  return result as F;
}

/**
 * Base class for immutable, JSON-serializable message objects
 *
 * `Self` is the concrete subclass, so that {@link update} returns it.
 */
export abstract class TypedJsonObject<F extends object, Self extends TypedJsonObject<F, Self>>
  implements JsonSerializable
{
  protected readonly fields: Readonly<F>;

  protected constructor(
    private readonly schema: FieldSchema<F>,
    fields: F,
  ) {
    this.fields = Object.freeze({ ...fields });
  }

  /** Build a sibling instance from a complete field record */
  protected abstract withFields(fields: F): Self;

  /** Computed wire members written before the declared fields */
  protected wireExtras(): JsonObject {
    return {};
  }

  /** Value of the declared field called `name`, if there is one */
  lookup(name: string): { value: unknown } | undefined {
    for (const key of schemaKeys(this.schema)) {
      if (key === name) {
        const value: unknown = this.fields[key];
        return { value: value instanceof Date ? new Date(value.getTime()) : value };
      }
    }
    return undefined;
  }

  /**
   * Shallow wire mapping: empty and default-valued `omitEmpty` fields are
   * left out, encoders are applied, nested serializable objects are kept as
   * objects.
   */
  toPartialJSON(): Record<string, unknown> {
    const typeName = this.constructor.name;
    const own: Record<string, unknown> = {};
    const merged: Record<string, unknown> = { ...this.wireExtras() };

    for (const key of schemaKeys(this.schema)) {
      const spec = this.schema[key];
      const value = this.fields[key];

      if (spec.embedded) {
        Object.assign(merged, embeddedPart(typeName, value, false));
      } else if (!(spec.omitEmpty && isEmpty(spec, value))) {
        own[spec.json] = encodeValue(spec, value);
      }
    }

    return Object.assign(merged, own);
  }

  /**
   * Full wire mapping: every declared key, absent values as `null`, all
   * nested objects expanded to plain JSON.
   */
  toJSON(): JsonObject {
    const typeName = this.constructor.name;
    const own: JsonObject = {};
    const merged: JsonObject = { ...this.wireExtras() };

    for (const key of schemaKeys(this.schema)) {
      const spec = this.schema[key];
      const value = this.fields[key];

      if (spec.embedded) {
        const part = toJsonValue(embeddedPart(typeName, value, true), typeName);
        if (isPlainObject(part)) {
          Object.assign(merged, part);
        }
      } else {
        own[spec.json] = toJsonValue(encodeValue(spec, value), `${typeName}.${spec.json}`);
      }
    }

    debugEncode('%s: encoded %d field(s)', typeName, Object.keys(own).length);
    return Object.assign(merged, own);
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    return (
      other instanceof TypedJsonObject &&
      other.constructor === this.constructor &&
      canonicalize(other.toJSON()) === canonicalize(this.toJSON())
    );
  }

  hash(): string {
    return hashJson(this.toJSON());
  }

  /** New instance with `changes` applied; this instance is left untouched */
  update(changes: Partial<F>): Self {
    return this.withFields({ ...this.fields, ...changes });
  }

  toString(): string {
    return `${this.constructor.name}(${canonicalize(this.toJSON())})`;
  }
}
