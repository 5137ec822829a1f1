/**
 * Field declarations for typed JSON objects
 *
 * A field binds an object property to a wire key, a zod schema that decodes
 * the wire value, and optionally an encoder, a default and an omit policy.
 */

import { z, ZodType, type ZodTypeDef } from 'zod';
import { DecodeError, EncodeError } from './errors.js';
import type { DecodeOptions, JsonSerializable } from './types.js';

/** Zod schema producing `T` from any wire value */
export type Decoder<T> = ZodType<T, ZodTypeDef, unknown>;

/** Decoder of nested objects, built for the caller's decode options */
export type DecoderFactory<T> = (options: DecodeOptions) => Decoder<T>;

export interface FieldSpec<T> {
  /** Wire key; empty for embedded fields */
  readonly json: string;
  readonly decoder: Decoder<T> | DecoderFactory<T>;
  encoder?(value: NonNullable<T>): unknown;
  /** Leave the field out of partial JSON when empty or equal to its default */
  readonly omitEmpty: boolean;
  /** Value taken when the key is absent on the wire */
  readonly fallback?: { readonly value: T };
  /** Value is merged flat into the parent mapping and decoded from all of it */
  readonly embedded: boolean;
}

export interface FieldOptions<T> {
  omitEmpty?: boolean;
  default?: T;
  encoder?(value: NonNullable<T>): unknown;
}

/** One field spec per property of `F` */
export type FieldSchema<F> = { readonly [K in keyof F]-?: FieldSpec<F[K]> };

export function field<T>(
  json: string,
  decoder: Decoder<T> | DecoderFactory<T>,
  options: FieldOptions<T> = {},
): FieldSpec<T> {
  return {
    json,
    decoder,
    encoder: options.encoder,
    omitEmpty: options.omitEmpty ?? false,
    fallback: options.default !== undefined ? { value: options.default } : undefined,
    embedded: false,
  };
}

export function embedded<T extends JsonSerializable>(
  decoder: Decoder<T> | DecoderFactory<T>,
): FieldSpec<T> {
  return { json: '', decoder, omitEmpty: false, embedded: true };
}

export function resolveDecoder<T>(spec: FieldSpec<T>, options: DecodeOptions): Decoder<T> {
  return spec.decoder instanceof ZodType ? spec.decoder : spec.decoder(options);
}

/**
 * Decoder delegating to a `fromJSON` function; its DecodeError becomes a
 * zod issue so the enclosing field is reported as the failing one.
 */
export function decodedBy<T>(
  fromJSON: (json: unknown, options: DecodeOptions) => T,
): DecoderFactory<T> {
  return (options) =>
    z.unknown().transform((value, ctx): T => {
      try {
        return fromJSON(value, options);
      } catch (error) {
        if (error instanceof DecodeError) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
          return z.NEVER;
        }
        throw error;
      }
    });
}

export function listOf<T>(item: DecoderFactory<T>): DecoderFactory<T[]> {
  return (options) => z.array(item(options));
}

/** ISO 8601 / RFC 3339 timestamp */
export const timestamp: Decoder<Date> = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export function encodeTimestamp(value: Date): string {
  if (Number.isNaN(value.getTime())) {
    throw EncodeError.invalidTimestamp();
  }
  return value.toISOString();
}

/** `Date` is mutable, so messages keep and hand out their own copies */
export function copyTimestamp(value: Date | undefined): Date | undefined {
  return value === undefined ? undefined : new Date(value.getTime());
}
