/**
 * Whitelisted constant values
 *
 * A registry owns a fixed set of tokens, each mapped to one canonical
 * {@link Constant}. Registries are built once when their module loads and
 * never change afterwards; {@link ConstantRegistry.extend} derives a new
 * registry instead of adding tokens in place.
 */

import { debugRegistry } from '../../logger.js';
import { z } from 'zod';
import { hashJson } from './canonical.js';
import { DecodeError } from './errors.js';
import type { Decoder } from './field.js';
import type { JsonSerializable } from './types.js';

/** Tokens accepted per registry name, shared by every registry of that name */
const whitelists = new Map<string, Set<string>>();

function allow(kind: string, tokens: Iterable<string>): void {
  let whitelist = whitelists.get(kind);
  if (!whitelist) {
    whitelist = new Set();
    whitelists.set(kind, whitelist);
  }
  for (const token of tokens) {
    whitelist.add(token);
  }
}

export class Constant<T extends string = string> implements JsonSerializable {
  /**
   * @throws {DecodeError} when no registry named `kind` accepts `name`
   */
  constructor(
    readonly kind: string,
    readonly name: T,
  ) {
    if (!whitelists.get(kind)?.has(name)) {
      throw DecodeError.unknownConstant(kind, name);
    }
    Object.freeze(this);
  }

  toPartialJSON(): T {
    return this.name;
  }

  toJSON(): T {
    return this.name;
  }

  equals(other: unknown): boolean {
    return other instanceof Constant && other.kind === this.kind && other.name === this.name;
  }

  hash(): string {
    return hashJson([this.kind, this.name]);
  }

  toString(): string {
    return `${this.kind}(${this.name})`;
  }
}

export class ConstantRegistry<T extends string> {
  private readonly canonical: ReadonlyMap<string, Constant<T>>;

  /** Field decoder resolving wire tokens to canonical instances */
  readonly schema: Decoder<Constant<T>>;

  constructor(
    readonly name: string,
    tokens: readonly T[],
    inherited: Iterable<Constant<T>> = [],
  ) {
    const canonical = new Map<string, Constant<T>>();
    allow(name, tokens);
    for (const constant of inherited) {
      canonical.set(constant.name, constant);
    }
    for (const token of tokens) {
      if (!canonical.has(token)) {
        canonical.set(token, new Constant(name, token));
      }
    }
    this.canonical = canonical;
    this.schema = z.unknown().transform((value, ctx) => {
      const constant = typeof value === 'string' ? canonical.get(value) : undefined;
      if (!constant) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name}: unrecognized value ${JSON.stringify(value)}`,
        });
        return z.NEVER;
      }
      return constant;
    });

    debugRegistry('%s: registered %s', name, [...canonical.keys()].join(', '));
  }

  has(token: string): token is T {
    return this.canonical.has(token);
  }

  /** Canonical instance for a known token */
  get(token: T): Constant<T> {
    const constant = this.canonical.get(token);
    if (!constant) {
      throw new RangeError(`${this.name}: unknown token ${token}`);
    }
    return constant;
  }

  fromJSON(json: unknown): Constant<T> {
    const constant = typeof json === 'string' ? this.canonical.get(json) : undefined;
    if (!constant) {
      throw DecodeError.unknownConstant(this.name, json);
    }
    return constant;
  }

  values(): Constant<T>[] {
    return [...this.canonical.values()];
  }

  /** New registry of the same name sharing this one's canonical instances */
  extend<U extends string>(...tokens: U[]): ConstantRegistry<T | U> {
    return new ConstantRegistry<T | U>(this.name, tokens, this.canonical.values());
  }
}
