/**
 * JSON Web Key wrapper (RFC 7517)
 *
 * Registration messages carry the account's public key as a JWK. This class
 * keeps the key's members immutable and comparable; signing and verification
 * stay with jose.
 */

import { calculateJwkThumbprint, exportJWK, importJWK, type JWK, type KeyLike } from 'jose';
import { z } from 'zod';
import { logWarn } from '../../logger.js';
import { canonicalize, hashJson, toJsonValue } from '../json/canonical.js';
import { DecodeError } from '../json/errors.js';
import type { JsonSerializable, JsonValue } from '../json/types.js';

const member = z.string().optional();

const JwkSchema = z.object({
  kty: z.string().min(1),
  use: member,
  key_ops: z.array(z.string()).optional(),
  alg: member,
  kid: member,
  x5u: member,
  x5c: z.array(z.string()).optional(),
  x5t: member,
  'x5t#S256': member,
  crv: member,
  x: member,
  y: member,
  n: member,
  e: member,
  d: member,
  p: member,
  q: member,
  dp: member,
  dq: member,
  qi: member,
  k: member,
});

/** Members that only a private (or symmetric) key carries */
const PRIVATE_MEMBERS = ['d', 'p', 'q', 'dp', 'dq', 'qi', 'k'] as const;

export class Jwk implements JsonSerializable {
  private readonly jwk: Readonly<JWK>;

  private constructor(jwk: JWK) {
    this.jwk = Object.freeze({ ...jwk });
  }

  static fromJSON(json: unknown): Jwk {
    const parsed = JwkSchema.safeParse(json);
    if (!parsed.success) {
      throw new DecodeError('Invalid JSON Web Key', { typeName: 'Jwk' }, parsed.error.issues);
    }
    return new Jwk(parsed.data);
  }

  /** Public JWK of a jose / WebCrypto key */
  static async fromKey(key: KeyLike | Uint8Array): Promise<Jwk> {
    return new Jwk(await exportJWK(key)).publicKey();
  }

  get kty(): string {
    return this.jwk.kty ?? '';
  }

  get alg(): string | undefined {
    return this.jwk.alg;
  }

  isPrivate(): boolean {
    return PRIVATE_MEMBERS.some((name) => this.jwk[name] !== undefined);
  }

  /** Copy without private members */
  publicKey(): Jwk {
    if (!this.isPrivate()) {
      return this;
    }
    logWarn(`dropping private members from ${this.kty} key`);
    const copy: JWK = { ...this.jwk };
    for (const name of PRIVATE_MEMBERS) {
      delete copy[name];
    }
    return new Jwk(copy);
  }

  /** RFC 7638 thumbprint, base64url */
  thumbprint(): Promise<string> {
    return calculateJwkThumbprint(this.jwk, 'sha256');
  }

  importKey(alg?: string): Promise<KeyLike | Uint8Array> {
    return importJWK(this.jwk, alg);
  }

  toPartialJSON(): JWK {
    return { ...this.jwk };
  }

  toJSON(): JsonValue {
    return toJsonValue({ ...this.jwk }, 'Jwk');
  }

  equals(other: unknown): boolean {
    return other instanceof Jwk && canonicalize(other.toJSON()) === canonicalize(this.toJSON());
  }

  hash(): string {
    return hashJson(this.toJSON());
  }
}
