/**
 * ACME Challenge Variants
 *
 * The closed set of challenge types a server may offer inside an
 * authorization. Each variant is a typed JSON object whose `type` member is
 * computed from the class, and {@link decodeChallenge} picks the variant's
 * decoder from that member.
 */

import { z } from 'zod';
import { CHALLENGE_DISCRIMINANT } from '../constants/defaults.js';
import { DecodeError } from '../json/errors.js';
import { field, type FieldSchema } from '../json/field.js';
import { decodeFields, TypedJsonObject } from '../json/typed-json-object.js';
import { isPlainObject, type DecodeOptions, type JsonObject } from '../json/types.js';

/**
 * ACME Challenge Type Constants
 */
export const CHALLENGE_TYPE = {
  /** Provision a resource over HTTP(S) */
  SIMPLE_HTTP: 'simpleHttp',
  /** Serve a self-signed certificate for a derived SNI name */
  DVSNI: 'dvsni',
  /** Provision a DNS record */
  DNS: 'dns',
  /** Present a recovery token issued at registration */
  RECOVERY_TOKEN: 'recoveryToken',
  /** Follow a link sent to a registered contact */
  RECOVERY_CONTACT: 'recoveryContact',
} as const;

export type ChallengeType = (typeof CHALLENGE_TYPE)[keyof typeof CHALLENGE_TYPE];

/**
 * Common behaviour of all challenge variants: the discriminant is written
 * ahead of the declared fields and skipped when decoding them.
 */
export abstract class ChallengeBase<
  F extends object,
  Self extends ChallengeBase<F, Self>,
> extends TypedJsonObject<F, Self> {
  abstract readonly typ: ChallengeType;

  protected wireExtras(): JsonObject {
    return { [CHALLENGE_DISCRIMINANT]: this.typ };
  }
}

/** Challenges answered with a server-issued token */
export interface TokenChallenge {
  readonly token: string;
}

const tokenField = field('token', z.string());

export interface SimpleHttpFields {
  token: string;
  tls: boolean;
}

export class SimpleHttpChallenge extends ChallengeBase<SimpleHttpFields, SimpleHttpChallenge> {
  static readonly schema: FieldSchema<SimpleHttpFields> = {
    token: tokenField,
    tls: field('tls', z.boolean(), { omitEmpty: true, default: true }),
  };

  readonly typ = CHALLENGE_TYPE.SIMPLE_HTTP;

  constructor({ token, tls = true }: { token: string; tls?: boolean }) {
    super(SimpleHttpChallenge.schema, { token, tls });
  }

  static fromJSON(json: unknown, options?: DecodeOptions): SimpleHttpChallenge {
    return new SimpleHttpChallenge(
      decodeFields(SimpleHttpChallenge.schema, json, 'SimpleHttpChallenge', options, [
        CHALLENGE_DISCRIMINANT,
      ]),
    );
  }

  protected withFields(fields: SimpleHttpFields): SimpleHttpChallenge {
    return new SimpleHttpChallenge(fields);
  }

  get token(): string {
    return this.fields.token;
  }

  get tls(): boolean {
    return this.fields.tls;
  }
}

export interface DvsniFields {
  r: string;
  nonce: string;
}

export class DvsniChallenge extends ChallengeBase<DvsniFields, DvsniChallenge> {
  static readonly schema: FieldSchema<DvsniFields> = {
    r: field('r', z.string()),
    nonce: field('nonce', z.string()),
  };

  readonly typ = CHALLENGE_TYPE.DVSNI;

  constructor(fields: DvsniFields) {
    super(DvsniChallenge.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): DvsniChallenge {
    return new DvsniChallenge(
      decodeFields(DvsniChallenge.schema, json, 'DvsniChallenge', options, [CHALLENGE_DISCRIMINANT]),
    );
  }

  protected withFields(fields: DvsniFields): DvsniChallenge {
    return new DvsniChallenge(fields);
  }

  get r(): string {
    return this.fields.r;
  }

  get nonce(): string {
    return this.fields.nonce;
  }
}

export interface DnsFields {
  token: string;
}

export class DnsChallenge extends ChallengeBase<DnsFields, DnsChallenge> {
  static readonly schema: FieldSchema<DnsFields> = { token: tokenField };

  readonly typ = CHALLENGE_TYPE.DNS;

  constructor(fields: DnsFields) {
    super(DnsChallenge.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): DnsChallenge {
    return new DnsChallenge(
      decodeFields(DnsChallenge.schema, json, 'DnsChallenge', options, [CHALLENGE_DISCRIMINANT]),
    );
  }

  protected withFields(fields: DnsFields): DnsChallenge {
    return new DnsChallenge(fields);
  }

  get token(): string {
    return this.fields.token;
  }
}

export type RecoveryTokenFields = Record<never, never>;

export class RecoveryTokenChallenge extends ChallengeBase<
  RecoveryTokenFields,
  RecoveryTokenChallenge
> {
  static readonly schema: FieldSchema<RecoveryTokenFields> = {};

  readonly typ = CHALLENGE_TYPE.RECOVERY_TOKEN;

  constructor() {
    super(RecoveryTokenChallenge.schema, {});
  }

  static fromJSON(json: unknown, options?: DecodeOptions): RecoveryTokenChallenge {
    decodeFields(RecoveryTokenChallenge.schema, json, 'RecoveryTokenChallenge', options, [
      CHALLENGE_DISCRIMINANT,
    ]);
    return new RecoveryTokenChallenge();
  }

  protected withFields(): RecoveryTokenChallenge {
    return new RecoveryTokenChallenge();
  }
}

export interface RecoveryContactFields {
  activationUrl?: string;
  successUrl?: string;
  contact?: string;
}

export class RecoveryContactChallenge extends ChallengeBase<
  RecoveryContactFields,
  RecoveryContactChallenge
> {
  static readonly schema: FieldSchema<RecoveryContactFields> = {
    activationUrl: field('activationURL', z.string().url().optional(), { omitEmpty: true }),
    successUrl: field('successURL', z.string().url().optional(), { omitEmpty: true }),
    contact: field('contact', z.string().optional(), { omitEmpty: true }),
  };

  readonly typ = CHALLENGE_TYPE.RECOVERY_CONTACT;

  constructor(fields: RecoveryContactFields = {}) {
    super(RecoveryContactChallenge.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): RecoveryContactChallenge {
    return new RecoveryContactChallenge(
      decodeFields(RecoveryContactChallenge.schema, json, 'RecoveryContactChallenge', options, [
        CHALLENGE_DISCRIMINANT,
      ]),
    );
  }

  protected withFields(fields: RecoveryContactFields): RecoveryContactChallenge {
    return new RecoveryContactChallenge(fields);
  }

  get activationUrl(): string | undefined {
    return this.fields.activationUrl;
  }

  get successUrl(): string | undefined {
    return this.fields.successUrl;
  }

  get contact(): string | undefined {
    return this.fields.contact;
  }
}

export type Challenge =
  | SimpleHttpChallenge
  | DvsniChallenge
  | DnsChallenge
  | RecoveryTokenChallenge
  | RecoveryContactChallenge;

const CHALLENGE_DECODERS: {
  readonly [K in ChallengeType]: (json: unknown, options?: DecodeOptions) => Challenge;
} = {
  [CHALLENGE_TYPE.SIMPLE_HTTP]: SimpleHttpChallenge.fromJSON,
  [CHALLENGE_TYPE.DVSNI]: DvsniChallenge.fromJSON,
  [CHALLENGE_TYPE.DNS]: DnsChallenge.fromJSON,
  [CHALLENGE_TYPE.RECOVERY_TOKEN]: RecoveryTokenChallenge.fromJSON,
  [CHALLENGE_TYPE.RECOVERY_CONTACT]: RecoveryContactChallenge.fromJSON,
};

export function isChallengeType(value: unknown): value is ChallengeType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CHALLENGE_DECODERS, value);
}

export function hasToken(challenge: Challenge): challenge is Challenge & TokenChallenge {
  return challenge instanceof SimpleHttpChallenge || challenge instanceof DnsChallenge;
}

/**
 * Decode any challenge variant, dispatching on its `type` member
 */
export function decodeChallenge(json: unknown, options?: DecodeOptions): Challenge {
  if (!isPlainObject(json)) {
    throw DecodeError.notAnObject('Challenge', json);
  }
  const discriminant = json[CHALLENGE_DISCRIMINANT];
  if (!isChallengeType(discriminant)) {
    throw DecodeError.unknownChallengeType(discriminant);
  }
  return CHALLENGE_DECODERS[discriminant](json, options);
}
