/**
 * Identifiers and authorizations
 *
 * An authorization lists the challenges a server offers for one identifier
 * and the combinations of them (index lists into `challenges`) that suffice
 * to prove control.
 */

import { z } from 'zod';
import {
  IdentifierType,
  Status,
  type IdentifierTypeConstant,
  type StatusConstant,
} from '../constants/status.js';
import { DecodeError } from '../json/errors.js';
import {
  copyTimestamp,
  decodedBy,
  encodeTimestamp,
  field,
  listOf,
  timestamp,
  type FieldSchema,
} from '../json/field.js';
import { decodeFields, TypedJsonObject } from '../json/typed-json-object.js';
import type { DecodeOptions, JsonObject } from '../json/types.js';
import { ChallengeBody } from './challenge-body.js';

export interface IdentifierFields {
  typ: IdentifierTypeConstant;
  value: string;
}

export class Identifier extends TypedJsonObject<IdentifierFields, Identifier> {
  static readonly schema: FieldSchema<IdentifierFields> = {
    typ: field('type', IdentifierType.schema),
    value: field('value', z.string()),
  };

  constructor(fields: IdentifierFields) {
    super(Identifier.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): Identifier {
    return new Identifier(decodeFields(Identifier.schema, json, 'Identifier', options));
  }

  protected withFields(fields: IdentifierFields): Identifier {
    return new Identifier(fields);
  }

  get typ(): IdentifierTypeConstant {
    return this.fields.typ;
  }

  get value(): string {
    return this.fields.value;
  }
}

export type Combination = readonly number[];

export interface AuthorizationFields {
  identifier: Identifier;
  challenges: readonly ChallengeBody[];
  combinations: readonly Combination[];
  status?: StatusConstant;
  expires?: Date;
}

export type AuthorizationInit = Omit<AuthorizationFields, 'challenges' | 'combinations'> & {
  challenges?: readonly ChallengeBody[];
  combinations?: readonly Combination[];
};

const authorizationSchema: FieldSchema<AuthorizationFields> = {
  identifier: field(
    'identifier',
    decodedBy((json, options) => Identifier.fromJSON(json, options)),
  ),
  challenges: field(
    'challenges',
    listOf(decodedBy((json, options) => ChallengeBody.fromJSON(json, options))),
    { omitEmpty: true, default: [] },
  ),
  combinations: field('combinations', z.array(z.array(z.number().int().nonnegative())), {
    omitEmpty: true,
    default: [],
  }),
  status: field('status', Status.schema.optional(), { omitEmpty: true }),
  expires: field('expires', timestamp.optional(), { omitEmpty: true, encoder: encodeTimestamp }),
};

function decodeAuthorization(
  json: unknown,
  typeName: string,
  options?: DecodeOptions,
  extraKeys: readonly string[] = [],
): AuthorizationFields {
  const fields = decodeFields(authorizationSchema, json, typeName, options, extraKeys);

  fields.combinations.forEach((combination, position) => {
    for (const index of combination) {
      if (index >= fields.challenges.length) {
        throw DecodeError.combinationOutOfRange(
          typeName,
          position,
          index,
          fields.challenges.length,
        );
      }
    }
  });

  return fields;
}

export class Authorization extends TypedJsonObject<AuthorizationFields, Authorization> {
  static readonly schema = authorizationSchema;

  constructor({ challenges = [], combinations = [], expires, ...rest }: AuthorizationInit) {
    super(authorizationSchema, {
      ...rest,
      expires: copyTimestamp(expires),
      challenges: Object.freeze([...challenges]),
      combinations: Object.freeze(combinations.map((combination) => Object.freeze([...combination]))),
    });
  }

  static fromJSON(json: unknown, options?: DecodeOptions): Authorization {
    return new Authorization(decodeAuthorization(json, 'Authorization', options));
  }

  protected withFields(fields: AuthorizationFields): Authorization {
    return new Authorization(fields);
  }

  get identifier(): Identifier {
    return this.fields.identifier;
  }

  get challenges(): readonly ChallengeBody[] {
    return this.fields.challenges;
  }

  get combinations(): readonly Combination[] {
    return this.fields.combinations;
  }

  get status(): StatusConstant | undefined {
    return this.fields.status;
  }

  get expires(): Date | undefined {
    return copyTimestamp(this.fields.expires);
  }

  /**
   * Combinations with each index replaced by its challenge body, in the
   * declared order. Recomputed on every access.
   */
  get resolvedCombinations(): ReadonlyArray<readonly ChallengeBody[]> {
    const { challenges } = this.fields;
    return this.fields.combinations.map((combination) =>
      combination.map((index) => {
        const challenge = challenges[index];
        if (challenge === undefined) {
          throw new RangeError(
            `Combination index ${index} is out of range for ${challenges.length} challenge(s)`,
          );
        }
        return challenge;
      }),
    );
  }
}

/** Marker value of the `resource` member of new-authorization requests */
export const NEW_AUTHZ_RESOURCE = 'new-authz';

/**
 * Authorization request body sent to the new-authz endpoint
 */
export class NewAuthorization extends Authorization {
  static fromJSON(json: unknown, options?: DecodeOptions): NewAuthorization {
    return new NewAuthorization(
      decodeAuthorization(json, 'NewAuthorization', options, ['resource']),
    );
  }

  protected withFields(fields: AuthorizationFields): NewAuthorization {
    return new NewAuthorization(fields);
  }

  update(changes: Partial<AuthorizationFields>): NewAuthorization {
    return this.withFields({ ...this.fields, ...changes });
  }

  protected wireExtras(): JsonObject {
    return { resource: NEW_AUTHZ_RESOURCE };
  }
}
