/**
 * Challenge bodies
 *
 * A challenge as it appears inside an authorization: the variant's own
 * members plus the challenge URI, status and validation time. Accessors not
 * defined here read through to the wrapped variant.
 */

import { z } from 'zod';
import { STATUS_PENDING, Status, type StatusConstant } from '../constants/status.js';
import {
  decodeChallenge,
  hasToken,
  type Challenge,
  type ChallengeType,
} from '../challenges/challenges.js';
import { UnknownAttributeError } from '../json/errors.js';
import {
  copyTimestamp,
  decodedBy,
  embedded,
  encodeTimestamp,
  field,
  timestamp,
  type FieldSchema,
} from '../json/field.js';
import { decodeFields, TypedJsonObject } from '../json/typed-json-object.js';
import type { DecodeOptions } from '../json/types.js';

export interface ChallengeBodyFields {
  uri: string;
  status: StatusConstant;
  validated?: Date;
  chall: Challenge;
}

export type ChallengeBodyInit = Omit<ChallengeBodyFields, 'status'> & { status?: StatusConstant };

export class ChallengeBody extends TypedJsonObject<ChallengeBodyFields, ChallengeBody> {
  static readonly schema: FieldSchema<ChallengeBodyFields> = {
    uri: field('uri', z.string()),
    status: field('status', Status.schema, { omitEmpty: true, default: STATUS_PENDING }),
    validated: field('validated', timestamp.optional(), {
      omitEmpty: true,
      encoder: encodeTimestamp,
    }),
    // the body's own keys share the mapping, so the variant always ignores unknown keys
    chall: embedded(decodedBy((json) => decodeChallenge(json))),
  };

  constructor({ status = STATUS_PENDING, validated, ...rest }: ChallengeBodyInit) {
    super(ChallengeBody.schema, { ...rest, status, validated: copyTimestamp(validated) });
  }

  static fromJSON(json: unknown, options?: DecodeOptions): ChallengeBody {
    return new ChallengeBody(decodeFields(ChallengeBody.schema, json, 'ChallengeBody', options));
  }

  protected withFields(fields: ChallengeBodyFields): ChallengeBody {
    return new ChallengeBody(fields);
  }

  get uri(): string {
    return this.fields.uri;
  }

  get status(): StatusConstant {
    return this.fields.status;
  }

  get validated(): Date | undefined {
    return copyTimestamp(this.fields.validated);
  }

  get chall(): Challenge {
    return this.fields.chall;
  }

  get typ(): ChallengeType {
    return this.fields.chall.typ;
  }

  /** Token of the wrapped challenge; fails for variants without one */
  get token(): string {
    if (!hasToken(this.fields.chall)) {
      throw UnknownAttributeError.forChallenge(this.typ, 'token');
    }
    return this.fields.chall.token;
  }

  /**
   * Field of the body or, failing that, of the wrapped challenge
   */
  attribute(name: string): unknown {
    const found = this.lookup(name) ?? this.fields.chall.lookup(name);
    if (!found) {
      throw UnknownAttributeError.forChallenge(this.typ, name);
    }
    return found.value;
  }
}
