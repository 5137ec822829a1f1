/**
 * Errors raised while converting ACME messages to and from JSON
 *
 * Every failure is raised synchronously at the point of `fromJSON`,
 * `toJSON` or `toPartialJSON`; no object is ever partially constructed.
 */

import type { ZodIssue } from 'zod';

/**
 * Base class for all message (de)serialization errors
 */
export abstract class JsonObjectError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Malformed or semantically invalid JSON input
 */
export class DecodeError extends JsonObjectError {
  readonly code = 'DECODE_ERROR';

  constructor(
    message: string,
    context?: Record<string, unknown>,
    public readonly issues: ZodIssue[] = [],
  ) {
    super(message, context);
  }

  static notAnObject(typeName: string, received: unknown): DecodeError {
    return new DecodeError(`${typeName} must be decoded from a JSON object`, {
      typeName,
      received: received === null ? 'null' : Array.isArray(received) ? 'array' : typeof received,
    });
  }

  static missingField(typeName: string, field: string): DecodeError {
    return new DecodeError(`${typeName}: missing required field "${field}"`, {
      typeName,
      field,
    });
  }

  static invalidField(typeName: string, field: string, issues: ZodIssue[]): DecodeError {
    const reason = issues.map((issue) => issue.message).join('; ');
    return new DecodeError(
      `${typeName}: invalid value for field "${field}"${reason ? `: ${reason}` : ''}`,
      { typeName, field },
      issues,
    );
  }

  static unknownFields(typeName: string, fields: string[]): DecodeError {
    return new DecodeError(`${typeName}: unrecognized field(s) ${fields.join(', ')}`, {
      typeName,
      fields,
    });
  }

  static unknownConstant(registry: string, token: unknown): DecodeError {
    return new DecodeError(`${registry}: unrecognized value ${JSON.stringify(token)}`, {
      registry,
      token,
    });
  }

  static combinationOutOfRange(
    typeName: string,
    combination: number,
    index: number,
    challengeCount: number,
  ): DecodeError {
    return new DecodeError(
      `${typeName}: combination ${combination} refers to challenge ${index}, but only ${challengeCount} challenge(s) are present`,
      { typeName, combination, index, challengeCount },
    );
  }

  static unknownChallengeType(discriminant: unknown): DecodeError {
    return new DecodeError(`Unrecognized challenge type ${JSON.stringify(discriminant)}`, {
      discriminant,
    });
  }
}

/**
 * A field value that cannot be converted to a JSON-compatible form
 */
export class EncodeError extends JsonObjectError {
  readonly code = 'ENCODE_ERROR';

  static notSerializable(path: string, value: unknown): EncodeError {
    return new EncodeError(`Value at ${path || '<root>'} is not JSON-serializable`, {
      path,
      valueType: typeof value,
    });
  }

  static invalidTimestamp(): EncodeError {
    return new EncodeError('Invalid Date cannot be written as a timestamp');
  }

  static cyclic(path: string): EncodeError {
    return new EncodeError(`Cyclic structure at ${path || '<root>'}`, { path });
  }
}

/**
 * Lookup of a name that neither a challenge body nor its challenge defines
 */
export class UnknownAttributeError extends JsonObjectError {
  readonly code = 'UNKNOWN_ATTRIBUTE';

  static forChallenge(challengeType: string, attribute: string): UnknownAttributeError {
    return new UnknownAttributeError(
      `Challenge body of type ${challengeType} has no attribute "${attribute}"`,
      { challengeType, attribute },
    );
  }
}

/**
 * Union type for all message (de)serialization errors
 */
export type JsonObjectErrorType = DecodeError | EncodeError | UnknownAttributeError;
