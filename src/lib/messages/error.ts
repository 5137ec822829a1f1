/**
 * ACME error documents
 *
 * `typ` holds the bare code (`malformed`); the wire form carries the
 * namespaced URN (`urn:acme:error:malformed`).
 */

import { z } from 'zod';
import { ERROR_TYPE_NAMESPACE } from '../constants/defaults.js';
import {
  ERROR_CODE_PATTERN,
  ERROR_DESCRIPTIONS,
  isAcmeErrorCode,
  type AcmeErrorCode,
} from '../errors/codes.js';
import { JsonObjectError } from '../json/errors.js';
import { field, type Decoder, type FieldSchema } from '../json/field.js';
import { decodeFields, TypedJsonObject } from '../json/typed-json-object.js';
import { isPlainObject, type DecodeOptions } from '../json/types.js';

const ErrorType: Decoder<AcmeErrorCode> = z.string().transform((value, ctx) => {
  if (!value.startsWith(ERROR_TYPE_NAMESPACE)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `missing error type prefix ${ERROR_TYPE_NAMESPACE}`,
    });
    return z.NEVER;
  }
  const code = value.slice(ERROR_TYPE_NAMESPACE.length);
  if (!ERROR_CODE_PATTERN.test(code)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `malformed error code "${code}"` });
    return z.NEVER;
  }
  if (!isAcmeErrorCode(code)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `error type "${code}" not recognized` });
    return z.NEVER;
  }
  return code;
});

export interface ErrorMessageFields {
  typ?: AcmeErrorCode;
  title?: string;
  detail?: string;
}

export class ErrorMessage extends TypedJsonObject<ErrorMessageFields, ErrorMessage> {
  static readonly schema: FieldSchema<ErrorMessageFields> = {
    typ: field('type', ErrorType.optional(), {
      omitEmpty: true,
      encoder: (code) => `${ERROR_TYPE_NAMESPACE}${code}`,
    }),
    title: field('title', z.string().optional(), { omitEmpty: true }),
    detail: field('detail', z.string().optional(), { omitEmpty: true }),
  };

  constructor(fields: ErrorMessageFields = {}) {
    super(ErrorMessage.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): ErrorMessage {
    return new ErrorMessage(decodeFields(ErrorMessage.schema, json, 'ErrorMessage', options));
  }

  /** Whether `json` looks like an error document rather than a resource */
  static isErrorJSON(json: unknown): boolean {
    const type = isPlainObject(json) ? json.type : undefined;
    return typeof type === 'string' && type.startsWith(ERROR_TYPE_NAMESPACE);
  }

  protected withFields(fields: ErrorMessageFields): ErrorMessage {
    return new ErrorMessage(fields);
  }

  get typ(): AcmeErrorCode | undefined {
    return this.fields.typ;
  }

  get title(): string | undefined {
    return this.fields.title;
  }

  get detail(): string | undefined {
    return this.fields.detail;
  }

  get description(): string | undefined {
    return this.fields.typ === undefined ? undefined : ERROR_DESCRIPTIONS[this.fields.typ];
  }

  /** Throwable form, for transports that surface server errors as exceptions */
  toError(): ServerProblemError {
    return new ServerProblemError(this);
  }

  toString(): string {
    if (this.fields.typ === undefined) {
      return this.fields.detail ?? '';
    }
    return [this.fields.typ, this.description, this.fields.detail]
      .filter((part): part is string => Boolean(part))
      .join(' :: ');
  }
}

/**
 * Error carrying a decoded server error document
 */
export class ServerProblemError extends JsonObjectError {
  readonly code = 'SERVER_PROBLEM';

  constructor(public readonly problem: ErrorMessage) {
    super(problem.toString(), { type: problem.typ, title: problem.title });
  }
}
