/**
 * Account registration messages
 */

import { z } from 'zod';
import { EMAIL_PREFIX, PHONE_PREFIX } from '../constants/defaults.js';
import { Jwk } from '../crypto/jwk.js';
import { decodedBy, field, type FieldSchema } from '../json/field.js';
import { decodeFields, TypedJsonObject } from '../json/typed-json-object.js';
import type { DecodeOptions } from '../json/types.js';

export interface RegistrationFields {
  key: Jwk;
  contact: readonly string[];
  recoveryToken?: string;
  agreement?: string;
}

export type RegistrationInit = Omit<RegistrationFields, 'contact'> & {
  contact?: readonly string[];
};

/** Input of {@link Registration.fromData} */
export interface RegistrationData {
  key: Jwk;
  phone?: string;
  email?: string;
  recoveryToken?: string;
  agreement?: string;
}

export class Registration extends TypedJsonObject<RegistrationFields, Registration> {
  static readonly schema: FieldSchema<RegistrationFields> = {
    key: field(
      'key',
      decodedBy((json) => Jwk.fromJSON(json)),
    ),
    contact: field('contact', z.array(z.string()), { omitEmpty: true, default: [] }),
    recoveryToken: field('recoveryToken', z.string().optional(), { omitEmpty: true }),
    agreement: field('agreement', z.string().url().optional(), { omitEmpty: true }),
  };

  constructor({ contact = [], ...rest }: RegistrationInit) {
    super(Registration.schema, { ...rest, contact: Object.freeze([...contact]) });
  }

  static fromJSON(json: unknown, options?: DecodeOptions): Registration {
    return new Registration(decodeFields(Registration.schema, json, 'Registration', options));
  }

  /**
   * Registration with `tel:` / `mailto:` contact URIs built from plain
   * values, phone first.
   */
  static fromData({ phone, email, ...rest }: RegistrationData): Registration {
    const contact: string[] = [];
    if (phone !== undefined) {
      contact.push(`${PHONE_PREFIX}${phone}`);
    }
    if (email !== undefined) {
      contact.push(`${EMAIL_PREFIX}${email}`);
    }
    return new Registration({ ...rest, contact });
  }

  protected withFields(fields: RegistrationFields): Registration {
    return new Registration(fields);
  }

  get key(): Jwk {
    return this.fields.key;
  }

  get contact(): readonly string[] {
    return this.fields.contact;
  }

  get recoveryToken(): string | undefined {
    return this.fields.recoveryToken;
  }

  get agreement(): string | undefined {
    return this.fields.agreement;
  }

  get phones(): string[] {
    return this.filterContact(PHONE_PREFIX);
  }

  get emails(): string[] {
    return this.filterContact(EMAIL_PREFIX);
  }

  private filterContact(prefix: string): string[] {
    return this.fields.contact
      .filter((uri) => uri.startsWith(prefix))
      .map((uri) => uri.slice(prefix.length));
  }
}
