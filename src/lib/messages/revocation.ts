/**
 * Certificate revocation request
 */

import { REVOKE_CERT_PATH } from '../constants/defaults.js';
import { ComparableCertificate } from '../crypto/der.js';
import { DecodeError } from '../json/errors.js';
import { decodedBy, field, type FieldSchema } from '../json/field.js';
import { decodeFields, TypedJsonObject } from '../json/typed-json-object.js';
import type { DecodeOptions } from '../json/types.js';

export interface RevocationFields {
  certificate: ComparableCertificate;
}

export class Revocation extends TypedJsonObject<RevocationFields, Revocation> {
  static readonly schema: FieldSchema<RevocationFields> = {
    certificate: field(
      'certificate',
      decodedBy((json) => ComparableCertificate.fromJSON(json)),
    ),
  };

  constructor(fields: RevocationFields) {
    super(Revocation.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): Revocation {
    return new Revocation(decodeFields(Revocation.schema, json, 'Revocation', options));
  }

  /**
   * Revoke-certificate endpoint of the server behind `directoryBase`. Any
   * path, query or fragment already on the URL is discarded.
   *
   * @example
   * ```typescript
   * Revocation.url('https://ca.example/acme/new-reg');
   * // 'https://ca.example/acme/revoke-cert'
   * ```
   */
  static url(directoryBase: string): string {
    let base: URL;
    try {
      base = new URL(directoryBase);
    } catch (error) {
      throw new DecodeError(`Invalid directory URL ${JSON.stringify(directoryBase)}`, {
        directoryBase,
        cause: error,
      });
    }
    // file:, data: and other opaque schemes serialize their origin as "null"
    if (base.origin === 'null') {
      throw new DecodeError(`Directory URL has no origin: ${JSON.stringify(directoryBase)}`, {
        directoryBase,
      });
    }
    return new URL(REVOKE_CERT_PATH, base.origin).toString();
  }

  protected withFields(fields: RevocationFields): Revocation {
    return new Revocation(fields);
  }

  get certificate(): ComparableCertificate {
    return this.fields.certificate;
  }
}
