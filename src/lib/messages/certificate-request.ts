import { z } from 'zod';
import { ComparableCsr } from '../crypto/der.js';
import { decodedBy, field, type FieldSchema } from '../json/field.js';
import { decodeFields, TypedJsonObject } from '../json/typed-json-object.js';
import type { DecodeOptions } from '../json/types.js';

export interface CertificateRequestFields {
  csr: ComparableCsr;
  /** URIs of the authorizations backing the request */
  authorizations: readonly string[];
}

export class CertificateRequest extends TypedJsonObject<
  CertificateRequestFields,
  CertificateRequest
> {
  static readonly schema: FieldSchema<CertificateRequestFields> = {
    csr: field(
      'csr',
      decodedBy((json) => ComparableCsr.fromJSON(json)),
    ),
    authorizations: field('authorizations', z.array(z.string()), { default: [] }),
  };

  constructor({
    csr,
    authorizations = [],
  }: Omit<CertificateRequestFields, 'authorizations'> & { authorizations?: readonly string[] }) {
    super(CertificateRequest.schema, { csr, authorizations: Object.freeze([...authorizations]) });
  }

  static fromJSON(json: unknown, options?: DecodeOptions): CertificateRequest {
    return new CertificateRequest(
      decodeFields(CertificateRequest.schema, json, 'CertificateRequest', options),
    );
  }

  protected withFields(fields: CertificateRequestFields): CertificateRequest {
    return new CertificateRequest(fields);
  }

  get csr(): ComparableCsr {
    return this.fields.csr;
  }

  get authorizations(): readonly string[] {
    return this.fields.authorizations;
  }
}
