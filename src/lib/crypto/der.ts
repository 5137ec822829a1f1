/**
 * DER-encoded objects on the wire
 *
 * Certificates and certificate requests travel as base64url DER. The
 * wrappers compare by DER bytes, so two parses of the same encoding are
 * equal.
 */

import { Pkcs10CertificateRequest, X509Certificate } from '@peculiar/x509';
import './provider.js';
import { z } from 'zod';
import { hashJson } from '../json/canonical.js';
import { DecodeError } from '../json/errors.js';
import type { JsonSerializable } from '../json/types.js';

const Base64Url = z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be unpadded base64url');

interface DerEncoded {
  readonly rawData: ArrayBuffer;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

function decodeDer<T>(typeName: string, json: unknown, parse: (der: ArrayBuffer) => T): T {
  const parsed = Base64Url.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError(`${typeName}: invalid base64url DER`, { typeName }, parsed.error.issues);
  }
  try {
    return parse(toArrayBuffer(Buffer.from(parsed.data, 'base64url')));
  } catch (error) {
    throw new DecodeError(`${typeName}: ${error instanceof Error ? error.message : String(error)}`, {
      typeName,
      cause: error,
    });
  }
}

abstract class DerWrapper<T extends DerEncoded> implements JsonSerializable {
  protected constructor(readonly wrapped: T) {}

  get der(): Buffer {
    return Buffer.from(this.wrapped.rawData);
  }

  toPartialJSON(): string {
    return this.der.toString('base64url');
  }

  toJSON(): string {
    return this.toPartialJSON();
  }

  equals(other: unknown): boolean {
    return (
      other instanceof DerWrapper &&
      other.constructor === this.constructor &&
      this.der.equals(other.der)
    );
  }

  hash(): string {
    return hashJson(this.toJSON());
  }
}

/** X.509 certificate compared by its DER encoding */
export class ComparableCertificate extends DerWrapper<X509Certificate> {
  constructor(certificate: X509Certificate) {
    super(certificate);
  }

  static fromJSON(json: unknown): ComparableCertificate {
    return new ComparableCertificate(
      decodeDer('Certificate', json, (der) => new X509Certificate(der)),
    );
  }

  static fromPem(pem: string): ComparableCertificate {
    return new ComparableCertificate(new X509Certificate(pem));
  }

  get subject(): string {
    return this.wrapped.subject;
  }

  get serialNumber(): string {
    return this.wrapped.serialNumber;
  }

  toPem(): string {
    return this.wrapped.toString('pem');
  }
}

/** PKCS#10 certificate signing request compared by its DER encoding */
export class ComparableCsr extends DerWrapper<Pkcs10CertificateRequest> {
  constructor(csr: Pkcs10CertificateRequest) {
    super(csr);
  }

  static fromJSON(json: unknown): ComparableCsr {
    return new ComparableCsr(
      decodeDer('CertificateRequest', json, (der) => new Pkcs10CertificateRequest(der)),
    );
  }

  get subject(): string {
    return this.wrapped.subject;
  }

  toPem(): string {
    return this.wrapped.toString('pem');
  }
}
