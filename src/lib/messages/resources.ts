/**
 * Resources
 *
 * A resource pairs a message body with the URI the server published it
 * under, plus whatever links came with it (the `Link` and `Location`
 * headers of the response). Resources are typed JSON objects themselves, so
 * they compare, hash and update like messages.
 */

import { z } from 'zod';
import { ComparableCertificate } from '../crypto/der.js';
import { decodedBy, field, listOf, type FieldSchema } from '../json/field.js';
import { decodeFields, TypedJsonObject } from '../json/typed-json-object.js';
import type { DecodeOptions, JsonSerializable } from '../json/types.js';
import { Authorization } from './authorization.js';
import { ChallengeBody } from './challenge-body.js';
import { Registration } from './registration.js';

export interface ResourceFields<B extends JsonSerializable> {
  body: B;
  uri?: string;
}

const uriField = field('uri', z.string().optional(), { omitEmpty: true });
const linkField = (json: string) => field(json, z.string().optional(), { omitEmpty: true });

export abstract class ResourceWithUri<
  B extends JsonSerializable,
  F extends ResourceFields<B>,
  Self extends ResourceWithUri<B, F, Self>,
> extends TypedJsonObject<F, Self> {
  get body(): F['body'] {
    return this.fields.body;
  }

  get uri(): string | undefined {
    return this.fields.uri;
  }
}

export interface ChallengeResourceFields extends ResourceFields<ChallengeBody> {
  authzrUri: string;
}

export class ChallengeResource extends ResourceWithUri<
  ChallengeBody,
  ChallengeResourceFields,
  ChallengeResource
> {
  static readonly schema: FieldSchema<ChallengeResourceFields> = {
    body: field(
      'body',
      decodedBy((json, options) => ChallengeBody.fromJSON(json, options)),
    ),
    uri: uriField,
    authzrUri: field('authzrUri', z.string()),
  };

  constructor(fields: ChallengeResourceFields) {
    super(ChallengeResource.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): ChallengeResource {
    return new ChallengeResource(
      decodeFields(ChallengeResource.schema, json, 'ChallengeResource', options),
    );
  }

  protected withFields(fields: ChallengeResourceFields): ChallengeResource {
    return new ChallengeResource(fields);
  }

  /** The body's own URI when it has one, else the tracked one */
  get uri(): string | undefined {
    return this.fields.body.uri || this.fields.uri;
  }

  get authzrUri(): string {
    return this.fields.authzrUri;
  }
}

export interface RegistrationResourceFields extends ResourceFields<Registration> {
  newAuthzrUri?: string;
  termsOfService?: string;
}

export class RegistrationResource extends ResourceWithUri<
  Registration,
  RegistrationResourceFields,
  RegistrationResource
> {
  static readonly schema: FieldSchema<RegistrationResourceFields> = {
    body: field(
      'body',
      decodedBy((json, options) => Registration.fromJSON(json, options)),
    ),
    uri: uriField,
    newAuthzrUri: linkField('newAuthzrUri'),
    termsOfService: linkField('termsOfService'),
  };

  constructor(fields: RegistrationResourceFields) {
    super(RegistrationResource.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): RegistrationResource {
    return new RegistrationResource(
      decodeFields(RegistrationResource.schema, json, 'RegistrationResource', options),
    );
  }

  protected withFields(fields: RegistrationResourceFields): RegistrationResource {
    return new RegistrationResource(fields);
  }

  get newAuthzrUri(): string | undefined {
    return this.fields.newAuthzrUri;
  }

  get termsOfService(): string | undefined {
    return this.fields.termsOfService;
  }
}

export interface AuthorizationResourceFields extends ResourceFields<Authorization> {
  newCertUri?: string;
}

export class AuthorizationResource extends ResourceWithUri<
  Authorization,
  AuthorizationResourceFields,
  AuthorizationResource
> {
  static readonly schema: FieldSchema<AuthorizationResourceFields> = {
    body: field(
      'body',
      decodedBy((json, options) => Authorization.fromJSON(json, options)),
    ),
    uri: uriField,
    newCertUri: linkField('newCertUri'),
  };

  constructor(fields: AuthorizationResourceFields) {
    super(AuthorizationResource.schema, fields);
  }

  static fromJSON(json: unknown, options?: DecodeOptions): AuthorizationResource {
    return new AuthorizationResource(
      decodeFields(AuthorizationResource.schema, json, 'AuthorizationResource', options),
    );
  }

  protected withFields(fields: AuthorizationResourceFields): AuthorizationResource {
    return new AuthorizationResource(fields);
  }

  get newCertUri(): string | undefined {
    return this.fields.newCertUri;
  }
}

export interface CertificateResourceFields extends ResourceFields<ComparableCertificate> {
  certChainUri?: string;
  /** Authorizations the certificate was issued under */
  authzrs: readonly AuthorizationResource[];
}

export class CertificateResource extends ResourceWithUri<
  ComparableCertificate,
  CertificateResourceFields,
  CertificateResource
> {
  static readonly schema: FieldSchema<CertificateResourceFields> = {
    body: field(
      'body',
      decodedBy((json) => ComparableCertificate.fromJSON(json)),
    ),
    uri: uriField,
    certChainUri: linkField('certChainUri'),
    authzrs: field(
      'authzrs',
      listOf(decodedBy((json, options) => AuthorizationResource.fromJSON(json, options))),
      { omitEmpty: true, default: [] },
    ),
  };

  constructor({
    authzrs = [],
    ...rest
  }: Omit<CertificateResourceFields, 'authzrs'> & { authzrs?: readonly AuthorizationResource[] }) {
    super(CertificateResource.schema, { ...rest, authzrs: Object.freeze([...authzrs]) });
  }

  static fromJSON(json: unknown, options?: DecodeOptions): CertificateResource {
    return new CertificateResource(
      decodeFields(CertificateResource.schema, json, 'CertificateResource', options),
    );
  }

  protected withFields(fields: CertificateResourceFields): CertificateResource {
    return new CertificateResource(fields);
  }

  get certChainUri(): string | undefined {
    return this.fields.certChainUri;
  }

  get authzrs(): readonly AuthorizationResource[] {
    return this.fields.authzrs;
  }
}
