import { describe, it, expect, beforeAll } from '@jest/globals';
import {
  Authorization,
  AuthorizationResource,
  CertificateResource,
  ChallengeBody,
  ChallengeResource,
  ComparableCertificate,
  DnsChallenge,
  Identifier,
  IDENTIFIER_FQDN,
  Jwk,
  Registration,
  RegistrationResource,
} from '../../src/index.js';
import { createTestCertificate } from '../utils/certificates.js';

const chall = new DnsChallenge({ token: 'dns-token' });
const identifier = new Identifier({ typ: IDENTIFIER_FQDN, value: 'example.com' });

describe('ChallengeResource', () => {
  it('reads the URI through to the body', () => {
    const resource = new ChallengeResource({
      body: new ChallengeBody({ uri: 'https://ca.example/authz/1/0', chall }),
      authzrUri: 'https://ca.example/authz/1',
      uri: 'https://ca.example/tracked',
    });
    expect(resource.uri).toBe('https://ca.example/authz/1/0');
    expect(resource.authzrUri).toBe('https://ca.example/authz/1');
  });

  it('falls back to the tracked URI when the body has none', () => {
    const resource = new ChallengeResource({
      body: new ChallengeBody({ uri: '', chall }),
      authzrUri: 'https://ca.example/authz/1',
      uri: 'https://ca.example/tracked',
    });
    expect(resource.uri).toBe('https://ca.example/tracked');
  });

  it('compares by value and updates', () => {
    const body = new ChallengeBody({ uri: 'https://ca.example/authz/1/0', chall });
    const resource = new ChallengeResource({ body, authzrUri: 'https://ca.example/authz/1' });
    const copy = ChallengeResource.fromJSON(resource.toJSON());
    expect(copy.equals(resource)).toBe(true);
    expect(copy.hash()).toBe(resource.hash());

    const moved = resource.update({ authzrUri: 'https://ca.example/authz/2' });
    expect(moved.equals(resource)).toBe(false);
    expect(moved.body).toBe(body);
  });
});

describe('RegistrationResource', () => {
  it('keeps the registration links', () => {
    const body = new Registration({ key: Jwk.fromJSON({ kty: 'oct', k: 'test-secret' }).publicKey() });
    const resource = new RegistrationResource({
      body,
      uri: 'https://ca.example/acme/reg/1',
      newAuthzrUri: 'https://ca.example/acme/new-authz',
      termsOfService: 'https://ca.example/terms',
    });
    expect(resource.toPartialJSON()).toEqual({
      body,
      uri: 'https://ca.example/acme/reg/1',
      newAuthzrUri: 'https://ca.example/acme/new-authz',
      termsOfService: 'https://ca.example/terms',
    });
    expect(RegistrationResource.fromJSON(resource.toJSON()).equals(resource)).toBe(true);
  });
});

describe('CertificateResource', () => {
  let certificate: ComparableCertificate;

  beforeAll(async () => {
    certificate = new ComparableCertificate(await createTestCertificate());
  });

  it('nests the authorizations it was issued under', () => {
    const authzr = new AuthorizationResource({
      body: new Authorization({ identifier }),
      uri: 'https://ca.example/acme/authz/1',
      newCertUri: 'https://ca.example/acme/new-cert',
    });
    const resource = new CertificateResource({
      body: certificate,
      uri: 'https://ca.example/acme/cert/1',
      certChainUri: 'https://ca.example/acme/issuer-cert',
      authzrs: [authzr],
    });
    expect(resource.authzrs[0].newCertUri).toBe('https://ca.example/acme/new-cert');

    const decoded = CertificateResource.fromJSON(JSON.parse(JSON.stringify(resource.toJSON())));
    expect(decoded.equals(resource)).toBe(true);
    expect(decoded.body.equals(certificate)).toBe(true);
    expect(decoded.certChainUri).toBe('https://ca.example/acme/issuer-cert');
  });

  it('has no authorizations by default', () => {
    const resource = new CertificateResource({ body: certificate });
    expect(resource.authzrs).toEqual([]);
    expect(resource.toPartialJSON()).toEqual({ body: certificate });
  });
});
