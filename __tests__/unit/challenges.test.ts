import { describe, it, expect } from '@jest/globals';
import {
  ChallengeBody,
  decodeChallenge,
  DecodeError,
  DnsChallenge,
  DvsniChallenge,
  EncodeError,
  RecoveryContactChallenge,
  RecoveryTokenChallenge,
  SimpleHttpChallenge,
  STATUS_PENDING,
  STATUS_VALID,
  UnknownAttributeError,
} from '../../src/index.js';

describe('decodeChallenge', () => {
  it('dispatches on the type member', () => {
    expect(decodeChallenge({ type: 'dns', token: 'dns-token' })).toBeInstanceOf(DnsChallenge);
    expect(decodeChallenge({ type: 'dvsni', r: 'r-value', nonce: 'n-value' })).toBeInstanceOf(
      DvsniChallenge,
    );
    expect(decodeChallenge({ type: 'recoveryToken' })).toBeInstanceOf(RecoveryTokenChallenge);
    expect(decodeChallenge({ type: 'simpleHttp', token: 'tok' })).toBeInstanceOf(
      SimpleHttpChallenge,
    );
  });

  it('rejects unknown or missing discriminants', () => {
    expect(() => decodeChallenge({ type: 'carrierPigeon' })).toThrow(
      'Unrecognized challenge type "carrierPigeon"',
    );
    expect(() => decodeChallenge({ token: 'tok' })).toThrow(DecodeError);
    expect(() => decodeChallenge(null)).toThrow('Challenge must be decoded from a JSON object');
  });

  it('maps recovery contact members to their wire names', () => {
    const challenge = new RecoveryContactChallenge({
      activationUrl: 'https://ca.example/recover/activate',
      contact: 'c*******@example.com',
    });
    expect(challenge.toPartialJSON()).toEqual({
      type: 'recoveryContact',
      activationURL: 'https://ca.example/recover/activate',
      contact: 'c*******@example.com',
    });
    const decoded = decodeChallenge(challenge.toJSON());
    expect(decoded.equals(challenge)).toBe(true);
  });

  it('writes recovery token challenges as their type alone', () => {
    expect(new RecoveryTokenChallenge().toJSON()).toEqual({ type: 'recoveryToken' });
  });
});

describe('ChallengeBody', () => {
  const chall = new DnsChallenge({ token: 'evaGxfADs6pSRb2LAv9IZf17Dt3juxGJ-PCt92wr-oA' });
  const body = new ChallengeBody({ uri: 'https://ca.example/authz/1/0', chall });

  it('defaults status to pending and leaves it out of partial JSON', () => {
    expect(body.status).toBe(STATUS_PENDING);
    expect(body.toPartialJSON()).toEqual({
      type: 'dns',
      token: 'evaGxfADs6pSRb2LAv9IZf17Dt3juxGJ-PCt92wr-oA',
      uri: 'https://ca.example/authz/1/0',
    });
  });

  it('writes every member in full JSON', () => {
    expect(body.toJSON()).toEqual({
      type: 'dns',
      token: 'evaGxfADs6pSRb2LAv9IZf17Dt3juxGJ-PCt92wr-oA',
      uri: 'https://ca.example/authz/1/0',
      status: 'pending',
      validated: null,
    });
  });

  it('keeps its own copy of the validation time', () => {
    const validated = new Date('2015-03-01T00:00:00Z');
    const stamped = new ChallengeBody({ uri: 'https://ca.example/authz/1/0', chall, validated });
    const hash = stamped.hash();

    validated.setUTCFullYear(2030);
    stamped.validated?.setUTCFullYear(2031);
    const read = stamped.attribute('validated');
    expect(read).toBeInstanceOf(Date);
    if (read instanceof Date) {
      read.setUTCFullYear(2032);
    }

    expect(stamped.hash()).toBe(hash);
    expect(stamped.validated?.toISOString()).toBe('2015-03-01T00:00:00.000Z');
    expect(stamped.toJSON().validated).toBe('2015-03-01T00:00:00.000Z');
  });

  it('fails to encode an invalid validation time', () => {
    const broken = new ChallengeBody({
      uri: 'https://ca.example/authz/1/0',
      chall,
      validated: new Date('not a date'),
    });
    expect(() => broken.toJSON()).toThrow(EncodeError);
    expect(() => broken.toPartialJSON()).toThrow('Invalid Date cannot be written as a timestamp');
  });

  it('decodes the embedded challenge from the same mapping', () => {
    const decoded = ChallengeBody.fromJSON({
      type: 'simpleHttp',
      token: 'tok',
      uri: 'https://ca.example/authz/1/1',
      status: 'valid',
      validated: '2015-03-01T12:30:00Z',
    });
    expect(decoded.chall).toBeInstanceOf(SimpleHttpChallenge);
    expect(decoded.typ).toBe('simpleHttp');
    expect(decoded.token).toBe('tok');
    expect(decoded.status).toBe(STATUS_VALID);
    expect(decoded.validated?.toISOString()).toBe('2015-03-01T12:30:00.000Z');
    expect(decoded.toPartialJSON()).toEqual({
      type: 'simpleHttp',
      token: 'tok',
      uri: 'https://ca.example/authz/1/1',
      status: STATUS_VALID,
      validated: '2015-03-01T12:30:00.000Z',
    });
  });

  it('rejects unknown members only when asked to', () => {
    const json = { type: 'dns', token: 'tok', uri: 'https://ca.example/authz/1/0', extra: true };
    expect(ChallengeBody.fromJSON(json).uri).toBe('https://ca.example/authz/1/0');
    expect(() => ChallengeBody.fromJSON(json, { unknownFields: 'reject' })).toThrow(
      'ChallengeBody: unrecognized field(s) extra',
    );
    const { extra: _extra, ...known } = json;
    expect(ChallengeBody.fromJSON(known, { unknownFields: 'reject' }).token).toBe('tok');
  });

  it('fails when the embedded challenge is invalid', () => {
    expect(() =>
      ChallengeBody.fromJSON({ type: 'dns', uri: 'https://ca.example/authz/1/0' }),
    ).toThrow(/^ChallengeBody: invalid value for field "chall"/);
  });

  it('forwards attributes to the challenge', () => {
    const dvsni = new ChallengeBody({
      uri: 'https://ca.example/authz/1/2',
      chall: new DvsniChallenge({ r: 'r-value', nonce: 'n-value' }),
    });
    expect(dvsni.attribute('nonce')).toBe('n-value');
    expect(dvsni.attribute('uri')).toBe('https://ca.example/authz/1/2');
    expect(() => dvsni.token).toThrow(UnknownAttributeError);
    expect(() => dvsni.attribute('missing')).toThrow(
      'Challenge body of type dvsni has no attribute "missing"',
    );
  });

  it('compares by body and challenge', () => {
    const copy = ChallengeBody.fromJSON(body.toJSON());
    expect(copy.equals(body)).toBe(true);
    expect(copy.hash()).toBe(body.hash());
    expect(body.update({ status: STATUS_VALID }).equals(body)).toBe(false);
  });
});
