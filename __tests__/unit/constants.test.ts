import { describe, it, expect } from '@jest/globals';
import {
  Constant,
  ConstantRegistry,
  DecodeError,
  IDENTIFIER_FQDN,
  IdentifierType,
  Status,
  STATUS_NAMES,
  STATUS_PENDING,
  STATUS_VALID,
} from '../../src/index.js';

describe('ConstantRegistry', () => {
  it('returns canonical instances', () => {
    expect(Status.get('pending')).toBe(STATUS_PENDING);
    expect(Status.fromJSON('valid')).toBe(STATUS_VALID);
    expect(Status.values().map((constant) => constant.name)).toEqual([...STATUS_NAMES]);
  });

  it('rejects unknown tokens', () => {
    expect(() => Status.fromJSON('bogus')).toThrow(DecodeError);
    expect(() => Status.fromJSON('bogus')).toThrow('Status: unrecognized value "bogus"');
    expect(() => Status.fromJSON(1)).toThrow(DecodeError);
    expect(Status.has('bogus')).toBe(false);
  });

  it('serializes to the bare token', () => {
    expect(STATUS_VALID.toJSON()).toBe('valid');
    expect(STATUS_VALID.toPartialJSON()).toBe('valid');
    expect(STATUS_VALID.toString()).toBe('Status(valid)');
    expect(IDENTIFIER_FQDN.toJSON()).toBe('dns');
    expect(IdentifierType.fromJSON('dns')).toBe(IDENTIFIER_FQDN);
  });

  it('compares by registry and token', () => {
    expect(new Constant('Status', 'valid').equals(STATUS_VALID)).toBe(true);
    expect(new Constant('Status', 'valid').hash()).toBe(STATUS_VALID.hash());
    expect(new ConstantRegistry('Verdict', ['valid']).get('valid').equals(STATUS_VALID)).toBe(
      false,
    );
    expect(STATUS_VALID.equals('valid')).toBe(false);
  });

  it('refuses to construct tokens outside the whitelist', () => {
    expect(() => new Constant('Status', 'bogus')).toThrow(DecodeError);
    expect(() => new Constant('Status', 'bogus')).toThrow('Status: unrecognized value "bogus"');
    expect(() => new Constant('IdentifierType', 'valid')).toThrow(DecodeError);
    expect(() => new Constant('Unregistered', 'valid')).toThrow(DecodeError);
  });

  it('decodes through its field schema', () => {
    expect(Status.schema.parse('revoked')).toBe(Status.get('revoked'));
    expect(Status.schema.safeParse('bogus').success).toBe(false);
  });

  it('extends into a new registry without touching the original', () => {
    const extended = Status.extend('deactivated');
    expect(extended.name).toBe('Status');
    expect(extended.get('pending')).toBe(STATUS_PENDING);
    expect(extended.fromJSON('deactivated').toString()).toBe('Status(deactivated)');
    expect(Status.has('deactivated')).toBe(false);
  });
});
