import { describe, test, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CLI_TEST_ENV, runCli } from '../../src/cli/program.js';
import { resolveUnknownFieldPolicy } from '../../src/cli/utils/config.js';

const publicJwk = { kty: 'EC', crv: 'P-256', x: 'test-x-coordinate', y: 'test-y-coordinate' };

describe('acme-wire CLI', () => {
  let dir: string;
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let errSpy: jest.SpiedFunction<typeof console.error>;

  function writeJson(name: string, value: unknown): string {
    const file = join(dir, name);
    writeFileSync(file, JSON.stringify(value));
    return file;
  }

  function logged(): string[] {
    return logSpy.mock.calls.map((call) => call.join(' '));
  }

  beforeEach(() => {
    process.env[CLI_TEST_ENV] = '1';
    dir = mkdtempSync(join(tmpdir(), 'acme-wire-cli-'));
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errSpy.mockRestore();
    rmSync(dir, { recursive: true, force: true });
    delete process.env[CLI_TEST_ENV];
    delete process.env.ACME_WIRE_UNKNOWN_FIELDS;
  });

  test('shows help without exiting', async () => {
    const writeSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    try {
      await expect(runCli(['--help'])).resolves.toBeDefined();
    } finally {
      writeSpy.mockRestore();
    }
  });

  test('prints the revoke-cert endpoint', async () => {
    await runCli(['revoke-url', 'https://ca.example/acme/new-reg']);
    expect(logged()).toEqual(['https://ca.example/acme/revoke-cert']);
  });

  test('decodes a registration into partial JSON', async () => {
    const file = writeJson('reg.json', {
      key: publicJwk,
      contact: ['mailto:admin@example.com'],
      agreement: null,
      extra: 1,
    });
    await runCli(['decode', 'registration', file, '--format', 'partial']);
    expect(errSpy).not.toHaveBeenCalled();
    expect(JSON.parse(logged()[0])).toEqual({
      key: publicJwk,
      contact: ['mailto:admin@example.com'],
    });
  });

  test('decodes into full JSON by default', async () => {
    const file = writeJson('chall.json', { type: 'dns', token: 'tok', uri: 'https://ca.example/c/1' });
    await runCli(['decode', 'challenge-body', file]);
    expect(JSON.parse(logged()[0])).toEqual({
      type: 'dns',
      token: 'tok',
      uri: 'https://ca.example/c/1',
      status: 'pending',
      validated: null,
    });
  });

  test('prints the message hash', async () => {
    const file = writeJson('authz.json', { identifier: { type: 'dns', value: 'example.com' } });
    await runCli(['decode', 'authorization', file, '-f', 'hash']);
    expect(logged()[0]).toMatch(/^[0-9a-f]{64}$/);
  });

  test('reports unknown fields when rejecting them', async () => {
    const file = writeJson('reg.json', { key: publicJwk, extra: 1 });
    await runCli(['decode', 'registration', file, '--reject-unknown']);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy.mock.calls[0][1]).toBe('Registration: unrecognized field(s) extra');
  });

  test('takes the unknown-field policy from the environment', async () => {
    process.env.ACME_WIRE_UNKNOWN_FIELDS = 'reject';
    const file = writeJson('reg.json', { key: publicJwk, extra: 1 });
    await runCli(['decode', 'registration', file]);
    expect(errSpy.mock.calls[0][1]).toBe('Registration: unrecognized field(s) extra');
  });

  test('reports field issues of invalid messages', async () => {
    const file = writeJson('authz.json', {
      identifier: { type: 'dns', value: 'example.com' },
      combinations: [[0]],
    });
    await runCli(['decode', 'authorization', file]);
    expect(errSpy.mock.calls[0][1]).toBe(
      'Authorization: combination 0 refers to challenge 0, but only 0 challenge(s) are present',
    );
  });

  test('rejects unknown message kinds', async () => {
    const file = writeJson('x.json', {});
    await runCli(['decode', 'bogus', file]);
    expect(String(errSpy.mock.calls[0][1])).toMatch(/^Unknown message kind "bogus"/);
  });

  test('reports invalid JSON input', async () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ not json');
    await runCli(['decode', 'error', file]);
    expect(errSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).not.toHaveBeenCalled();
  });

  test('explains an error document', async () => {
    const file = writeJson('problem.json', {
      type: 'urn:acme:error:malformed',
      detail: 'bad JWS',
    });
    await runCli(['explain-error', file]);
    const output = logged();
    expect(output[output.length - 1]).toBe(
      'malformed :: The request message was malformed :: bad JWS',
    );
    expect(output.some((line) => line.includes('The request message was malformed'))).toBe(true);
  });

  test('warns before explaining a document without an error type', async () => {
    const file = writeJson('untyped.json', { detail: 'bad JWS' });
    await runCli(['explain-error', file]);
    const output = logged();
    expect(output[0]).toContain('⚠ Input has no urn:acme:error: type; decoding anyway');
    expect(output[output.length - 1]).toBe('bad JWS');
  });
});

describe('resolveUnknownFieldPolicy', () => {
  test('prefers the flag over the environment', () => {
    expect(resolveUnknownFieldPolicy(true, { ACME_WIRE_UNKNOWN_FIELDS: 'ignore' })).toBe('reject');
  });

  test('reads the environment, case-insensitively', () => {
    expect(resolveUnknownFieldPolicy(undefined, { ACME_WIRE_UNKNOWN_FIELDS: ' Reject ' })).toBe(
      'reject',
    );
  });

  test('defaults to ignore', () => {
    expect(resolveUnknownFieldPolicy(undefined, {})).toBe('ignore');
    expect(resolveUnknownFieldPolicy(false, { ACME_WIRE_UNKNOWN_FIELDS: '' })).toBe('ignore');
  });

  test('rejects other values', () => {
    expect(() => resolveUnknownFieldPolicy(undefined, { ACME_WIRE_UNKNOWN_FIELDS: 'sometimes' })).toThrow(
      'ACME_WIRE_UNKNOWN_FIELDS must be "ignore" or "reject", got "sometimes"',
    );
  });
});
