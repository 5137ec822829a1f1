import { readFile } from 'fs/promises';
import { z } from 'zod';
import { DEFAULT_UNKNOWN_FIELDS, UNKNOWN_FIELDS_ENV, type UnknownFieldPolicy } from '../../index.js';

const UnknownFieldPolicySchema = z.enum(['ignore', 'reject']);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Unknown-field policy from the `--reject-unknown` flag, else from the
 * environment, else the library default.
 */
export function resolveUnknownFieldPolicy(
  rejectUnknown: boolean | undefined,
  env: NodeJS.ProcessEnv = process.env,
): UnknownFieldPolicy {
  if (rejectUnknown) return 'reject';
  const fromEnv = env[UNKNOWN_FIELDS_ENV];
  if (fromEnv === undefined || fromEnv === '') return DEFAULT_UNKNOWN_FIELDS;
  const parsed = UnknownFieldPolicySchema.safeParse(fromEnv.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(`${UNKNOWN_FIELDS_ENV} must be "ignore" or "reject", got "${fromEnv}"`);
  }
  return parsed.data;
}

/** Parse JSON from a file, or from stdin when `file` is absent or "-". */
export async function readJsonInput(file?: string): Promise<unknown> {
  const text = file && file !== '-' ? await readFile(file, 'utf-8') : await readStdin();
  return JSON.parse(text);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}
