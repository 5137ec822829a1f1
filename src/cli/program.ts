import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { handleError } from './utils/errors.js';
import { handleDecodeCommand } from './commands/decode.js';
import { handleExplainErrorCommand } from './commands/explain-error.js';
import { handleRevokeUrlCommand } from './commands/revoke-url.js';

export const CLI_TEST_ENV = 'ACME_WIRE_CLI_TEST';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

/** Build a Commander program instance for the acme-wire CLI. */
export function createCli(): Command {
  const program = new Command();

  program
    .name('acme-wire')
    .description('Inspect and normalize ACME protocol messages')
    .version(readVersion());

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env[CLI_TEST_ENV]) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env[CLI_TEST_ENV]) return;
    process.exitCode = 1;
  }

  program
    .command('decode')
    .description('Decode a message and print it in normalized form')
    .argument('<kind>', 'Message kind (registration, authorization, challenge-body, error, ...)')
    .argument('[file]', 'JSON file to read, stdin when omitted or "-"')
    .option('-f, --format <format>', 'Output: full, partial or hash', 'full')
    .option('--reject-unknown', 'Fail on unrecognized fields')
    .action(async (kind: string, file: string | undefined, opts: { format: string; rejectUnknown?: boolean }) => {
      try {
        await handleDecodeCommand({ kind, file, format: opts.format, rejectUnknown: opts.rejectUnknown });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('revoke-url')
    .description('Print the revoke-cert endpoint for a directory URL')
    .argument('<directory>', 'Directory or any resource URL of the server')
    .action(async (directory: string) => {
      try {
        await handleRevokeUrlCommand(directory);
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('explain-error')
    .description('Describe an ACME error document')
    .argument('[file]', 'JSON file to read, stdin when omitted or "-"')
    .option('--reject-unknown', 'Fail on unrecognized fields')
    .action(async (file: string | undefined, opts: { rejectUnknown?: boolean }) => {
      try {
        await handleExplainErrorCommand({ file, rejectUnknown: opts.rejectUnknown });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

function commanderCode(err: unknown): string | undefined {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = commanderCode(err);
    if (!(process.env[CLI_TEST_ENV] && (code === 'commander.helpDisplayed' || code === 'commander.version'))) {
      throw err;
    }
  }
  return program;
}
