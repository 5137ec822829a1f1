#!/usr/bin/env node

/**
 * CLI entrypoint. Commands live in ./cli/commands.
 */
import { createCli } from './cli/program.js';
import { handleError } from './cli/utils/errors.js';

process.on('unhandledRejection', (err) => {
  handleError(err);
  process.exit(1);
});

createCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    handleError(err);
    process.exit(1);
  });
