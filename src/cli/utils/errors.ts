import chalk from 'chalk';
import { DecodeError, EncodeError, ServerProblemError } from '../../index.js';
import { ConfigError } from './config.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof DecodeError) {
    console.error(chalk.red('Decode error:'), error.message);
    for (const issue of error.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '<value>';
      console.error(chalk.gray(`  ${path}: ${issue.message}`));
    }
  } else if (error instanceof EncodeError) {
    console.error(chalk.red('Encode error:'), error.message);
  } else if (error instanceof ServerProblemError) {
    console.error(chalk.yellow('Server problem:'), error.message);
  } else if (error instanceof ConfigError) {
    console.error(chalk.red('Configuration error:'), error.message);
  } else if (error instanceof SyntaxError) {
    console.error(chalk.red('Invalid JSON:'), error.message);
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
