import chalk from 'chalk';
import { InputLoadError, PublishFailedError, TemplateNotFoundError } from '../errors.js';
import { ConfigLoadError } from '../config/loader.js';

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof ConfigLoadError) {
    console.error(chalk.red(`Configuration error: ${err.message}`));
  } else if (err instanceof TemplateNotFoundError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow(`Create ${err.templatePath} or point TEMPLATE_DIR at a directory that has it.`));
  } else if (err instanceof InputLoadError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow('Pass the spreadsheet path as the first argument to `create`.'));
  } else if (err instanceof PublishFailedError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow('Neither the GitHub API nor the gh CLI could create the issue; see the log above.'));
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
  }
  process.exit(1);
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
