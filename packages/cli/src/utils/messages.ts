/**
 * Messaging Utility
 *
 * Consistent console formatting for the CLI. Primary output (restore plans,
 * summaries) goes to stdout; diagnostics go to stderr so the plan stays
 * pipeable.
 */

import chalk from 'chalk';

// Disable colors in CI environments
if (process.env.CI === 'true' || process.env.GITHUB_ACTIONS === 'true' || process.env.NO_COLOR) {
  chalk.level = 0;
}

/**
 * Sink for non-fatal diagnostics raised by services.
 */
export interface Logger {
  warn(message: string): void;
}

/**
 * Logger that writes `[warn]` lines to stderr
 */
export const consoleLogger: Logger = {
  warn: (message: string) => printWarning(message),
};

/**
 * Print a warning to stderr
 */
export function printWarning(message: string, suggestion?: string): void {
  console.error(chalk.yellow(`[warn] ${message}`));
  if (suggestion) {
    console.error(chalk.dim(`       ${suggestion}`));
  }
}

/**
 * Print an error message with actionable next steps
 */
export function printError(message: string, error?: Error | string, nextSteps?: string[]): void {
  console.error(chalk.red(`[error] ${message}`));

  if (error) {
    const detail = error instanceof Error ? error.message : error;
    console.error(chalk.dim(`        ${detail}`));
  }

  if (nextSteps && nextSteps.length > 0) {
    nextSteps.forEach(step => {
      console.error(chalk.dim(`        • ${step}`));
    });
  }
}

/**
 * Print an info message
 */
export function printInfo(message: string, details?: string): void {
  console.log(chalk.cyan(message));
  if (details) {
    console.log(chalk.dim(`   ${details}`));
  }
}

/**
 * Print a success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green(message));
}

/**
 * Print a line with no styling (machine-readable plan output)
 */
export function printPlain(line: string): void {
  console.log(line);
}
