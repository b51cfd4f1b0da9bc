/**
 * CLI Output Formatter
 *
 * Utilities for pretty-printing CLI output with colors.
 */

import chalk from "chalk";

/**
 * Format a loop exit code with color
 *
 * @param code - Exit code returned by run()
 * @returns Colored exit code
 */
export function formatExitCode(code: number): string {
  return code === 0 ? chalk.green(String(code)) : chalk.red(String(code));
}

/**
 * Print a success message
 *
 * @param message - Success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green("✓"), message);
}

/**
 * Print an error message
 *
 * @param message - Error message
 */
export function printError(message: string): void {
  console.error(chalk.red("✗"), message);
}

/**
 * Print an info message
 *
 * @param message - Info message
 */
export function printInfo(message: string): void {
  console.log(chalk.blue("ℹ"), message);
}

/**
 * Print a section header
 *
 * @param title - Header text
 */
export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.cyan(`slotloop - ${title}`));
  console.log(chalk.gray("─".repeat(50)));
  console.log();
}
