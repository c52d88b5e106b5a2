/**
 * reporter.ts - Terminal output for assist commands
 *
 * Every line a command prints goes through a Reporter. The console reporter
 * colours lines with chalk (yellow progress, green success, red failure);
 * tests pass their own Reporter and assert on the plain text.
 */

import chalk from "chalk";

export interface Reporter {
  /** Uncoloured line. Called with no argument for a blank line. */
  info(message?: string): void;
  /** Yellow: work in progress, notes. */
  progress(message: string): void;
  /** Green: headings, saved files, banners. */
  success(message: string): void;
  /** Red: a collection step that failed. */
  failure(message: string): void;
  /** Green text with no trailing newline, for interactive prompts. */
  prompt(message: string): void;
}

export function createConsoleReporter(): Reporter {
  /* eslint-disable no-console */
  return {
    info: (message = "") => console.log(message),
    progress: (message) => console.log(chalk.yellow(message)),
    success: (message) => console.log(chalk.green(message)),
    failure: (message) => console.log(chalk.red(message)),
    prompt: (message) => {
      process.stdout.write(chalk.green(message));
    },
  };
  /* eslint-enable no-console */
}
