import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  fail(text?: string): SpinnerHandle;
  warn(text?: string): SpinnerHandle;
}

/**
 * Chainable ora wrapper; start() after succeed/fail/warn begins a new line.
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;
  let settled = true;

  return {
    start(text: string) {
      if (!spinner || settled) spinner = ora(text).start();
      else spinner.text = text;
      settled = false;
      return this;
    },
    succeed(text?: string) {
      spinner?.succeed(text && chalk.green(text));
      settled = true;
      return this;
    },
    fail(text?: string) {
      spinner?.fail(text && chalk.red(text));
      settled = true;
      return this;
    },
    warn(text?: string) {
      spinner?.warn(text && chalk.yellow(text));
      settled = true;
      return this;
    },
  };
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

export function success(msg: string) {
  console.log(chalk.green('✔') + ' ' + chalk.green(msg));
}
