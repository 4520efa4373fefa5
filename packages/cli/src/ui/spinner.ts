/**
 * Spinner - Progress feedback on stderr
 *
 * stdout carries the status document, so spinners and status lines
 * always go to stderr.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export interface SpinnerOptions {
  text?: string;
  /** Whether to animate (false in CI mode or when stderr is not a terminal) */
  enabled?: boolean;
}

/**
 * Spinner wrapper for consistent CLI feedback
 */
export class Spinner {
  private spinner: Ora;

  constructor(options: SpinnerOptions = {}) {
    const enabled = options.enabled ?? (!process.env['CI'] && Boolean(process.stderr.isTTY));

    const baseOptions = {
      color: 'cyan',
      isEnabled: enabled,
      stream: process.stderr,
    } as const;

    this.spinner = options.text
      ? ora({ ...baseOptions, text: options.text })
      : ora(baseOptions);
  }

  start(text?: string): this {
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    this.spinner.succeed(text);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

}

export function createSpinner(textOrOptions?: string | SpinnerOptions): Spinner {
  if (typeof textOrOptions === 'string') {
    return new Spinner({ text: textOrOptions });
  }
  return new Spinner(textOrOptions);
}

/**
 * Status indicators for non-spinner output
 */
export const status = {
  success(message: string): void {
    console.error(chalk.green('✔'), message);
  },

  info(message: string): void {
    console.error(chalk.blue('ℹ'), message);
  },
};
