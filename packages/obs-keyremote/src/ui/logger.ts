/**
 * Console logger
 *
 * Status lines go to stdout. Debug lines go to stderr and only when DEBUG
 * is set, so the daemon stays quiet under a service manager.
 */

import chalk from 'chalk';

function timestamp(): string {
  return new Date().toLocaleTimeString('en-US', {
    hour12: false,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

export class Logger {
  constructor(private readonly isDebugEnabled: () => boolean) {}

  debug(message: string, ...args: unknown[]): void {
    if (!this.isDebugEnabled()) {
      return;
    }
    console.error(chalk.gray(`[${timestamp()}] ${message}`), ...args);
  }

  debugLargeJson(message: string, value: unknown): void {
    if (!this.isDebugEnabled()) {
      return;
    }
    console.error(chalk.gray(`[${timestamp()}] ${message}`));
    console.error(chalk.gray(JSON.stringify(value, null, 2)));
  }

  info(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.log(chalk.yellow(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(message), ...args);
  }
}

export const logger = new Logger(() => Boolean(process.env.DEBUG));
