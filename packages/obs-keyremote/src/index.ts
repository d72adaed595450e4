#!/usr/bin/env node

/**
 * CLI entry point for obs-keyremote
 *
 * Simple argument parsing without any CLI framework dependencies
 */

import chalk from 'chalk';

import { main } from './main';

main(process.argv.slice(2), process.env).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : 'Unknown error');
  if (process.env.DEBUG) {
    console.error(error);
  }
  process.exit(1);
});
