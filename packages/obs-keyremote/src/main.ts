import chalk from 'chalk';

import { ConfigurationError, loadConfiguration, type Configuration } from './configuration';
import { startController } from './controller/run';
import { CONTROLLER_USAGE, parseControllerArgs } from './utils/controllerArgs';

function fail(message: string): never {
  console.error(chalk.red('Error:'), message);
  console.error(CONTROLLER_USAGE);
  process.exit(1);
}

export async function main(args: string[], env: NodeJS.ProcessEnv): Promise<void> {
  let configuration: Configuration;
  try {
    configuration = loadConfiguration(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      fail(error.message);
    }
    throw error;
  }

  const parsed = parseControllerArgs(args);
  if (parsed.type === 'error') {
    fail(parsed.errorMessage);
  }

  await startController(parsed.options, configuration);
}
