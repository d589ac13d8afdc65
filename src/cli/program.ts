import { Command } from 'commander';
import { getPackageVersion } from '../utils/version.js';
import type { ConsoleOptions } from './console.js';

export function buildProgram(action: (options: ConsoleOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name('opsdeck')
    .description('Operator console for a Docker Compose deployment: host updates, engine install, image and container upkeep')
    .version(getPackageVersion())
    .option('-y, --yes', 'non-interactive: validate, run the startup checks, auto-confirm, then exit')
    .option('--config <path>', 'config file (default: ./opsdeck.config.json)')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(action);

  return program;
}
