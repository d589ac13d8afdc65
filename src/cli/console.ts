import { userInfo } from 'node:os';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { loadConfig, configExists } from '../core/config.js';
import { OperationDispatcher, EXIT_CODES } from '../core/dispatcher.js';
import type { ConsoleLogger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { spawnCommand } from '../utils/exec.js';
import { formatConsoleError, isConsoleError } from '../utils/errors.js';
import { DEFAULT_LOG_FILE, OS_RELEASE_PATH, getConfigPath, getProjectRoot } from '../utils/paths.js';
import { inquirerPrompts } from '../prompts/console-prompts.js';
import { installSignalHandlers } from './signals.js';

export interface ConsoleOptions {
  yes?: boolean;
  config?: string;
}

function loginName(): string {
  return process.env.USER || userInfo().username;
}

export function describeFailure(err: unknown): string {
  if (isConsoleError(err)) return formatConsoleError(err);
  return `Unexpected failure: ${err instanceof Error ? err.message : String(err)}`;
}

export async function consoleCommand(options: ConsoleOptions): Promise<void> {
  const projectRoot = getProjectRoot();
  let logger: ConsoleLogger;
  try {
    logger = createLogger({ logFile: DEFAULT_LOG_FILE });
  } catch (err) {
    console.error(chalk.red(describeFailure(err)));
    process.exit(EXIT_CODES.fatal);
  }
  installSignalHandlers(logger);

  const configPath = options.config ? resolve(projectRoot, options.config) : getConfigPath(projectRoot);
  let exitCode: number;
  try {
    if (!configExists(configPath)) {
      logger.warn(`No config file at ${configPath}; using defaults.`);
    }
    const config = loadConfig(configPath);

    const dispatcher = new OperationDispatcher({
      interactive: !options.yes,
      config,
      logger,
      prompts: inquirerPrompts,
      executor: spawnCommand,
      env: process.env,
      osReleasePath: OS_RELEASE_PATH,
      projectRoot,
      user: loginName(),
    });
    exitCode = await dispatcher.run();
  } catch (err) {
    logger.error(describeFailure(err));
    exitCode = EXIT_CODES.fatal;
  }

  if (exitCode !== EXIT_CODES.quit) {
    console.error(chalk.dim(`Log file: ${logger.logFile}`));
  }
  process.exit(exitCode);
}
