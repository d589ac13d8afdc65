import type { ConsoleLogger } from '../utils/logger.js';
import type { CommandExecutor } from '../utils/exec.js';
import type { ConsolePrompts } from '../prompts/console-prompts.js';
import { ConsoleError, ConsoleErrorCode } from '../utils/errors.js';
import { Credential } from './credential.js';

export const CREDENTIAL_ENV = 'SUDO_PASS';

// -k ignores a cached sudo timestamp, so the first stdin line is always read as the password
export const SUDO_PREFIX = ['sudo', '-k', '-S', '-p', ''] as const;

export interface CredentialGateDeps {
  interactive: boolean;
  env: Record<string, string | undefined>;
  executor: CommandExecutor;
  prompts: ConsolePrompts;
  logger: ConsoleLogger;
}

export async function validateSecret(executor: CommandExecutor, secret: string): Promise<boolean> {
  const result = await executor({
    command: SUDO_PREFIX[0],
    args: [...SUDO_PREFIX.slice(1), 'true'],
    input: `${secret}\n`,
    quiet: true,
  });
  return result.exitCode === 0;
}

/**
 * Produces the session credential: from the environment when set (one attempt),
 * otherwise by prompting until a valid secret is entered.
 */
export async function acquireCredential(deps: CredentialGateDeps): Promise<Credential> {
  const { interactive, env, executor, prompts, logger } = deps;
  const supplied = env[CREDENTIAL_ENV];

  if (supplied) {
    if (!(await validateSecret(executor, supplied))) {
      throw new ConsoleError(ConsoleErrorCode.AUTH_ERROR, 'Provided sudo password is invalid. Exiting.');
    }
    logger.info('Sudo password validated from environment variable.');
    return new Credential(supplied);
  }

  if (!interactive) {
    throw new ConsoleError(ConsoleErrorCode.AUTH_ERROR, 'Sudo password not provided in non-interactive mode. Exiting.');
  }

  for (;;) {
    const entered = await prompts.password('Sudo Password:');
    if (await validateSecret(executor, entered)) {
      logger.info('Sudo password validated.');
      return new Credential(entered);
    }
    logger.error('Invalid sudo password. Please try again.');
  }
}
