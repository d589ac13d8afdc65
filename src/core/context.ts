import type { Session } from '../types/session.js';
import type { ConsoleConfig } from '../types/config.js';
import type { ConsoleLogger } from '../utils/logger.js';
import type { ConsolePrompts } from '../prompts/console-prompts.js';
import type { CommandRunner } from './command-runner.js';

/** Everything an operation needs, built once after the credential is validated. */
export interface ConsoleContext {
  session: Session;
  config: ConsoleConfig;
  logger: ConsoleLogger;
  runner: CommandRunner;
  prompts: ConsolePrompts;
  projectRoot: string;
  /** login name used by the permissions fix */
  user: string;
  lookupTool: (tool: string) => boolean;
}

/** Yes/no prompt; auto-confirmed without touching stdin in non-interactive mode. */
export async function confirmAction(
  ctx: Pick<ConsoleContext, 'session' | 'prompts' | 'logger'>,
  message: string,
): Promise<boolean> {
  if (!ctx.session.interactive) {
    ctx.logger.info(`${message} [y/N]: y (auto-confirmed)`);
    return true;
  }
  return ctx.prompts.confirm(message);
}
