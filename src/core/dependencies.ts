import type { ConsoleContext } from './context.js';
import { confirmAction } from './context.js';

export type Installer = () => Promise<boolean>;

/**
 * Makes sure `tool` is on PATH, offering to run `installer` when it is not.
 * Never throws for a failed install: startup carries on either way.
 */
export async function ensureDependency(ctx: ConsoleContext, tool: string, installer: Installer): Promise<void> {
  const { logger } = ctx;

  if (ctx.lookupTool(tool)) {
    logger.info(`${tool} is already installed.`);
    return;
  }

  logger.warn(`${tool} is not installed.`);
  if (!(await confirmAction(ctx, `Install ${tool}?`))) {
    logger.info(`Skipping ${tool} installation.`);
    return;
  }

  if (!(await installer())) {
    logger.warn(`Continuing without ${tool}.`);
  }
}
