import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ConsoleContext } from './context.js';
import { describeOutcome } from './command-runner.js';
import { ConsoleError, ConsoleErrorCode } from '../utils/errors.js';

function composeCommand(composeFile: string, ...args: string[]): string[] {
  return ['docker', 'compose', '-f', composeFile, ...args];
}

function requireComposeFile(ctx: ConsoleContext): string {
  const composeFile = ctx.config.composeFile;
  if (!existsSync(resolve(ctx.projectRoot, composeFile))) {
    throw new ConsoleError(ConsoleErrorCode.CONFIG_ERROR, `Docker Compose file '${composeFile}' not found.`, {
      projectRoot: ctx.projectRoot,
    });
  }
  return composeFile;
}

/** Pull, falling back to a local build. Throws when neither produces images. */
export async function refreshImages(ctx: ConsoleContext, composeFile: string): Promise<'pulled' | 'built'> {
  const { logger, runner } = ctx;
  logger.info('Checking for new images via docker compose pull...');

  if ((await runner.run(composeCommand(composeFile, 'pull'))).status === 'success') {
    logger.info('Successfully pulled the latest images.');
    return 'pulled';
  }

  logger.warn('Pulling images failed. Attempting to build images locally.');
  const build = await runner.run(composeCommand(composeFile, 'build'));
  if (build.status === 'success') {
    logger.info('Successfully built all images locally.');
    return 'built';
  }

  throw new ConsoleError(ConsoleErrorCode.COMMAND_FAILURE, 'Failed to pull or build images.', {
    build: describeOutcome(build),
  });
}

/**
 * Always tears the stack down and brings it up again, whatever refreshImages found.
 * There is no diffing against the running set.
 */
export async function startServices(ctx: ConsoleContext): Promise<void> {
  const { logger, runner } = ctx;
  logger.info('Starting the update and launch process for Docker services...');

  const composeFile = requireComposeFile(ctx);
  const source = await refreshImages(ctx, composeFile);
  logger.info(source === 'pulled' ? 'Restarting services with pulled images.' : 'Restarting services with local builds.');

  logger.info('Stopping any running containers and starting services...');
  const down = await runner.run(composeCommand(composeFile, 'down', '--remove-orphans'));
  if (down.status === 'failure') {
    logger.warn(`Stopping running containers ${describeOutcome(down)}.`);
  }

  const up = await runner.run(composeCommand(composeFile, 'up', '-d', '--build'));
  if (up.status === 'failure') {
    logger.error(`Starting services ${describeOutcome(up)}.`);
    return;
  }
  logger.info('All services are up and running.');
}

export async function stopServices(ctx: ConsoleContext): Promise<void> {
  const { logger, runner } = ctx;
  logger.info('Stopping and removing Docker Compose services...');

  const composeFile = requireComposeFile(ctx);
  const down = await runner.run(composeCommand(composeFile, 'down', '--remove-orphans'));
  if (down.status === 'failure') {
    logger.error(`Stopping services ${describeOutcome(down)}.`);
    return;
  }
  logger.info('Docker Compose services stopped and removed.');
}
