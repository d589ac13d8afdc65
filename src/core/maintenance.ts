import type { Operation } from '../types/session.js';
import type { CommandLine } from '../utils/exec.js';
import type { ConsoleContext } from './context.js';
import { describeOutcome } from './command-runner.js';

export type PruneOperation = Extract<Operation, 'prune-cache' | 'prune-volumes' | 'prune-images' | 'prune-containers'>;

interface PruneTask {
  announce: string;
  command: CommandLine;
}

export const PRUNE_TASKS: Record<PruneOperation, PruneTask> = {
  'prune-cache': {
    announce: 'Clearing Docker caches and resources...',
    command: ['docker', 'system', 'prune', '-af', '--volumes'],
  },
  'prune-volumes': {
    announce: 'Pruning unused Docker volumes...',
    command: ['docker', 'volume', 'prune', '-f'],
  },
  'prune-images': {
    announce: 'Pruning unused Docker images...',
    command: ['docker', 'image', 'prune', '-af'],
  },
  'prune-containers': {
    announce: 'Pruning unused Docker containers...',
    command: ['docker', 'container', 'prune', '-f'],
  },
};

export async function prune(ctx: ConsoleContext, operation: PruneOperation): Promise<boolean> {
  const task = PRUNE_TASKS[operation];
  ctx.logger.info(task.announce);

  const outcome = await ctx.runner.runPrivileged(task.command);
  if (outcome.status === 'failure') {
    ctx.logger.error(`${operation} ${describeOutcome(outcome)}.`);
    return false;
  }
  ctx.logger.info(`${operation} completed.`);
  return true;
}

/** chmod 755 and chown to the login user, recursively, over the project directory. */
export async function fixPermissions(ctx: ConsoleContext): Promise<boolean> {
  const { logger, runner, projectRoot, user } = ctx;

  logger.info(`Applying chmod 755 to ${projectRoot} recursively...`);
  const chmod = await runner.runPrivileged(['chmod', '-Rfv', '755', '.'], { cwd: projectRoot });
  if (chmod.status === 'failure') {
    logger.error(`chmod ${describeOutcome(chmod)}.`);
    return false;
  }

  logger.info(`Applying chown ${user}:${user} to ${projectRoot} recursively...`);
  const chown = await runner.runPrivileged(['chown', '-Rfv', `${user}:${user}`, '.'], { cwd: projectRoot });
  if (chown.status === 'failure') {
    logger.error(`chown ${describeOutcome(chown)}.`);
    return false;
  }

  logger.info('Directory permissions fixed.');
  return true;
}
