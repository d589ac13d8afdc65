import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import type { ExitOutcome } from '../types/session.js';
import type { ConsoleContext } from './context.js';
import { confirmAction } from './context.js';
import type { InstallFileStep, PrivilegedStep } from './package-strategies.js';
import { strategyFor } from './package-strategies.js';
import { describeOutcome } from './command-runner.js';
import { formatCommand } from '../utils/exec.js';

/**
 * Writes the body to a 0600 file in a fresh 0700 temp dir, then copies it into place
 * with a privileged `install -m`. The staging dir is removed whatever the outcome.
 */
export async function installFile(ctx: ConsoleContext, step: InstallFileStep): Promise<ExitOutcome> {
  const stagingDir = mkdtempSync(join(tmpdir(), 'opsdeck-stage-'));
  try {
    const staged = join(stagingDir, basename(step.target));
    writeFileSync(staged, step.contents, { mode: 0o600 });
    return await ctx.runner.runPrivileged(['install', '-m', step.mode, staged, step.target], { quiet: true });
  } finally {
    rmSync(stagingDir, { recursive: true, force: true });
  }
}

function describeStep(step: PrivilegedStep): string {
  return step.kind === 'command' ? `Command '${formatCommand(step.command)}'` : `Installing ${step.target}`;
}

/** Runs steps in order through sudo, stopping at the first failure. */
export async function runPrivilegedSteps(ctx: ConsoleContext, steps: readonly PrivilegedStep[]): Promise<boolean> {
  for (const step of steps) {
    const outcome =
      step.kind === 'command' ? await ctx.runner.runPrivileged(step.command) : await installFile(ctx, step);
    if (outcome.status === 'failure') {
      ctx.logger.error(`${describeStep(step)} ${describeOutcome(outcome)}.`);
      return false;
    }
  }
  return true;
}

export async function installEngine(ctx: ConsoleContext): Promise<boolean> {
  const { logger, session } = ctx;
  logger.info('Installing Docker Engine...');

  const strategy = strategyFor(session.distro.family);
  if (!strategy) {
    logger.warn(`Docker installation not implemented for ${session.distro.id}.`);
    return false;
  }

  if (!(await runPrivilegedSteps(ctx, strategy.installEngine))) {
    logger.error(`Docker installation failed on ${session.distro.id}.`);
    return false;
  }
  logger.info(`Docker installed successfully on ${session.distro.id}.`);
  return true;
}

export async function updateSystemPackages(ctx: ConsoleContext): Promise<boolean> {
  const { logger, session } = ctx;
  logger.info(`Updating system packages for ${session.distro.id}...`);

  const strategy = strategyFor(session.distro.family);
  if (!strategy) {
    logger.warn(`System update not implemented for ${session.distro.id}.`);
    return false;
  }

  if (!(await runPrivilegedSteps(ctx, strategy.update))) {
    logger.error('System package update failed.');
    return false;
  }
  logger.info('System packages updated.');
  return true;
}

export async function checkForUpdates(ctx: ConsoleContext): Promise<void> {
  const { logger, session } = ctx;
  logger.info('Checking for system updates...');

  const check = strategyFor(session.distro.family)?.checkUpdates;
  if (!check) {
    logger.warn(`Update checking not implemented for ${session.distro.id}.`);
    return;
  }

  const outcome = await ctx.runner.runPrivileged(check.command, {
    quiet: true,
    successCodes: [check.updatesAvailableCode],
    noChangeCodes: [0],
  });

  switch (outcome.status) {
    case 'no-change':
      logger.info('No updates available.');
      return;
    case 'failure':
      logger.warn(`Update check ${describeOutcome(outcome)}.`);
      return;
    case 'success':
      logger.info('Updates available.');
      if (await confirmAction(ctx, 'Apply system updates now?')) {
        await updateSystemPackages(ctx);
      } else {
        logger.info('Skipping system updates.');
      }
  }
}
