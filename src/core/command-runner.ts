import type { ExitOutcome } from '../types/session.js';
import type { CommandExecutor, CommandLine } from '../utils/exec.js';
import { toSpec } from '../utils/exec.js';
import type { Credential } from './credential.js';
import { SUDO_PREFIX } from './credential-gate.js';

export interface RunOptions {
  cwd?: string;
  quiet?: boolean;
  /** Exit codes that count as success. Default [0]. */
  successCodes?: readonly number[];
  /** Exit codes that mean "nothing to do". Default none. */
  noChangeCodes?: readonly number[];
}

export function interpretExit(exitCode: number, options: RunOptions = {}): ExitOutcome {
  const successCodes = options.successCodes ?? [0];
  if (options.noChangeCodes?.includes(exitCode)) return { status: 'no-change' };
  if (successCodes.includes(exitCode)) return { status: 'success' };
  return { status: 'failure', code: exitCode };
}

/**
 * Runs engine and package-manager commands for the session.
 * Privileged runs hand the credential to sudo over stdin on every call.
 * That line is the only stdin a privileged command ever gets.
 */
export class CommandRunner {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly credential: Credential,
    private readonly defaultCwd?: string,
  ) {}

  async run(command: CommandLine, options: RunOptions = {}): Promise<ExitOutcome> {
    const result = await this.executor(
      toSpec(command, {
        cwd: options.cwd ?? this.defaultCwd,
        quiet: options.quiet,
      }),
    );
    return interpretExit(result.exitCode, options);
  }

  async runPrivileged(command: CommandLine, options: RunOptions = {}): Promise<ExitOutcome> {
    const result = await this.executor(
      toSpec([...SUDO_PREFIX, ...command], {
        cwd: options.cwd ?? this.defaultCwd,
        input: this.credential.stdinLine(),
        quiet: options.quiet,
      }),
    );
    return interpretExit(result.exitCode, options);
  }
}

export function describeOutcome(outcome: ExitOutcome): string {
  switch (outcome.status) {
    case 'success':
      return 'succeeded';
    case 'no-change':
      return 'no change needed';
    case 'failure':
      return `failed with exit code ${outcome.code}`;
  }
}
