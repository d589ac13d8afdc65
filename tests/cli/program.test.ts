import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { buildProgram } from '../../src/cli/program.js';
import type { ConsoleOptions } from '../../src/cli/console.js';

function quietProgram(received: ConsoleOptions[]) {
  const program = buildProgram(async options => {
    received.push(options);
  });
  program.exitOverride();
  program.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  return program;
}

describe('buildProgram', () => {
  it('runs interactively by default', async () => {
    const received: ConsoleOptions[] = [];
    await quietProgram(received).parseAsync(['node', 'opsdeck']);

    expect(received).toHaveLength(1);
    expect(received[0]?.yes).toBeUndefined();
  });

  it('accepts -y and --config', async () => {
    const received: ConsoleOptions[] = [];
    await quietProgram(received).parseAsync(['node', 'opsdeck', '-y', '--config', 'ops.json']);

    expect(received[0]).toEqual({ yes: true, config: 'ops.json' });
  });

  it('exits 1 on an unknown flag without running the console', async () => {
    const received: ConsoleOptions[] = [];
    const attempt = quietProgram(received).parseAsync(['node', 'opsdeck', '--bogus']);

    await expect(attempt).rejects.toBeInstanceOf(CommanderError);
    await expect(attempt).rejects.toMatchObject({ exitCode: 1, code: 'commander.unknownOption' });
    expect(received).toEqual([]);
  });

  it('rejects stray arguments', async () => {
    const received: ConsoleOptions[] = [];
    const attempt = quietProgram(received).parseAsync(['node', 'opsdeck', 'extra']);

    await expect(attempt).rejects.toMatchObject({ exitCode: 1, code: 'commander.excessArguments' });
    expect(received).toEqual([]);
  });
});
