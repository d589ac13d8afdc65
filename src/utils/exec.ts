import { spawn } from 'node:child_process';
import { accessSync, constants } from 'node:fs';
import { delimiter, join } from 'node:path';

export type CommandLine = readonly string[];

export interface CommandSpec {
  command: string;
  args: readonly string[];
  cwd?: string;
  /** Written to the child's stdin, which is then closed. Without it stdin is inherited. */
  input?: string;
  /** Discard stdout/stderr instead of streaming them to the terminal. */
  quiet?: boolean;
}

export interface ExecResult {
  exitCode: number;
}

export type CommandExecutor = (spec: CommandSpec) => Promise<ExecResult>;

// shell convention for "command not found"
export const NOT_FOUND_EXIT_CODE = 127;

export const spawnCommand: CommandExecutor = (spec) =>
  new Promise<ExecResult>((resolve) => {
    const output = spec.quiet ? 'ignore' : 'inherit';
    const child = spawn(spec.command, [...spec.args], {
      cwd: spec.cwd,
      stdio: [spec.input === undefined ? 'inherit' : 'pipe', output, output],
    });

    let settled = false;
    child.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: err.code === 'ENOENT' ? NOT_FOUND_EXIT_CODE : 1 });
    });

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: code ?? 1 });
    });

    if (spec.input !== undefined && child.stdin) {
      // sudo may exit before reading everything; a broken pipe is not the caller's failure
      child.stdin.on('error', () => undefined);
      child.stdin.end(spec.input);
    }
  });

export function toSpec(commandLine: CommandLine, extra: Omit<CommandSpec, 'command' | 'args'> = {}): CommandSpec {
  const [command, ...args] = commandLine;
  if (command === undefined) {
    throw new Error('Empty command line');
  }
  return { command, args, ...extra };
}

export function formatCommand(commandLine: CommandLine): string {
  return commandLine.map(part => (/[\s'"]/.test(part) || part === '' ? JSON.stringify(part) : part)).join(' ');
}

export function commandExists(tool: string, pathEnv: string = process.env.PATH ?? ''): boolean {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    try {
      accessSync(join(dir, tool), constants.X_OK);
      return true;
    } catch {
      continue;
    }
  }
  return false;
}
