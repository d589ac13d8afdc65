import type { ConsoleConfig } from '../types/config.js';
import type { DispatcherState, Operation } from '../types/session.js';
import type { ConsoleLogger } from '../utils/logger.js';
import type { CommandExecutor } from '../utils/exec.js';
import type { ConsolePrompts } from '../prompts/console-prompts.js';
import type { ConsoleContext } from './context.js';
import { commandExists } from '../utils/exec.js';
import { formatConsoleError, isConsoleError } from '../utils/errors.js';
import { acquireCredential } from './credential-gate.js';
import { detectDistro } from './distro.js';
import { CommandRunner } from './command-runner.js';
import { ensureDependency } from './dependencies.js';
import { checkForUpdates, installEngine } from './system-updates.js';
import { OPERATION_HANDLERS, SELECTION_PROMPT, parseSelection, renderMenu } from './operations.js';

export const EXIT_CODES = {
  quit: 0,
  fatal: 1,
  interrupted: 130,
  terminated: 143,
} as const;

export interface DispatcherDeps {
  interactive: boolean;
  config: ConsoleConfig;
  logger: ConsoleLogger;
  prompts: ConsolePrompts;
  executor: CommandExecutor;
  env: Record<string, string | undefined>;
  osReleasePath: string;
  projectRoot: string;
  user: string;
  lookupTool?: (tool: string) => boolean;
}

/**
 * Startup sequence followed by the menu loop.
 *
 * awaiting-credential → ready → executing → ready … → terminated.
 * Non-interactive runs stop after startup and never read stdin.
 */
export class OperationDispatcher {
  private current: DispatcherState = 'awaiting-credential';

  constructor(private readonly deps: DispatcherDeps) {}

  get state(): DispatcherState {
    return this.current;
  }

  async start(): Promise<ConsoleContext> {
    const { deps } = this;
    const credential = await acquireCredential(deps);
    const distro = detectDistro(deps.osReleasePath, deps.logger);

    const ctx: ConsoleContext = {
      session: { interactive: deps.interactive, credential, distro },
      config: deps.config,
      logger: deps.logger,
      runner: new CommandRunner(deps.executor, credential, deps.projectRoot),
      prompts: deps.prompts,
      projectRoot: deps.projectRoot,
      user: deps.user,
      lookupTool: deps.lookupTool ?? (tool => commandExists(tool)),
    };

    await ensureDependency(ctx, 'docker', () => installEngine(ctx));
    await checkForUpdates(ctx);

    this.current = 'ready';
    return ctx;
  }

  async execute(ctx: ConsoleContext, operation: Exclude<Operation, 'quit'>): Promise<void> {
    this.current = 'executing';
    await OPERATION_HANDLERS[operation](ctx);
    this.current = 'ready';
  }

  /** Resolves to the process exit code. Fatal console errors are logged once here. */
  async run(): Promise<number> {
    const { logger, prompts } = this.deps;
    try {
      const ctx = await this.start();

      if (!ctx.session.interactive) {
        logger.info('Non-interactive mode: skipping menu. Exiting.');
        return this.terminate(EXIT_CODES.quit);
      }

      for (;;) {
        logger.header('Main Menu');
        for (const line of renderMenu()) logger.line(line);

        const choice = await prompts.selection(SELECTION_PROMPT);
        const operation = parseSelection(choice);
        if (!operation) {
          logger.error("Invalid choice. Please select 0-9 or 'q' to quit.");
          continue;
        }
        if (operation === 'quit') {
          logger.info('Exiting.');
          return this.terminate(EXIT_CODES.quit);
        }
        await this.execute(ctx, operation);
      }
    } catch (err) {
      if (isConsoleError(err)) {
        logger.error(formatConsoleError(err));
        return this.terminate(EXIT_CODES.fatal);
      }
      this.current = 'terminated';
      throw err;
    }
  }

  private terminate(code: number): number {
    this.current = 'terminated';
    return code;
  }
}
