import type { ConsoleLogger } from '../utils/logger.js';
import { EXIT_CODES } from '../core/dispatcher.js';

export type HandledSignal = 'SIGINT' | 'SIGTERM';

const SIGNAL_EXITS: Record<HandledSignal, { code: number; message: string }> = {
  SIGINT: { code: EXIT_CODES.interrupted, message: 'Interrupted.' },
  SIGTERM: { code: EXIT_CODES.terminated, message: 'Terminated.' },
};

export function handleSignal(signal: HandledSignal, logger: ConsoleLogger, exit: (code: number) => void): void {
  const { code, message } = SIGNAL_EXITS[signal];
  logger.info(message);
  exit(code);
}

/** In-flight child processes are not drained; the console exits right away. */
export function installSignalHandlers(
  logger: ConsoleLogger,
  exit: (code: number) => void = code => process.exit(code),
): () => void {
  const onInt = () => handleSignal('SIGINT', logger, exit);
  const onTerm = () => handleSignal('SIGTERM', logger, exit);
  process.on('SIGINT', onInt);
  process.on('SIGTERM', onTerm);
  return () => {
    process.off('SIGINT', onInt);
    process.off('SIGTERM', onTerm);
  };
}
