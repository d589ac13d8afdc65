import { existsSync, readFileSync } from 'node:fs';
import type { ConsoleConfig } from '../types/config.js';
import { ConsoleConfigSchema, DEFAULT_CONFIG } from '../types/config.js';
import { ConsoleError, ConsoleErrorCode } from '../utils/errors.js';

/**
 * Reads and validates the console configuration.
 * A missing file yields the defaults; a file that is present but broken is fatal.
 */
export function loadConfig(configPath: string): ConsoleConfig {
  if (!existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConsoleError(ConsoleErrorCode.CONFIG_ERROR, `Cannot parse config file ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = ConsoleConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConsoleError(ConsoleErrorCode.CONFIG_ERROR, `Invalid config file ${configPath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function configExists(configPath: string): boolean {
  return existsSync(configPath);
}
