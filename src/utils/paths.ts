import { resolve, join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CONFIG_FILENAME } from '../types/config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_LOG_FILE = '/tmp/opsdeck/opsdeck.log';
export const OS_RELEASE_PATH = '/etc/os-release';

export function getPackageRoot(): string {
  // src/utils and dist/utils both sit two levels below the package root
  return resolve(__dirname, '..', '..');
}

export function getProjectRoot(cwd?: string): string {
  return cwd || process.cwd();
}

export function getConfigPath(projectRoot: string): string {
  return join(projectRoot, CONFIG_FILENAME);
}
