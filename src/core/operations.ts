import type { Operation } from '../types/session.js';
import type { ConsoleContext } from './context.js';
import { startServices, stopServices } from './compose.js';
import { buildAndPushImages } from './images.js';
import { installEngine, updateSystemPackages } from './system-updates.js';
import { fixPermissions, prune } from './maintenance.js';

export interface MenuEntry {
  key: string;
  operation: Operation;
  label: string;
  /** group index; a divider is printed between groups */
  group: number;
}

export const MENU: readonly MenuEntry[] = [
  { key: '0', operation: 'start-services', label: 'Start Docker Compose Services', group: 0 },
  { key: '1', operation: 'stop-services', label: 'Stop Docker Compose Services', group: 0 },
  { key: '2', operation: 'build-and-push', label: 'Build & Push Docker Images', group: 1 },
  { key: '3', operation: 'update-packages', label: 'Update System Packages', group: 2 },
  { key: '4', operation: 'fix-permissions', label: 'Fix Directory Permissions', group: 3 },
  { key: '5', operation: 'install-engine', label: 'Install Docker Engine', group: 4 },
  { key: '6', operation: 'prune-cache', label: 'Clear Docker Caches', group: 4 },
  { key: '7', operation: 'prune-volumes', label: 'Prune Docker Volumes', group: 4 },
  { key: '8', operation: 'prune-images', label: 'Prune Docker Images', group: 4 },
  { key: '9', operation: 'prune-containers', label: 'Prune Docker Containers', group: 4 },
  { key: 'q', operation: 'quit', label: 'Quit', group: 5 },
];

export const SELECTION_PROMPT = 'Select an option [0-9/q]:';

export function parseSelection(input: string): Operation | null {
  const key = input.trim().toLowerCase();
  return MENU.find(entry => entry.key === key)?.operation ?? null;
}

export function renderMenu(): string[] {
  const lines: string[] = [];
  let group = MENU[0]?.group;
  for (const entry of MENU) {
    if (entry.group !== group) {
      lines.push('-------------------------');
      group = entry.group;
    }
    lines.push(`[${entry.key}] ${entry.label}`);
  }
  return lines;
}

export type OperationHandler = (ctx: ConsoleContext) => Promise<unknown>;

export const OPERATION_HANDLERS: Record<Exclude<Operation, 'quit'>, OperationHandler> = {
  'start-services': startServices,
  'stop-services': stopServices,
  'build-and-push': buildAndPushImages,
  'update-packages': updateSystemPackages,
  'fix-permissions': fixPermissions,
  'install-engine': installEngine,
  'prune-cache': ctx => prune(ctx, 'prune-cache'),
  'prune-volumes': ctx => prune(ctx, 'prune-volumes'),
  'prune-images': ctx => prune(ctx, 'prune-images'),
  'prune-containers': ctx => prune(ctx, 'prune-containers'),
};
