import { readFileSync } from 'node:fs';
import type { DistroFamily, DistroInfo } from '../types/session.js';
import type { ConsoleLogger } from '../utils/logger.js';

export const FALLBACK_DISTRO_ID = 'fedora';

const KNOWN_FAMILIES: readonly Exclude<DistroFamily, 'unknown'>[] = [
  'fedora',
  'ubuntu',
  'debian',
  'arch',
  'rhel',
  'centos',
];

function isKnownFamily(value: string): value is Exclude<DistroFamily, 'unknown'> {
  return KNOWN_FAMILIES.some(f => f === value);
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

/** os-release style KEY=VALUE text. Comments and malformed lines are skipped. */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    fields[line.slice(0, eq).trim()] = unquote(line.slice(eq + 1));
  }
  return fields;
}

/** ID first, then ID_LIKE in order (e.g. rocky → rhel, linuxmint → ubuntu). */
export function resolveFamily(id: string, idLike?: string): DistroFamily {
  if (isKnownFamily(id)) return id;
  for (const candidate of (idLike ?? '').toLowerCase().split(/\s+/)) {
    if (isKnownFamily(candidate)) return candidate;
  }
  return 'unknown';
}

export function detectDistro(osReleasePath: string, logger: ConsoleLogger): DistroInfo {
  logger.info('Detecting Linux distribution...');

  let id: string | undefined;
  let idLike: string | undefined;
  try {
    const fields = parseOsRelease(readFileSync(osReleasePath, 'utf-8'));
    id = fields.ID?.toLowerCase() || undefined;
    idLike = fields.ID_LIKE;
  } catch {
    id = undefined;
  }

  if (!id) {
    logger.warn(`Could not detect Linux distribution. Defaulting to ${FALLBACK_DISTRO_ID}.`);
    id = FALLBACK_DISTRO_ID;
  }

  const distro: DistroInfo = { id, family: resolveFamily(id, idLike) };
  logger.info(`Detected distribution: ${distro.id}`);
  return distro;
}
