import type { Credential } from '../core/credential.js';

export type DistroFamily = 'fedora' | 'ubuntu' | 'debian' | 'arch' | 'rhel' | 'centos' | 'unknown';

export interface DistroInfo {
  /** lowercased ID from os-release, or the fallback */
  id: string;
  family: DistroFamily;
}

export interface Session {
  readonly interactive: boolean;
  readonly credential: Credential;
  readonly distro: DistroInfo;
}

export type Operation =
  | 'start-services'
  | 'stop-services'
  | 'build-and-push'
  | 'update-packages'
  | 'fix-permissions'
  | 'install-engine'
  | 'prune-cache'
  | 'prune-volumes'
  | 'prune-images'
  | 'prune-containers'
  | 'quit';

export type ExitOutcome =
  | { status: 'success' }
  | { status: 'no-change' }
  | { status: 'failure'; code: number };

export type DispatcherState = 'awaiting-credential' | 'ready' | 'executing' | 'terminated';
