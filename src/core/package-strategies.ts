import type { DistroFamily } from '../types/session.js';
import type { CommandLine } from '../utils/exec.js';

export interface CommandStep {
  kind: 'command';
  command: CommandLine;
}

/** Installed from a private temp copy, never through sudo's stdin. */
export interface InstallFileStep {
  kind: 'install-file';
  target: string;
  contents: string;
  /** octal mode for install -m */
  mode: string;
}

export type PrivilegedStep = CommandStep | InstallFileStep;

export interface UpdateCheck {
  command: CommandLine;
  /** exit code the package manager uses for "updates available" */
  updatesAvailableCode: number;
}

export interface PackageStrategy {
  update: readonly PrivilegedStep[];
  checkUpdates: UpdateCheck | null;
  installEngine: readonly PrivilegedStep[];
}

export const DOCKER_CE_REPO_FILE = '/etc/yum.repos.d/docker-ce.repo';

function dockerCeRepo(platform: 'fedora' | 'centos'): string {
  return [
    '[docker-ce-stable]',
    'name=Docker CE Stable - $basearch',
    `baseurl=https://download.docker.com/linux/${platform}/$releasever/$basearch/stable`,
    'enabled=1',
    'gpgcheck=1',
    `gpgkey=https://download.docker.com/linux/${platform}/gpg`,
    '',
  ].join('\n');
}

const DOCKER_CE_PACKAGES = [
  'docker-ce',
  'docker-ce-cli',
  'containerd.io',
  'docker-buildx-plugin',
  'docker-compose-plugin',
];

function dnfStrategy(platform: 'fedora' | 'centos'): PackageStrategy {
  return {
    update: [{ kind: 'command', command: ['dnf', '-y', 'upgrade'] }],
    checkUpdates: { command: ['dnf', 'check-update', '--refresh'], updatesAvailableCode: 100 },
    installEngine: [
      { kind: 'command', command: ['dnf', '-y', 'install', 'dnf-plugins-core'] },
      { kind: 'install-file', target: DOCKER_CE_REPO_FILE, contents: dockerCeRepo(platform), mode: '644' },
      { kind: 'command', command: ['dnf', '-y', 'install', ...DOCKER_CE_PACKAGES] },
      { kind: 'command', command: ['systemctl', 'enable', 'docker'] },
      { kind: 'command', command: ['systemctl', 'start', 'docker'] },
    ],
  };
}

function aptStrategy(composePackage: string): PackageStrategy {
  return {
    update: [
      { kind: 'command', command: ['apt-get', 'update'] },
      { kind: 'command', command: ['apt-get', 'upgrade', '-y'] },
    ],
    // apt has no exit code that separates "updates pending" from "up to date"
    checkUpdates: null,
    installEngine: [
      { kind: 'command', command: ['apt-get', 'update'] },
      { kind: 'command', command: ['apt-get', 'install', '-y', 'docker.io', composePackage] },
      { kind: 'command', command: ['systemctl', 'enable', '--now', 'docker'] },
    ],
  };
}

export const PACKAGE_STRATEGIES: Record<Exclude<DistroFamily, 'unknown'>, PackageStrategy> = {
  fedora: dnfStrategy('fedora'),
  rhel: dnfStrategy('centos'),
  centos: dnfStrategy('centos'),
  ubuntu: aptStrategy('docker-compose-v2'),
  debian: aptStrategy('docker-compose'),
  arch: {
    update: [{ kind: 'command', command: ['pacman', '-Syu', '--noconfirm'] }],
    checkUpdates: null,
    installEngine: [
      { kind: 'command', command: ['pacman', '-S', '--noconfirm', '--needed', 'docker', 'docker-compose'] },
      { kind: 'command', command: ['systemctl', 'enable', '--now', 'docker'] },
    ],
  },
};

export function strategyFor(family: DistroFamily): PackageStrategy | null {
  return family === 'unknown' ? null : PACKAGE_STRATEGIES[family];
}
