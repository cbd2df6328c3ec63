/**
 * Command payloads: one-shot changes that need no transaction
 */

import { generateSecret, type RemoteAction } from '@hardline/core';
import type { HardenStep } from '../config.js';

/** Packages each step relies on */
export const STEP_PACKAGES: Partial<Record<HardenStep, readonly string[]>> = {
  firewall: ['ufw'],
  'auto-upgrades': ['unattended-upgrades', 'apt-listchanges'],
  fail2ban: ['fail2ban'],
  rsyslog: ['rsyslog'],
  auditd: ['auditd'],
};

export function packagesFor(steps: Iterable<HardenStep>): string[] {
  const packages = new Set<string>();
  for (const step of steps) {
    for (const name of STEP_PACKAGES[step] ?? []) {
      packages.add(name);
    }
  }
  return [...packages];
}

export function packageActions(packages: readonly string[]): RemoteAction[] {
  if (packages.length === 0) {
    return [];
  }
  return [
    { op: 'run', argv: ['apt-get', 'update'] },
    {
      op: 'run',
      argv: ['env', 'DEBIAN_FRONTEND=noninteractive', 'apt-get', 'install', '-y', ...packages],
    },
  ];
}

export function firewallActions(sshPort: number): RemoteAction[] {
  return [
    { op: 'run', argv: ['ufw', 'default', 'deny', 'incoming'] },
    { op: 'run', argv: ['ufw', 'default', 'allow', 'outgoing'] },
    { op: 'run', argv: ['ufw', 'allow', `${sshPort}/tcp`] },
    { op: 'run', argv: ['ufw', 'allow', '80/tcp'] },
    { op: 'run', argv: ['ufw', 'allow', '443/tcp'] },
    { op: 'run', argv: ['ufw', '--force', 'enable'] },
  ];
}

/**
 * Replace the root password with a random one nobody learns.
 */
export function rootPasswordActions(secret: string = generateSecret()): RemoteAction[] {
  return [{ op: 'run', argv: ['chpasswd'], stdin: `root:${secret}\n` }];
}
