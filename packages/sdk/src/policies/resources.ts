/**
 * Managed resources of the hardening policy
 */

import type { RemoteAction } from '@hardline/core';
import type { ManagedResource } from '../transaction/resource.js';
import { loadPayload } from './payloads.js';
import { appendManagedBlock, prependManagedBlock } from './managed-block.js';

export function sshdResource(): ManagedResource {
  const policy = loadPayload('sshd-hardening.conf');
  return {
    name: 'sshd',
    livePath: '/etc/ssh/sshd_config',
    mode: '644',
    render: (current) => prependManagedBlock(current, policy),
    validate: (stagedPath) => ({ op: 'run', argv: ['sshd', '-t', '-f', stagedPath] }),
    activate: [{ op: 'restartService', service: 'ssh' }],
  };
}

export function fail2banResource(): ManagedResource {
  const jail = loadPayload('jail.local');
  return {
    name: 'fail2ban',
    livePath: '/etc/fail2ban/jail.local',
    render: () => jail,
    activate: [
      { op: 'run', argv: ['systemctl', 'enable', 'fail2ban'] },
      { op: 'restartService', service: 'fail2ban' },
    ],
  };
}

export function sysctlResource(): ManagedResource {
  const livePath = '/etc/sysctl.d/99-security.conf';
  const parameters = loadPayload('99-security.conf');
  return {
    name: 'sysctl',
    livePath,
    render: () => parameters,
    activate: [{ op: 'run', argv: ['sysctl', '-p', livePath] }],
  };
}

export function rsyslogResource(): ManagedResource {
  const rules = loadPayload('10-hardening.conf');
  return {
    name: 'rsyslog',
    livePath: '/etc/rsyslog.d/10-hardening.conf',
    render: () => rules,
    validate: (stagedPath) => ({ op: 'run', argv: ['rsyslogd', '-N1', '-f', stagedPath] }),
    activate: [{ op: 'restartService', service: 'rsyslog' }],
  };
}

export function auditdResource(): ManagedResource {
  const rules = loadPayload('audit.rules');
  return {
    name: 'auditd',
    livePath: '/etc/audit/rules.d/hardening.rules',
    mode: '640',
    render: () => rules,
    // auditd refuses restarts through systemctl
    activate: [{ op: 'run', argv: ['service', 'auditd', 'restart'] }],
  };
}

export function autoUpgradesResources(): ManagedResource[] {
  const periodic = loadPayload('20auto-upgrades');
  const origins = loadPayload('50unattended-upgrades');
  const activate: RemoteAction[] = [{ op: 'restartService', service: 'unattended-upgrades' }];

  return [
    {
      name: 'auto-upgrades',
      livePath: '/etc/apt/apt.conf.d/20auto-upgrades',
      render: () => periodic,
      activate,
    },
    {
      name: 'unattended-upgrades',
      livePath: '/etc/apt/apt.conf.d/50unattended-upgrades',
      render: (current) => appendManagedBlock(current, origins, '//'),
      activate,
    },
  ];
}
