/**
 * Report Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import type { TransactionResult } from '@hardline/core';
import { formatSummary, restoreCommand, type HardenReport } from '../src/workflow/report.js';

function baseReport(overrides: Partial<HardenReport> = {}): HardenReport {
  return {
    endpoint: { host: '192.0.2.10', port: 2222 },
    identity: 'operator',
    steps: [
      { step: 'probe', status: 'completed' },
      { step: 'bootstrap', status: 'completed' },
      { step: 'sysctl', status: 'skipped' },
    ],
    transactions: [],
    warnings: [],
    startedAt: '2026-01-01T00:00:00.000Z',
    exitCode: 0,
    ...overrides,
  };
}

const revertedSshd: TransactionResult = {
  id: 'txn-1',
  resource: 'sshd',
  state: 'reverted',
  reverted: true,
  revertedBy: 'deadline',
  snapshot: {
    livePath: '/etc/ssh/sshd_config',
    backupPath: '/etc/ssh/sshd_config.bak',
    existed: true,
    takenAt: '2026-01-01T00:00:01.000Z',
  },
  guard: { id: 'grd-1', deadlineAt: '2026-01-01T00:02:01.000Z', logPath: '/var/lib/hardline/guards/sshd/guard.log' },
  timestamps: {},
  error: { code: 'CONFIRMATION_FAILED', message: 'Confirming sshd failed: key login as operator auth-failed: denied' },
};

describe('restoreCommand', () => {
  it('should copy the backup back when the file existed', () => {
    expect(restoreCommand(revertedSshd)).toBe('sudo cp -p /etc/ssh/sshd_config.bak /etc/ssh/sshd_config');
  });

  it('should remove a file that did not exist before', () => {
    const created: TransactionResult = {
      ...revertedSshd,
      snapshot: { livePath: '/etc/sysctl.d/99-security.conf', backupPath: '/etc/sysctl.d/99-security.conf.bak', existed: false, takenAt: '' },
    };
    expect(restoreCommand(created)).toBe('sudo rm -f /etc/sysctl.d/99-security.conf');
  });

  it('should have nothing to restore without a snapshot', () => {
    expect(restoreCommand({ ...revertedSshd, snapshot: undefined })).toBeUndefined();
  });
});

describe('formatSummary', () => {
  it('should tell the operator how to log in after a successful run', () => {
    expect(formatSummary(baseReport()).split('\n')).toEqual([
      'Hardening of 192.0.2.10:2222 completed',
      '',
      '  ✓ probe',
      '  ✓ bootstrap',
      '  - sysctl (skipped)',
      '',
      'Log in with: ssh -p 2222 operator@192.0.2.10',
      'Password authentication is disabled; use your private key.',
    ]);
  });

  it('should list warnings under the steps', () => {
    const lines = formatSummary(baseReport({ warnings: ['key login as operator failed'] })).split('\n');
    expect(lines[5]).toBe('  ⚠ key login as operator failed');
  });

  it('should describe a reverted transaction and the failing error', () => {
    const report = baseReport({
      steps: [
        { step: 'probe', status: 'completed' },
        { step: 'sshd', status: 'failed', detail: 'Confirming sshd failed' },
      ],
      transactions: [revertedSshd],
      exitCode: 1,
      error: { code: 'CONFIRMATION_FAILED', message: 'Confirming sshd failed', hint: 'The previous configuration was restored' },
    });

    expect(formatSummary(report).split('\n')).toEqual([
      'Hardening of 192.0.2.10:2222 failed',
      '',
      '  ✓ probe',
      '  ✗ sshd: Confirming sshd failed',
      '',
      'sshd: reverted (reverted by deadline)',
      '  Confirming sshd failed: key login as operator auth-failed: denied',
      '  Backup in effect: /etc/ssh/sshd_config.bak',
      '',
      'Error [CONFIRMATION_FAILED]: Confirming sshd failed',
      'Hint: The previous configuration was restored',
    ]);
  });

  it('should point at the guard log and the manual restore when a change is still live', () => {
    const stuck: TransactionResult = {
      ...revertedSshd,
      state: 'applied',
      reverted: false,
      revertedBy: undefined,
      error: { code: 'REVERT_FAILED', message: 'Reverting sshd failed', hint: 'Restore from the console' },
    };
    const report = baseReport({ transactions: [stuck], exitCode: 1, error: stuck.error });

    expect(formatSummary(report).split('\n').slice(5, 12)).toEqual([
      '',
      'sshd: applied',
      '  Reverting sshd failed',
      '  Restore from the console',
      '  Guard log: /var/lib/hardline/guards/sshd/guard.log',
      '  Backup in effect: /etc/ssh/sshd_config.bak',
      '  Manual restore: sudo cp -p /etc/ssh/sshd_config.bak /etc/ssh/sshd_config',
    ]);
  });
});
