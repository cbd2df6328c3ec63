/**
 * Hardening report
 */

import type { ErrorCode, TransactionResult } from '@hardline/core';
import type { HardenStep } from '../config.js';

export type StepStatus = 'completed' | 'skipped' | 'failed';

export interface StepRecord {
  step: HardenStep;
  status: StepStatus;
  detail?: string;
  startedAt?: string;
  finishedAt?: string;
}

export interface HardenReport {
  endpoint: { host: string; port: number };
  identity: string;
  steps: StepRecord[];
  transactions: TransactionResult[];
  warnings: string[];
  startedAt: string;
  finishedAt?: string;
  exitCode: number;
  error?: {
    code: ErrorCode;
    message: string;
    hint?: string;
  };
}

const MARKS: Record<StepStatus, string> = {
  completed: '✓',
  skipped: '-',
  failed: '✗',
};

/**
 * Shell command that puts the backup of a failed transaction back in place.
 */
export function restoreCommand(result: TransactionResult): string | undefined {
  const snapshot = result.snapshot;
  if (!snapshot) {
    return undefined;
  }
  return snapshot.existed
    ? `sudo cp -p ${snapshot.backupPath} ${snapshot.livePath}`
    : `sudo rm -f ${snapshot.livePath}`;
}

export function formatSummary(report: HardenReport): string {
  const { host, port } = report.endpoint;
  const lines: string[] = [
    `Hardening of ${host}:${port} ${report.exitCode === 0 ? 'completed' : 'failed'}`,
    '',
  ];

  for (const record of report.steps) {
    const suffix = record.status === 'skipped' ? ' (skipped)' : record.detail ? `: ${record.detail}` : '';
    lines.push(`  ${MARKS[record.status]} ${record.step}${suffix}`);
  }

  for (const warning of report.warnings) {
    lines.push(`  ⚠ ${warning}`);
  }

  const unconfirmed = report.transactions.filter((t) => t.state !== 'confirmed');
  for (const transaction of unconfirmed) {
    lines.push('');
    lines.push(`${transaction.resource}: ${transaction.state}${transaction.reverted ? ` (reverted by ${transaction.revertedBy ?? 'guard'})` : ''}`);
    if (transaction.error) {
      lines.push(`  ${transaction.error.message}`);
      if (transaction.error.hint) {
        lines.push(`  ${transaction.error.hint}`);
      }
    }
    if (transaction.guard && !transaction.reverted) {
      lines.push(`  Guard log: ${transaction.guard.logPath}`);
    }
    const restore = restoreCommand(transaction);
    if (restore && transaction.snapshot?.existed) {
      lines.push(`  Backup in effect: ${transaction.snapshot.backupPath}`);
    }
    if (restore && !transaction.reverted) {
      lines.push(`  Manual restore: ${restore}`);
    }
  }

  lines.push('');
  if (report.exitCode === 0) {
    lines.push(`Log in with: ssh -p ${port} ${report.identity}@${host}`);
    lines.push('Password authentication is disabled; use your private key.');
  } else if (report.error) {
    lines.push(`Error [${report.error.code}]: ${report.error.message}`);
    if (report.error.hint) {
      lines.push(`Hint: ${report.error.hint}`);
    }
  }

  return lines.join('\n');
}
