/**
 * In-Process Guard Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { GuardConflictError, type GuardSpec } from '@hardline/core';
import { InProcessGuardDriver } from '../src/guard/in-process-guard.js';
import { FakeExecutor } from './helpers/fake-executor.js';

const spec: GuardSpec = {
  transactionId: 'txn_test',
  resource: 'rsyslog',
  livePath: '/etc/rsyslog.d/10-hardening.conf',
  backupPath: '/etc/rsyslog.d/10-hardening.conf.bak',
  stagedPath: '/etc/rsyslog.d/10-hardening.conf.pending',
  snapshotExisted: true,
  activate: [{ op: 'restartService', service: 'rsyslog' }],
  deadlineSeconds: 10,
};

describe('InProcessGuardDriver', () => {
  let executor: FakeExecutor;
  let driver: InProcessGuardDriver;

  beforeEach(() => {
    vi.useFakeTimers();
    executor = new FakeExecutor();
    executor.writeFile(spec.livePath, 'new\n');
    executor.writeFile(spec.backupPath, 'old\n');
    driver = new InProcessGuardDriver(executor);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should revert at the deadline', async () => {
    const guard = await driver.arm(spec);

    await vi.advanceTimersByTimeAsync(10_000);

    expect(await guard.status()).toEqual({ outcome: 'reverted', claimedBy: 'deadline' });
    expect(executor.read(spec.livePath)).toBe('old\n');
    expect(executor.count('restartService')).toBe(1);
    expect(driver.activeResources()).toEqual([]);
  });

  it('should treat a second cancel as a no-op', async () => {
    const guard = await driver.arm(spec);

    const first = await guard.cancel();
    const second = await guard.cancel();
    await vi.advanceTimersByTimeAsync(20_000);

    expect(first).toEqual({ outcome: 'cancelled', claimedBy: 'cancel' });
    expect(second).toEqual({ outcome: 'cancelled', claimedBy: 'cancel' });
    expect(executor.calls).toEqual([]);
    expect(executor.read(spec.livePath)).toBe('new\n');
  });

  it('should not cancel once the deadline has fired', async () => {
    const guard = await driver.arm(spec);
    await vi.advanceTimersByTimeAsync(10_000);

    expect(await guard.cancel()).toEqual({ outcome: 'reverted', claimedBy: 'deadline' });
  });

  it('should mark a failed deadline revert', async () => {
    executor.files.delete(spec.backupPath);
    const guard = await driver.arm(spec);

    await vi.advanceTimersByTimeAsync(10_000);

    expect(await guard.status()).toEqual({ outcome: 'revert-failed', claimedBy: 'deadline' });
    expect(executor.read(spec.livePath)).toBe('new\n');
  });

  it('should stay armed after a failed explicit revert', async () => {
    executor.failOn((a) => a.op === 'copyFile', { stderr: 'Read-only file system' }, true);
    const guard = await driver.arm(spec);

    const status = await guard.revertNow();
    expect(status).toEqual({ outcome: 'pending' });

    await vi.advanceTimersByTimeAsync(10_000);
    expect(await guard.status()).toEqual({ outcome: 'reverted', claimedBy: 'deadline' });
    expect(executor.read(spec.livePath)).toBe('old\n');
  });

  it('should refuse a second guard for the same resource', async () => {
    const guard = await driver.arm(spec);

    await expect(driver.arm(spec)).rejects.toBeInstanceOf(GuardConflictError);

    await guard.cancel();
    const next = await driver.arm(spec);
    await next.cancel();
  });

  it('should resolve awaitOutcome when the guard settles', async () => {
    const guard = await driver.arm(spec);

    const outcome = guard.awaitOutcome(60_000);
    await vi.advanceTimersByTimeAsync(10_000);

    expect(await outcome).toEqual({ outcome: 'reverted', claimedBy: 'deadline' });
  });

  it('should give up waiting after the timeout', async () => {
    const guard = await driver.arm({ ...spec, deadlineSeconds: 100 });

    const outcome = guard.awaitOutcome(5_000);
    await vi.advanceTimersByTimeAsync(5_000);

    expect(await outcome).toEqual({ outcome: 'pending' });
    await guard.cancel();
  });
});
