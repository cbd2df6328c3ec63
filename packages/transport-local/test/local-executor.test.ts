/**
 * Local Executor Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ProcessRunner } from '@hardline/core';
import { LocalExecutor, defaultLocalSudoMode } from '../src/index.js';

describe('defaultLocalSudoMode', () => {
  it('should not elevate as root', () => {
    expect(defaultLocalSudoMode(0)).toEqual({ mode: 'none' });
  });

  it('should use passwordless sudo otherwise', () => {
    expect(defaultLocalSudoMode(1000)).toEqual({ mode: 'nopasswd' });
  });
});

describe('LocalExecutor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hardline-local-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should pass sudo-prefixed argv to the runner', async () => {
    const runner = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>()
      .mockResolvedValue({ exitCode: 0, stdout: '', stderr: '' });
    const executor = new LocalExecutor({ sudo: { mode: 'nopasswd' }, runner });

    await executor.execute({ op: 'restartService', service: 'rsyslog' });

    expect(runner).toHaveBeenCalledWith('sudo', ['-n', 'systemctl', 'restart', 'rsyslog'], {
      stdin: undefined,
      timeoutMs: 120_000,
    });
  });

  it('should write, copy and read files without sudo', async () => {
    const executor = new LocalExecutor({ sudo: { mode: 'none' } });
    const live = join(dir, 'app.conf');

    const write = await executor.execute({ op: 'writeFile', path: live, content: 'a=1\n' });
    expect(write.exitCode).toBe(0);

    await executor.execute({ op: 'copyFile', from: live, to: `${live}.bak` });
    expect(await readFile(`${live}.bak`, 'utf-8')).toBe('a=1\n');

    const read = await executor.execute({ op: 'readFile', path: `${live}.bak` });
    expect(read.stdout).toBe('a=1\n');
  });

  it('should report missing files through a non-zero exit', async () => {
    const executor = new LocalExecutor({ sudo: { mode: 'none' } });

    const result = await executor.execute({ op: 'fileExists', path: join(dir, 'missing') });

    expect(result.exitCode).toBe(1);
  });

  it('should claim a lock only once', async () => {
    const executor = new LocalExecutor({ sudo: { mode: 'none' } });
    const lock = join(dir, 'resolved');

    const first = await executor.execute({ op: 'claimLock', path: lock });
    const second = await executor.execute({ op: 'claimLock', path: lock });

    expect(first.exitCode).toBe(0);
    expect(second.exitCode).not.toBe(0);
    expect((await stat(lock)).isDirectory()).toBe(true);
  });

  it('should always be reachable and keep no host keys', async () => {
    const executor = new LocalExecutor({ sudo: { mode: 'none' } });

    expect(await executor.probe()).toEqual({ status: 'reachable' });
    expect(await executor.forgetHostIdentity()).toBe(false);
  });
});
