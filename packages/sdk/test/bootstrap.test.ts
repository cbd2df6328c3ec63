/**
 * Privilege Bootstrap Tests
 */

import { beforeEach, describe, it, expect } from 'vitest';
import { BootstrapError, type ManagedIdentity } from '@hardline/core';
import { ensureIdentity, sudoersLine } from '../src/bootstrap/identity.js';
import { FakeExecutor } from './helpers/fake-executor.js';

const identity: ManagedIdentity = {
  username: 'operator',
  password: 'test-secret',
  publicKey: 'ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAITestKeyOnly operator@example',
  shell: '/bin/bash',
};

function targetState(executor: FakeExecutor) {
  return {
    files: Object.fromEntries(executor.files),
    users: [...executor.users].sort(),
    groups: [...(executor.groups.get('operator') ?? [])],
    password: executor.passwords.get('operator'),
  };
}

describe('ensureIdentity', () => {
  let executor: FakeExecutor;

  beforeEach(() => {
    executor = new FakeExecutor();
  });

  it('should provision a new identity', async () => {
    const state = await ensureIdentity(executor, identity);

    expect(state).toEqual({
      username: 'operator',
      home: '/home/operator',
      created: true,
      sudoersPath: '/etc/sudoers.d/operator',
      authorizedKeysPath: '/home/operator/.ssh/authorized_keys',
    });
    expect(executor.calls).toContainEqual({ op: 'run', argv: ['useradd', '-m', '-s', '/bin/bash', 'operator'] });
    expect(executor.passwords.get('operator')).toBe('test-secret');
    expect(executor.groups.get('operator')).toEqual(new Set(['sudo']));
    expect(executor.files.get('/etc/sudoers.d/operator')).toEqual({
      content: 'operator ALL=(ALL) NOPASSWD:ALL\n',
      mode: '440',
      owner: 'root',
      group: 'root',
    });
    expect(executor.files.get('/home/operator/.ssh/authorized_keys')).toEqual({
      content: `${identity.publicKey}\n`,
      mode: '600',
      owner: 'operator',
      group: 'operator',
    });
  });

  it('should never put the password on the command line', async () => {
    await ensureIdentity(executor, identity);

    const chpasswd = executor.calls.find((a) => a.op === 'run' && a.argv[0] === 'chpasswd');
    expect(chpasswd).toEqual({ op: 'run', argv: ['chpasswd'], stdin: 'operator:test-secret\n' });
  });

  it('should validate the sudoers fragment before installing it', async () => {
    await ensureIdentity(executor, identity);

    const visudo = executor.log.indexOf('run visudo -cf /var/lib/hardline/bootstrap/sudoers');
    const install = executor.log.indexOf('installFile /var/lib/hardline/bootstrap/sudoers -> /etc/sudoers.d/operator');
    expect(visudo).toBeGreaterThan(-1);
    expect(install).toBeGreaterThan(visudo);
  });

  it('should swap the key file in with a rename and clean up', async () => {
    await ensureIdentity(executor, identity);

    expect(executor.calls).toContainEqual({
      op: 'moveFile',
      from: '/home/operator/.ssh/authorized_keys.new',
      to: '/home/operator/.ssh/authorized_keys',
    });
    expect(executor.files.has('/home/operator/.ssh/authorized_keys.new')).toBe(false);
    expect(executor.files.has('/var/lib/hardline/bootstrap/authorized_keys')).toBe(false);
    expect(executor.dirs.has('/var/lib/hardline/bootstrap')).toBe(false);
  });

  it('should converge to the same state when run twice', async () => {
    await ensureIdentity(executor, identity);
    const first = targetState(executor);

    const second = await ensureIdentity(executor, identity);

    expect(second.created).toBe(false);
    expect(targetState(executor)).toEqual(first);
    expect(executor.calls.filter((a) => a.op === 'run' && a.argv[0] === 'useradd')).toHaveLength(1);
  });

  it('should replace a previous key instead of appending', async () => {
    await ensureIdentity(executor, identity);
    await ensureIdentity(executor, { ...identity, publicKey: 'ssh-ed25519 AAAAOther operator@example\n' });

    expect(executor.read('/home/operator/.ssh/authorized_keys')).toBe('ssh-ed25519 AAAAOther operator@example\n');
  });

  it('should name the failing step', async () => {
    executor.onRun('visudo', () => ({ exitCode: 1, stdout: '', stderr: 'syntax error near line 1' }));

    const failure = ensureIdentity(executor, identity);

    await expect(failure).rejects.toBeInstanceOf(BootstrapError);
    await expect(failure).rejects.toMatchObject({
      step: 'sudoers',
      message: 'Bootstrap step "sudoers" failed: visudo failed (exit 1): syntax error near line 1',
    });
    expect(executor.files.has('/etc/sudoers.d/operator')).toBe(false);
  });

  it('should reject a password with a line break', async () => {
    await expect(ensureIdentity(executor, { ...identity, password: 'test\nsecret' })).rejects.toMatchObject({
      step: 'set-password',
    });
  });
});

describe('sudoersLine', () => {
  it('should grant passwordless sudo', () => {
    expect(sudoersLine('operator')).toBe('operator ALL=(ALL) NOPASSWD:ALL\n');
  });
});
