/**
 * SSH Executor Tests
 *
 * These tests replace the process runner, so no ssh binary is needed.
 */

import { describe, it, expect, vi } from 'vitest';
import type { ActionResult, ProcessRunner, TargetEndpoint } from '@hardline/core';
import { SshExecutor, classifyProbe, defaultSudoMode } from '../src/ssh-executor.js';

const ok: ActionResult = { exitCode: 0, stdout: '', stderr: '' };

const keyEndpoint: TargetEndpoint = {
  host: '192.0.2.10',
  port: 22,
  user: 'ops',
  credential: { type: 'key', identityFile: '/keys/id' },
};

const passwordEndpoint: TargetEndpoint = {
  host: '192.0.2.10',
  port: 22,
  user: 'admin',
  credential: { type: 'password', password: 'test-secret' },
};

function recordingRunner(result: ActionResult = ok) {
  return vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>().mockResolvedValue(result);
}

function callAt(runner: ReturnType<typeof recordingRunner>, index: number): Parameters<ProcessRunner> {
  const call = runner.mock.calls[index];
  if (!call) throw new Error(`runner was not called ${index + 1} times`);
  return call;
}

describe('SshExecutor', () => {
  it('should describe its target', () => {
    expect(new SshExecutor({ endpoint: keyEndpoint }).description).toBe('ops@192.0.2.10:22');
  });

  it('should send a quoted remote command with sudo for privileged actions', async () => {
    const runner = recordingRunner();
    const executor = new SshExecutor({ endpoint: keyEndpoint, runner });

    await executor.execute({ op: 'copyFile', from: '/etc/ssh/sshd_config', to: '/etc/ssh/sshd config.bak' });

    const [command, args] = callAt(runner, 0);
    expect(command).toBe('ssh');
    expect(args[args.length - 2]).toBe('ops@192.0.2.10');
    expect(args[args.length - 1]).toBe("sudo -n cp -p /etc/ssh/sshd_config '/etc/ssh/sshd config.bak'");
  });

  it('should pipe file content on stdin', async () => {
    const runner = recordingRunner();
    const executor = new SshExecutor({ endpoint: keyEndpoint, runner });

    await executor.execute({ op: 'writeFile', path: '/tmp/a', content: 'PermitRootLogin no\n', privileged: false });

    const [, args, options] = callAt(runner, 0);
    expect(args[args.length - 1]).toBe('tee /tmp/a');
    expect(options?.stdin).toBe('PermitRootLogin no\n');
  });

  it('should route password credentials through sshpass with the password in the environment', async () => {
    const runner = recordingRunner();
    const executor = new SshExecutor({ endpoint: passwordEndpoint, runner });

    await executor.execute({ op: 'restartService', service: 'ssh' });

    const [command, args, options] = callAt(runner, 0);
    expect(command).toBe('sshpass');
    expect(args.slice(0, 2)).toEqual(['-e', 'ssh']);
    expect(args).not.toContain('test-secret');
    expect(options?.env?.['SSHPASS']).toBe('test-secret');
    expect(args[args.length - 1]).toBe("sudo -S -k -p '' systemctl restart ssh");
    expect(options?.stdin).toBe('test-secret\n');
  });

  it('should apply the configured command timeout', async () => {
    const runner = recordingRunner();
    const executor = new SshExecutor({ endpoint: keyEndpoint, runner, commandTimeoutMs: 5000 });

    await executor.execute({ op: 'fileExists', path: '/x' });
    await executor.execute({ op: 'fileExists', path: '/x' }, { timeoutMs: 600_000 });

    expect(callAt(runner, 0)[2]?.timeoutMs).toBe(5000);
    expect(callAt(runner, 1)[2]?.timeoutMs).toBe(600_000);
  });

  it('should probe with a bare true', async () => {
    const runner = recordingRunner();
    const executor = new SshExecutor({ endpoint: keyEndpoint, runner });

    expect(await executor.probe()).toEqual({ status: 'reachable' });
    const [, args] = callAt(runner, 0);
    expect(args[args.length - 1]).toBe('true');
  });

  it('should purge host keys through ssh-keygen', async () => {
    const runner = recordingRunner();
    const executor = new SshExecutor({ endpoint: { ...keyEndpoint, port: 2222 }, runner });

    expect(await executor.forgetHostIdentity()).toBe(true);
    expect(runner.mock.calls.map(([cmd, args]) => [cmd, ...args])).toEqual([
      ['ssh-keygen', '-F', '[192.0.2.10]:2222'],
      ['ssh-keygen', '-R', '[192.0.2.10]:2222'],
    ]);
  });
});

describe('classifyProbe', () => {
  it('should report reachable on exit 0', () => {
    expect(classifyProbe(ok)).toEqual({ status: 'reachable' });
  });

  it('should detect rejected credentials', () => {
    expect(
      classifyProbe({ exitCode: 255, stdout: '', stderr: 'admin@192.0.2.10: Permission denied (publickey,password).\n' }),
    ).toEqual({ status: 'auth-failed', detail: 'admin@192.0.2.10: Permission denied (publickey,password).' });
    expect(classifyProbe({ exitCode: 5, stdout: '', stderr: '' }).status).toBe('auth-failed');
  });

  it('should treat other ssh failures as unreachable', () => {
    expect(
      classifyProbe({ exitCode: 255, stdout: '', stderr: 'ssh: connect to host 192.0.2.10 port 22: Connection timed out' }),
    ).toEqual({ status: 'unreachable', detail: 'ssh: connect to host 192.0.2.10 port 22: Connection timed out' });
  });
});

describe('defaultSudoMode', () => {
  it('should not elevate as root', () => {
    expect(defaultSudoMode({ ...keyEndpoint, user: 'root' })).toEqual({ mode: 'none' });
  });

  it('should reuse the login password', () => {
    expect(defaultSudoMode(passwordEndpoint)).toEqual({ mode: 'password', password: 'test-secret' });
  });

  it('should expect passwordless sudo for key logins', () => {
    expect(defaultSudoMode(keyEndpoint)).toEqual({ mode: 'nopasswd' });
  });
});
