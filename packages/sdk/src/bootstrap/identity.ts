/**
 * Privilege Bootstrap
 *
 * Provisions the managed identity through the bootstrap account. Every step
 * converges, so running it again against a provisioned host changes nothing.
 */

import { posix } from 'node:path';
import {
  BootstrapError,
  executeOrThrow,
  type ManagedIdentity,
  type RemoteExecutor,
} from '@hardline/core';

export const DEFAULT_STAGING_DIR = '/var/lib/hardline/bootstrap';
export const SUDOERS_DIR = '/etc/sudoers.d';

export interface EnsureIdentityOptions {
  /** Root-owned directory for files before they are installed */
  stagingDir?: string;
}

export interface IdentityState {
  username: string;
  home: string;
  created: boolean;
  sudoersPath: string;
  authorizedKeysPath: string;
}

export type BootstrapStep =
  | 'create-user'
  | 'set-password'
  | 'sudo-group'
  | 'sudoers'
  | 'ssh-dir'
  | 'authorized-key';

async function step<T>(name: BootstrapStep, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof BootstrapError) {
      throw error;
    }
    throw new BootstrapError(name, error instanceof Error ? error.message : String(error));
  }
}

export function sudoersLine(username: string): string {
  return `${username} ALL=(ALL) NOPASSWD:ALL\n`;
}

export async function ensureIdentity(
  executor: RemoteExecutor,
  identity: ManagedIdentity,
  options: EnsureIdentityOptions = {},
): Promise<IdentityState> {
  const { username } = identity;
  const stagingDir = options.stagingDir ?? DEFAULT_STAGING_DIR;

  // Step 1: account
  const created = await step('create-user', async () => {
    const exists = await executor.execute({ op: 'userExists', username });
    if (exists.exitCode === 0) {
      return false;
    }
    await executeOrThrow(executor, { op: 'run', argv: ['useradd', '-m', '-s', identity.shell, username] });
    console.log(`[HARDLINE:Bootstrap] Created user ${username}`);
    return true;
  });

  // Step 2: password, fed on stdin so it never shows up in a process list
  await step('set-password', async () => {
    if (/[\r\n]/.test(identity.password)) {
      throw new BootstrapError('set-password', 'the password contains a line break');
    }
    await executeOrThrow(
      executor,
      { op: 'run', argv: ['chpasswd'], stdin: `${username}:${identity.password}\n` },
      'chpasswd',
    );
  });

  // Step 3: sudo group
  await step('sudo-group', async () => {
    await executeOrThrow(executor, { op: 'run', argv: ['usermod', '-aG', 'sudo', username] });
  });

  // Step 4: passwordless sudo, checked before it can break sudo
  const sudoersPath = posix.join(SUDOERS_DIR, username);
  await step('sudoers', async () => {
    const staged = posix.join(stagingDir, 'sudoers');
    await executeOrThrow(executor, { op: 'makeDir', path: stagingDir, mode: '700' });
    await executeOrThrow(executor, { op: 'writeFile', path: staged, content: sudoersLine(username) });
    await executeOrThrow(executor, { op: 'run', argv: ['visudo', '-cf', staged] }, 'visudo');
    await executeOrThrow(executor, {
      op: 'installFile',
      from: staged,
      to: sudoersPath,
      mode: '440',
      owner: 'root',
      group: 'root',
    });
  });

  // Step 5: ~/.ssh
  const home = await step('ssh-dir', async () => {
    const entry = await executeOrThrow(executor, { op: 'run', argv: ['getent', 'passwd', username], privileged: false });
    const dir = entry.stdout.trim().split(':')[5];
    if (!dir) {
      throw new BootstrapError('ssh-dir', `no home directory for ${username}`);
    }
    await executeOrThrow(executor, {
      op: 'makeDir',
      path: posix.join(dir, '.ssh'),
      mode: '700',
      owner: username,
      group: username,
    });
    return dir;
  });

  // Step 6: authorized key, swapped in with a rename
  const authorizedKeysPath = posix.join(home, '.ssh', 'authorized_keys');
  await step('authorized-key', async () => {
    const staged = posix.join(stagingDir, 'authorized_keys');
    const next = `${authorizedKeysPath}.new`;
    const key = identity.publicKey.endsWith('\n') ? identity.publicKey : `${identity.publicKey}\n`;

    await executeOrThrow(executor, { op: 'writeFile', path: staged, content: key });
    await executeOrThrow(executor, {
      op: 'installFile',
      from: staged,
      to: next,
      mode: '600',
      owner: username,
      group: username,
    });
    await executeOrThrow(executor, { op: 'moveFile', from: next, to: authorizedKeysPath });
    await executeOrThrow(executor, { op: 'removeDir', path: stagingDir });
  });

  console.log(`[HARDLINE:Bootstrap] Identity ${username} is provisioned (${created ? 'new' : 'existing'} account)`);
  return { username, home, created, sudoersPath, authorizedKeysPath };
}
