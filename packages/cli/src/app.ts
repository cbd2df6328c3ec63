/**
 * Wiring from validated command line options to a hardening run
 */

import { readFileSync, existsSync } from 'node:fs';
import { PreconditionError, type TargetEndpoint } from '@hardline/core';
import type { HardenConfig, HardenHooks } from '@hardline/sdk';
import { LocalExecutor } from '@hardline/transport-local';
import { SshExecutor } from '@hardline/transport-ssh';
import type { CliOptions } from './args.js';

export function readPublicKey(path: string): string {
  if (!existsSync(path)) {
    throw new PreconditionError(
      `Public key file not found: ${path}`,
      'Generate one with ssh-keygen -t ed25519 and pass the .pub file',
    );
  }
  return readFileSync(path, 'utf-8').trim();
}

export function createHardenConfig(
  options: CliOptions,
  publicKey: string,
  hooks?: HardenHooks,
): HardenConfig {
  const overSsh = (endpoint: TargetEndpoint) =>
    new SshExecutor({ endpoint, connectTimeoutSeconds: options.connectTimeout });

  return {
    target: {
      host: options.host,
      port: options.port,
      bootstrapUser: options.bootstrapUser,
      bootstrapPassword: options.bootstrapPassword,
    },
    identity: {
      username: options.identity,
      password: options.identityPassword,
      publicKey,
      identityFile: options.identityFile,
    },
    // Changes run in-process with --local; probes and key logins still go over SSH
    connect: options.local ? () => new LocalExecutor() : overSsh,
    connectProbe: overSsh,
    guard: { deadlineSeconds: options.guardDeadline },
    skip: options.skip,
    hooks,
  };
}
