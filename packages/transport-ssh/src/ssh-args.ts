import type { Credential, TargetEndpoint } from '@hardline/core';
import type { SshArgsOptions } from './types.js';

/**
 * Build ssh arguments up to and including the destination.
 * The remote command is appended by the caller.
 */
export function buildSshArgs(endpoint: TargetEndpoint, options: SshArgsOptions): string[] {
  const args = [
    '-T',
    '-p', String(endpoint.port),
    '-o', `ConnectTimeout=${options.connectTimeoutSeconds}`,
    '-o', 'StrictHostKeyChecking=accept-new',
    '-o', 'ServerAliveInterval=15',
    '-o', 'ServerAliveCountMax=3',
    '-o', 'LogLevel=ERROR',
  ];

  if (options.knownHostsFile) {
    args.push('-o', `UserKnownHostsFile=${options.knownHostsFile}`);
  }

  args.push(...credentialArgs(endpoint.credential));

  for (const [key, value] of Object.entries(options.options ?? {})) {
    args.push('-o', `${key}=${value}`);
  }

  args.push(`${endpoint.user}@${endpoint.host}`);
  return args;
}

function credentialArgs(credential: Credential): string[] {
  switch (credential.type) {
    case 'key':
      return [
        '-i', credential.identityFile,
        '-o', 'IdentitiesOnly=yes',
        '-o', 'BatchMode=yes',
        '-o', 'PasswordAuthentication=no',
      ];
    case 'agent':
      return ['-o', 'BatchMode=yes', '-o', 'PasswordAuthentication=no'];
    case 'password':
      return [
        '-o', 'PreferredAuthentications=password,keyboard-interactive',
        '-o', 'PubkeyAuthentication=no',
        '-o', 'NumberOfPasswordPrompts=1',
      ];
  }
}

/**
 * known_hosts lookup key: bare host on port 22, "[host]:port" otherwise.
 */
export function knownHostsPattern(host: string, port: number): string {
  return port === 22 ? host : `[${host}]:${port}`;
}
