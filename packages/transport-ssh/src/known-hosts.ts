import { PreconditionError, runProcess, type ProcessRunner } from '@hardline/core';
import { knownHostsPattern } from './ssh-args.js';

export interface ForgetHostOptions {
  knownHostsFile?: string;
  runner?: ProcessRunner;
}

/**
 * Remove any cached host key for the target. Repeated runs against a rebuilt
 * VM on the same address would otherwise fail with a host key mismatch.
 *
 * @returns true when an entry was found and removed
 */
export async function forgetHost(
  host: string,
  port: number,
  options: ForgetHostOptions = {},
): Promise<boolean> {
  const runner = options.runner ?? runProcess;
  const pattern = knownHostsPattern(host, port);
  const fileArgs = options.knownHostsFile ? ['-f', options.knownHostsFile] : [];

  const lookup = await runner('ssh-keygen', ['-F', pattern, ...fileArgs]);
  if (lookup.exitCode !== 0) {
    return false;
  }

  console.log(`[HARDLINE:SSH] Removing cached host key for ${pattern}`);
  const removal = await runner('ssh-keygen', ['-R', pattern, ...fileArgs]);
  if (removal.exitCode !== 0) {
    throw new PreconditionError(
      `Failed to remove host key for ${pattern}: ${removal.stderr.trim()}`,
      'Check permissions on ~/.ssh/known_hosts',
    );
  }
  return true;
}
