import {
  ConnectivityError,
  type ConnectivityStatusResult,
  type RemoteExecutor,
} from '@hardline/core';

/**
 * Single non-retrying reachability check. Stale host key records for the
 * address are dropped first so a rebuilt VM is not mistaken for an attack.
 */
export async function probeTarget(executor: RemoteExecutor): Promise<ConnectivityStatusResult> {
  await executor.forgetHostIdentity();
  const result = await executor.probe();
  console.log(
    `[HARDLINE:Probe] ${executor.description}: ${result.status}${result.detail ? ` (${result.detail})` : ''}`
  );
  return result;
}

export async function assertReachable(executor: RemoteExecutor): Promise<void> {
  const result = await probeTarget(executor);
  if (result.status !== 'reachable') {
    throw new ConnectivityError(executor.description, result.status, result.detail);
  }
}

/**
 * Key-only login check as the managed identity. Host keys are kept: the
 * target was already probed in this run.
 */
export async function verifyKeyLogin(executor: RemoteExecutor): Promise<ConnectivityStatusResult> {
  return executor.probe();
}
