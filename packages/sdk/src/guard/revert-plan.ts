import type { GuardSpec, RemoteAction } from '@hardline/core';

/**
 * Actions that restore a resource to its snapshot. Shared by every guard
 * driver so the deadline path and the explicit path revert identically.
 */
export function buildRevertPlan(spec: GuardSpec): RemoteAction[] {
  const restore: RemoteAction[] = spec.snapshotExisted
    ? [
        { op: 'fileExists', path: spec.backupPath },
        { op: 'copyFile', from: spec.backupPath, to: spec.livePath },
      ]
    : [{ op: 'removeFile', path: spec.livePath }];

  return [
    ...restore,
    { op: 'removeFile', path: spec.stagedPath },
    ...spec.activate,
  ];
}
