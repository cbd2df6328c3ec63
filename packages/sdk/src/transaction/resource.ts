import type { RemoteAction } from '@hardline/core';

/**
 * A configuration file on the target that is changed only through a
 * guarded transaction.
 */
export interface ManagedResource {
  /** Unique name, also the guard directory name */
  name: string;
  livePath: string;
  /** Default: `<livePath>.pending` */
  stagedPath?: string;
  /** Default: `<livePath>.bak` */
  backupPath?: string;
  /** Mode for a newly created live file (an existing file keeps its mode) */
  mode?: string;
  /** Produce the new content from the current one (null when absent) */
  render(current: string | null): string;
  /** Checker run against the staged file; non-zero exit rejects it */
  validate?: (stagedPath: string) => RemoteAction;
  /** Makes the consuming service pick up the live file */
  activate: RemoteAction[];
}

export interface ResourcePaths {
  livePath: string;
  stagedPath: string;
  backupPath: string;
}

export const DEFAULT_FILE_MODE = '644';

export function resolvePaths(resource: ManagedResource): ResourcePaths {
  return {
    livePath: resource.livePath,
    stagedPath: resource.stagedPath ?? `${resource.livePath}.pending`,
    backupPath: resource.backupPath ?? `${resource.livePath}.bak`,
  };
}
