import { posix } from 'node:path';

export interface GuardPaths {
  dir: string;
  script: string;
  log: string;
  pid: string;
  resolved: string;
  outcome: string;
}

export function guardPaths(stateDir: string, resource: string): GuardPaths {
  const dir = posix.join(stateDir, resource);
  const resolved = posix.join(dir, 'resolved');
  return {
    dir,
    script: posix.join(dir, 'guard.sh'),
    log: posix.join(dir, 'guard.log'),
    pid: posix.join(dir, 'guard.pid'),
    resolved,
    outcome: posix.join(resolved, 'outcome'),
  };
}
