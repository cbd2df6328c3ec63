/**
 * Action compilation
 *
 * Maps each typed remote action to the argv that performs it on a POSIX host.
 */

import type { CompiledAction, RemoteAction } from '../types/actions.js';
import type { SudoMode } from '../types/target.js';

// Runs argv in the background immune to SIGHUP so it outlives the session
// that started it, then prints the background pid.
const DETACH_SCRIPT = 'log=$1; shift; nohup "$@" >>"$log" 2>&1 </dev/null & echo $!';

export function compileAction(action: RemoteAction): CompiledAction {
  const privileged = action.privileged ?? true;

  switch (action.op) {
    case 'run':
      return { argv: [...action.argv], stdin: action.stdin, privileged };

    case 'readFile':
      return { argv: ['cat', action.path], privileged };

    case 'writeFile':
      return { argv: ['tee', action.path], stdin: action.content, privileged };

    case 'copyFile':
      return { argv: ['cp', '-p', action.from, action.to], privileged };

    case 'moveFile':
      return { argv: ['mv', '-f', action.from, action.to], privileged };

    case 'removeFile':
      return { argv: ['rm', '-f', action.path], privileged };

    case 'removeDir':
      return { argv: ['rm', '-rf', action.path], privileged };

    case 'makeDir':
      return {
        argv: [
          'install', '-d',
          '-m', action.mode ?? '755',
          ...ownership(action.owner, action.group),
          action.path,
        ],
        privileged,
      };

    case 'installFile':
      return {
        argv: [
          'install',
          '-m', action.mode,
          ...ownership(action.owner, action.group),
          action.from,
          action.to,
        ],
        privileged,
      };

    case 'fileExists':
      return { argv: ['test', '-e', action.path], privileged };

    case 'restartService':
      return { argv: ['systemctl', 'restart', action.service], privileged };

    case 'spawnDetached':
      return {
        argv: ['sh', '-c', DETACH_SCRIPT, 'hardline-detach', action.logPath, ...action.argv],
        privileged,
      };

    case 'killProcess':
      return { argv: ['kill', String(action.pid)], privileged };

    case 'claimLock':
      // mkdir either creates the directory or fails: an atomic test-and-set
      return { argv: ['mkdir', action.path], privileged };

    case 'userExists':
      return { argv: ['id', '-u', action.username], privileged: action.privileged ?? false };
  }
}

function ownership(owner?: string, group?: string): string[] {
  const args: string[] = [];
  if (owner) args.push('-o', owner);
  if (group) args.push('-g', group);
  return args;
}

/**
 * Prefix a privileged action with sudo according to the executor's mode.
 * With a sudo password, the password is fed as the first stdin line.
 */
export function applySudo(compiled: CompiledAction, sudo: SudoMode): { argv: string[]; stdin?: string } {
  if (!compiled.privileged || sudo.mode === 'none') {
    return { argv: compiled.argv, stdin: compiled.stdin };
  }

  if (sudo.mode === 'nopasswd') {
    return { argv: ['sudo', '-n', ...compiled.argv], stdin: compiled.stdin };
  }

  return {
    argv: ['sudo', '-S', '-k', '-p', '', ...compiled.argv],
    stdin: `${sudo.password}\n${compiled.stdin ?? ''}`,
  };
}

/**
 * Short human label for logs, e.g. "copyFile /etc/ssh/sshd_config"
 */
export function describeAction(action: RemoteAction): string {
  switch (action.op) {
    case 'run':
      return `run ${action.argv.join(' ')}`;
    case 'copyFile':
    case 'moveFile':
    case 'installFile':
      return `${action.op} ${action.from} -> ${action.to}`;
    case 'restartService':
      return `restart ${action.service}`;
    case 'spawnDetached':
      return `spawn ${action.argv.join(' ')}`;
    case 'killProcess':
      return `kill ${action.pid}`;
    case 'userExists':
      return `id ${action.username}`;
    default:
      return `${action.op} ${action.path}`;
  }
}
