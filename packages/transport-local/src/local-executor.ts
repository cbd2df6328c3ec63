import { userInfo } from 'node:os';
import {
  applySudo,
  compileAction,
  runProcess,
  type ActionResult,
  type ConnectivityStatusResult,
  type ExecuteOptions,
  type ProcessRunner,
  type RemoteAction,
  type RemoteExecutor,
  type SudoMode,
} from '@hardline/core';
import type { LocalExecutorConfig } from './types.js';

const DEFAULT_COMMAND_TIMEOUT_MS = 120_000;

export function defaultLocalSudoMode(uid: number = process.getuid?.() ?? -1): SudoMode {
  return uid === 0 ? { mode: 'none' } : { mode: 'nopasswd' };
}

/**
 * Local Executor
 *
 * Runs remote actions directly on this machine. Used for hardening the host
 * the tool runs on, where no SSH hop is needed.
 */
export class LocalExecutor implements RemoteExecutor {
  readonly description: string;
  private sudo: SudoMode;
  private runner: ProcessRunner;
  private commandTimeoutMs: number;

  constructor(config: LocalExecutorConfig = {}) {
    this.sudo = config.sudo ?? defaultLocalSudoMode();
    this.runner = config.runner ?? runProcess;
    this.commandTimeoutMs = config.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.description = `local (${userInfo().username})`;
  }

  async execute(action: RemoteAction, options?: ExecuteOptions): Promise<ActionResult> {
    const { argv, stdin } = applySudo(compileAction(action), this.sudo);
    const [command, ...args] = argv;
    if (command === undefined) {
      throw new Error(`Action ${action.op} compiled to an empty command`);
    }
    return this.runner(command, args, {
      stdin,
      timeoutMs: options?.timeoutMs ?? this.commandTimeoutMs,
    });
  }

  async probe(): Promise<ConnectivityStatusResult> {
    return { status: 'reachable' };
  }

  async forgetHostIdentity(): Promise<boolean> {
    return false;
  }
}
