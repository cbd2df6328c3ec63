import {
  applySudo,
  compileAction,
  quoteArgv,
  runProcess,
  type ActionResult,
  type ConnectivityStatusResult,
  type ExecuteOptions,
  type ProcessRunner,
  type RemoteAction,
  type RemoteExecutor,
  type SudoMode,
  type TargetEndpoint,
} from '@hardline/core';
import { forgetHost } from './known-hosts.js';
import { buildSshArgs } from './ssh-args.js';
import type { SshExecutorConfig } from './types.js';

const DEFAULT_CONNECT_TIMEOUT_SECONDS = 10;
const DEFAULT_COMMAND_TIMEOUT_MS = 120_000;

// ssh reserves 255 for its own failures; sshpass uses 5 for a rejected password
const SSH_FAILURE_EXIT = 255;
const SSHPASS_BAD_PASSWORD_EXIT = 5;
const AUTH_FAILURE_PATTERN = /Permission denied|Authentication failed|Too many authentication failures/i;

/**
 * Default elevation: none as root, the login password when one is known,
 * otherwise passwordless sudo.
 */
export function defaultSudoMode(endpoint: TargetEndpoint): SudoMode {
  if (endpoint.user === 'root') {
    return { mode: 'none' };
  }
  if (endpoint.credential.type === 'password') {
    return { mode: 'password', password: endpoint.credential.password };
  }
  return { mode: 'nopasswd' };
}

/**
 * Classify the result of a probe command.
 */
export function classifyProbe(result: ActionResult): ConnectivityStatusResult {
  if (result.exitCode === 0) {
    return { status: 'reachable' };
  }

  const detail = result.stderr.trim() || undefined;
  if (
    result.exitCode === SSHPASS_BAD_PASSWORD_EXIT ||
    (result.exitCode === SSH_FAILURE_EXIT && AUTH_FAILURE_PATTERN.test(result.stderr))
  ) {
    return { status: 'auth-failed', detail };
  }
  return { status: 'unreachable', detail };
}

/**
 * SSH Executor
 *
 * Runs each remote action as its own ssh invocation. Password credentials go
 * through `sshpass -e` so the password never appears in argv.
 */
export class SshExecutor implements RemoteExecutor {
  readonly description: string;
  private config: SshExecutorConfig;
  private sudo: SudoMode;
  private runner: ProcessRunner;

  constructor(config: SshExecutorConfig) {
    this.config = config;
    this.sudo = config.sudo ?? defaultSudoMode(config.endpoint);
    this.runner = config.runner ?? runProcess;
    const { user, host, port } = config.endpoint;
    this.description = `${user}@${host}:${port}`;
  }

  get endpoint(): TargetEndpoint {
    return this.config.endpoint;
  }

  async execute(action: RemoteAction, options?: ExecuteOptions): Promise<ActionResult> {
    const { argv, stdin } = applySudo(compileAction(action), this.sudo);
    return this.ssh(quoteArgv(argv), stdin, options?.timeoutMs);
  }

  async probe(): Promise<ConnectivityStatusResult> {
    const result = await this.ssh('true', undefined, undefined);
    return classifyProbe(result);
  }

  async forgetHostIdentity(): Promise<boolean> {
    return forgetHost(this.config.endpoint.host, this.config.endpoint.port, {
      knownHostsFile: this.config.knownHostsFile,
      runner: this.runner,
    });
  }

  private ssh(remoteCommand: string, stdin: string | undefined, timeoutMs: number | undefined): Promise<ActionResult> {
    const args = [
      ...buildSshArgs(this.config.endpoint, {
        connectTimeoutSeconds: this.config.connectTimeoutSeconds ?? DEFAULT_CONNECT_TIMEOUT_SECONDS,
        knownHostsFile: this.config.knownHostsFile,
        options: this.config.options,
      }),
      remoteCommand,
    ];
    const runOptions = {
      stdin,
      timeoutMs: timeoutMs ?? this.config.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
    };

    const credential = this.config.endpoint.credential;
    if (credential.type === 'password') {
      return this.runner('sshpass', ['-e', 'ssh', ...args], {
        ...runOptions,
        env: { ...process.env, SSHPASS: credential.password },
      });
    }
    return this.runner('ssh', args, runOptions);
  }
}
