/**
 * @hardline/transport-ssh
 *
 * OpenSSH transport for hardline remote actions
 */

export { SshExecutor, classifyProbe, defaultSudoMode } from './ssh-executor.js';
export { buildSshArgs, knownHostsPattern } from './ssh-args.js';
export { forgetHost, type ForgetHostOptions } from './known-hosts.js';
export type { SshExecutorConfig, SshArgsOptions } from './types.js';
