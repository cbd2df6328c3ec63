/**
 * Local process runner shared by the transports
 */

import { spawn } from 'node:child_process';
import { DependencyMissingError } from '../errors/index.js';
import type { ActionResult } from '../types/actions.js';

export interface RunProcessOptions {
  stdin?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options?: RunProcessOptions,
) => Promise<ActionResult>;

/**
 * Spawn a command and collect its output. Never rejects on a non-zero exit;
 * a timeout kills the process and reports exit code 124.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
  return new Promise<ActionResult>((resolve, reject) => {
    const proc = spawn(command, [...args], {
      env: options.env ?? process.env,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    proc.stdout.on('data', (data) => {
      stdout += data.toString();
    });
    proc.stderr.on('data', (data) => {
      stderr += data.toString();
    });

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          proc.kill('SIGTERM');
        }, options.timeoutMs)
      : undefined;

    proc.on('close', (code) => {
      if (timer) clearTimeout(timer);
      if (timedOut) {
        resolve({
          exitCode: 124,
          stdout,
          stderr: `${stderr}${stderr ? '\n' : ''}timed out after ${options.timeoutMs}ms`,
        });
        return;
      }
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      if (timer) clearTimeout(timer);
      if (error.code === 'ENOENT') {
        reject(new DependencyMissingError(command));
        return;
      }
      reject(error);
    });

    // The child may exit before reading everything (e.g. sudo rejecting)
    proc.stdin.on('error', (error) => {
      stderr += `stdin: ${error.message}\n`;
    });
    proc.stdin.end(options.stdin ?? '');
  });
};
