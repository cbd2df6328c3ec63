import { RemoteCommandError } from '../errors/index.js';
import type {
  ActionResult,
  ExecuteOptions,
  RemoteAction,
  RemoteExecutor,
} from '../types/actions.js';
import { describeAction } from './compile.js';

/**
 * Execute an action and raise RemoteCommandError naming `step` on non-zero exit.
 */
export async function executeOrThrow(
  executor: RemoteExecutor,
  action: RemoteAction,
  step: string = describeAction(action),
  options?: ExecuteOptions,
): Promise<ActionResult> {
  const result = await executor.execute(action, options);
  if (result.exitCode !== 0) {
    throw new RemoteCommandError(step, result.exitCode, result.stderr);
  }
  return result;
}

/**
 * Execute actions in order, stopping at the first failure.
 */
export async function executeSequence(
  executor: RemoteExecutor,
  actions: readonly RemoteAction[],
  options?: ExecuteOptions,
): Promise<void> {
  for (const action of actions) {
    await executeOrThrow(executor, action, describeAction(action), options);
  }
}
