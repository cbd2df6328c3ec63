/**
 * Detached script guard
 *
 * The production guard: a shell script started with nohup on the target so it
 * outlives the SSH session that armed it. Resolution goes through an atomic
 * `mkdir` of the guard's `resolved/` directory; whoever creates it writes the
 * outcome record, every other party reads it.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  executeOrThrow,
  executeSequence,
  formatGuardOutcome,
  generateGuardId,
  GuardConflictError,
  GuardFailedError,
  isSettledOutcome,
  parseGuardOutcome,
  RemoteCommandError,
  RevertError,
  type ActionResult,
  type GuardClaim,
  type GuardDriver,
  type GuardHandle,
  type GuardOutcome,
  type GuardSpec,
  type GuardStatus,
  type RemoteExecutor,
} from '@hardline/core';
import { DEFAULT_GUARD } from '../config.js';
import { renderGuardScript } from './guard-script.js';
import { guardPaths, type GuardPaths } from './paths.js';
import { buildRevertPlan } from './revert-plan.js';

export interface ScriptGuardOptions {
  stateDir?: string;
  pollIntervalMs?: number;
}

export class ScriptGuardDriver implements GuardDriver {
  readonly kind = 'script';
  private executor: RemoteExecutor;
  private stateDir: string;
  private pollIntervalMs: number;

  constructor(executor: RemoteExecutor, options: ScriptGuardOptions = {}) {
    this.executor = executor;
    this.stateDir = options.stateDir ?? DEFAULT_GUARD.stateDir;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_GUARD.pollIntervalMs;
  }

  async arm(spec: GuardSpec): Promise<GuardHandle> {
    const paths = guardPaths(this.stateDir, spec.resource);
    const guardId = generateGuardId();

    await this.assertNoActiveGuard(spec.resource, paths);

    const deadlineAt = new Date(Date.now() + spec.deadlineSeconds * 1000).toISOString();
    const script = renderGuardScript({ guardId, spec, paths, deadlineAt });

    let launched: ActionResult;
    try {
      await executeOrThrow(this.executor, { op: 'removeDir', path: paths.dir });
      await executeOrThrow(this.executor, { op: 'makeDir', path: paths.dir, mode: '700' });
      await executeOrThrow(this.executor, { op: 'writeFile', path: paths.script, content: script });
      launched = await executeOrThrow(this.executor, {
        op: 'spawnDetached',
        argv: ['sh', paths.script],
        logPath: paths.log,
      });
    } catch (error) {
      throw new GuardFailedError(spec.resource, error instanceof Error ? error.message : String(error));
    }

    const pid = Number.parseInt(launched.stdout.trim(), 10);
    if (!Number.isInteger(pid) || pid <= 0) {
      throw new GuardFailedError(spec.resource, `no process id reported (got "${launched.stdout.trim()}")`);
    }

    console.log(
      `[HARDLINE:Guard] Armed ${guardId} for ${spec.resource} on ${this.executor.description} ` +
      `(pid ${pid}, reverts at ${deadlineAt})`
    );

    return new ScriptGuardHandle({
      id: guardId,
      spec,
      paths,
      pid,
      deadlineAt,
      executor: this.executor,
      pollIntervalMs: this.pollIntervalMs,
    });
  }

  /**
   * A previous guard blocks arming while its process is alive and it has not
   * settled: either its lock is unclaimed or the winner is still reverting.
   * A settled guard that is still sleeping is stopped.
   */
  private async assertNoActiveGuard(resource: string, paths: GuardPaths): Promise<void> {
    const pidFile = await this.executor.execute({ op: 'readFile', path: paths.pid });
    if (pidFile.exitCode !== 0) {
      return;
    }

    let settled = false;
    const resolved = await this.executor.execute({ op: 'fileExists', path: paths.resolved });
    if (resolved.exitCode === 0) {
      const outcome = await this.executor.execute({ op: 'readFile', path: paths.outcome });
      settled = isSettledOutcome(parseGuardOutcome(outcome.exitCode === 0 ? outcome.stdout : '').outcome);
    }

    const pid = Number.parseInt(pidFile.stdout.trim(), 10);
    if (!Number.isInteger(pid) || pid <= 0) {
      return;
    }
    const alive = await this.executor.execute({ op: 'run', argv: ['kill', '-0', String(pid)] });
    if (alive.exitCode !== 0) {
      return;
    }
    if (!settled) {
      throw new GuardConflictError(resource, `pid ${pid}`);
    }

    // Settled but still sleeping: at its deadline it would claim the new guard's lock
    console.warn(`[HARDLINE:Guard] Stopping settled guard process ${pid} for ${resource}`);
    await executeOrThrow(this.executor, { op: 'killProcess', pid });
  }
}

interface ScriptGuardHandleParams {
  id: string;
  spec: GuardSpec;
  paths: GuardPaths;
  pid: number;
  deadlineAt: string;
  executor: RemoteExecutor;
  pollIntervalMs: number;
}

export class ScriptGuardHandle implements GuardHandle {
  readonly id: string;
  readonly resource: string;
  readonly deadlineAt: string;
  readonly logPath: string;
  readonly pid: number;
  private spec: GuardSpec;
  private paths: GuardPaths;
  private executor: RemoteExecutor;
  private pollIntervalMs: number;

  constructor(params: ScriptGuardHandleParams) {
    this.id = params.id;
    this.resource = params.spec.resource;
    this.deadlineAt = params.deadlineAt;
    this.logPath = params.paths.log;
    this.pid = params.pid;
    this.spec = params.spec;
    this.paths = params.paths;
    this.executor = params.executor;
    this.pollIntervalMs = params.pollIntervalMs;
  }

  async status(): Promise<GuardStatus> {
    const outcome = await this.executor.execute({ op: 'readFile', path: this.paths.outcome });
    if (outcome.exitCode === 0) {
      return parseGuardOutcome(outcome.stdout);
    }
    const resolved = await this.executor.execute({ op: 'fileExists', path: this.paths.resolved });
    return parseGuardOutcome(resolved.exitCode === 0 ? '' : null);
  }

  async cancel(): Promise<GuardStatus> {
    if (!(await this.claim('cancel'))) {
      const status = await this.status();
      console.log(`[HARDLINE:Guard] ${this.id} already resolved: ${status.outcome}`);
      return status;
    }

    // The lock is ours: the guard can no longer revert, so cleanup failures only leave litter
    await this.afterCancel('record the outcome', () => this.writeOutcome('cancel', 'cancelled'));
    await this.afterCancel('stop the guard process', () => this.stopProcess());
    console.log(`[HARDLINE:Guard] Cancelled ${this.id} for ${this.resource}`);
    return { outcome: 'cancelled', claimedBy: 'cancel' };
  }

  private async afterCancel(task: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      console.warn(
        `[HARDLINE:Guard] Cancelled ${this.id} but could not ${task}: ` +
        `${error instanceof Error ? error.message : String(error)}. ` +
        `The guard exits at ${this.deadlineAt} without reverting; remove ${this.paths.dir} when convenient`
      );
    }
  }

  async revertNow(): Promise<GuardStatus> {
    if (!(await this.claim('explicit-revert'))) {
      return this.status();
    }

    await this.writeOutcome('explicit-revert', 'reverting');
    console.log(`[HARDLINE:Guard] Reverting ${this.resource} now (${this.id})`);

    try {
      await executeSequence(this.executor, buildRevertPlan(this.spec));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.releaseAfterFailedRevert(reason);
    }

    await this.writeOutcome('explicit-revert', 'reverted');
    await this.stopProcess();
    console.log(`[HARDLINE:Guard] Reverted ${this.resource} to its snapshot`);
    return { outcome: 'reverted', claimedBy: 'explicit-revert' };
  }

  async awaitOutcome(timeoutMs: number): Promise<GuardStatus> {
    const giveUpAt = Date.now() + timeoutMs;
    let status = await this.status();

    while (!isSettledOutcome(status.outcome) && Date.now() < giveUpAt) {
      await delay(Math.min(this.pollIntervalMs, Math.max(giveUpAt - Date.now(), 0)));
      status = await this.status();
    }
    return status;
  }

  /**
   * Atomically take the resolution lock. A failed mkdir with no lock present
   * is a transport problem, not a lost race.
   */
  private async claim(by: GuardClaim): Promise<boolean> {
    const result = await this.executor.execute({ op: 'claimLock', path: this.paths.resolved });
    if (result.exitCode === 0) {
      return true;
    }

    const exists = await this.executor.execute({ op: 'fileExists', path: this.paths.resolved });
    if (exists.exitCode !== 0) {
      throw new RemoteCommandError(`${by} claim on ${this.paths.resolved}`, result.exitCode, result.stderr);
    }
    return false;
  }

  private async writeOutcome(claim: GuardClaim, outcome: GuardOutcome): Promise<void> {
    await executeOrThrow(this.executor, {
      op: 'writeFile',
      path: this.paths.outcome,
      content: formatGuardOutcome(claim, outcome),
    });
  }

  private async stopProcess(): Promise<void> {
    const killed = await this.executor.execute({ op: 'killProcess', pid: this.pid });
    if (killed.exitCode !== 0) {
      console.warn(`[HARDLINE:Guard] Guard process ${this.pid} was not running: ${killed.stderr.trim()}`);
    }
    await executeOrThrow(this.executor, { op: 'removeFile', path: this.paths.script });
  }

  /**
   * Hand the lock back so the deadline can still fire. Without a live guard
   * process nothing will retry, which is a hard failure.
   */
  private async releaseAfterFailedRevert(reason: string): Promise<GuardStatus> {
    try {
      await executeOrThrow(this.executor, { op: 'removeDir', path: this.paths.resolved });
    } catch (error) {
      throw new RevertError(
        this.resource,
        `${reason}; releasing the guard lock also failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const alive = await this.executor.execute({ op: 'run', argv: ['kill', '-0', String(this.pid)] });
    if (alive.exitCode !== 0) {
      throw new RevertError(this.resource, `${reason}; the guard process is gone`);
    }

    console.error(
      `[HARDLINE:Guard] Explicit revert of ${this.resource} failed: ${reason}. ` +
      `Guard ${this.id} stays armed until ${this.deadlineAt}`
    );
    return { outcome: 'pending' };
  }
}
