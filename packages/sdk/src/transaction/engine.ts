/**
 * Config Transaction Engine
 *
 * Changes one managed file on the target so that the change either gets
 * confirmed by an out-of-band check or is reverted to its snapshot. The guard
 * is armed before the live file is touched and cancelled only after the
 * confirmation succeeded.
 */

import { EventEmitter } from 'node:events';
import {
  ApplyError,
  CancelError,
  ConfirmationError,
  executeOrThrow,
  executeSequence,
  generateTransactionId,
  GuardConflictError,
  GuardFailedError,
  HardlineError,
  RemoteCommandError,
  RevertError,
  SnapshotError,
  StageError,
  TransactionStateMachine,
  ValidationError,
  type ConfigSnapshot,
  type GuardDriver,
  type GuardHandle,
  type GuardSpec,
  type GuardStatus,
  type GuardSummary,
  type PendingChange,
  type RemoteExecutor,
  type TransactionEvent,
  type TransactionResult,
  type TransactionState,
} from '@hardline/core';
import { DEFAULT_GUARD } from '../config.js';
import { DEFAULT_FILE_MODE, resolvePaths, type ManagedResource, type ResourcePaths } from './resource.js';

export type ConfirmationResult = { ok: true } | { ok: false; reason: string };

/** Out-of-band check that the target is still usable after the change */
export type ConfirmationCheck = () => Promise<ConfirmationResult>;

export interface ConfigTransactionOptions {
  executor: RemoteExecutor;
  guardDriver: GuardDriver;
  resource: ManagedResource;
  confirm: ConfirmationCheck;
  deadlineSeconds?: number;
  /** Extra wait for a guard that is already reverting */
  graceSeconds?: number;
}

/**
 * Events emitted by ConfigTransaction
 */
export interface ConfigTransactionEvents {
  'transaction:state': (state: TransactionState, result: TransactionResult) => void;
  'guard:armed': (guard: GuardSummary) => void;
  'guard:cancelled': (guard: GuardSummary) => void;
  'transaction:reverted': (result: TransactionResult) => void;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConfigTransaction extends EventEmitter {
  readonly id = generateTransactionId();
  private executor: RemoteExecutor;
  private guardDriver: GuardDriver;
  private resource: ManagedResource;
  private confirm: ConfirmationCheck;
  private deadlineSeconds: number;
  private graceSeconds: number;
  private paths: ResourcePaths;
  private stateMachine = new TransactionStateMachine();
  private result: TransactionResult;
  private snapshot?: ConfigSnapshot;
  private pending?: PendingChange;
  private guard?: GuardHandle;
  private liveMode: string;

  constructor(options: ConfigTransactionOptions) {
    super();
    this.executor = options.executor;
    this.guardDriver = options.guardDriver;
    this.resource = options.resource;
    this.confirm = options.confirm;
    this.deadlineSeconds = options.deadlineSeconds ?? DEFAULT_GUARD.deadlineSeconds;
    this.graceSeconds = options.graceSeconds ?? DEFAULT_GUARD.graceSeconds;
    this.paths = resolvePaths(options.resource);
    this.liveMode = options.resource.mode ?? DEFAULT_FILE_MODE;
    this.result = {
      id: this.id,
      resource: options.resource.name,
      state: 'idle',
      reverted: false,
      timestamps: { idle: new Date().toISOString() },
    };
  }

  getState(): TransactionState {
    return this.stateMachine.getState();
  }

  getPendingChange(): PendingChange | undefined {
    return this.pending;
  }

  /**
   * Run the transaction to a terminal state (or to `applied` with the guard
   * still pending). Failures are reported in the result, never thrown.
   */
  async run(): Promise<TransactionResult> {
    console.log(`[HARDLINE:Transaction] ${this.id} starting for ${this.resource.name} on ${this.executor.description}`);

    // Step 1-4: nothing live changes until the guard is armed
    try {
      const current = await this.takeSnapshot();
      await this.stage(current);
      await this.validate();
      await this.armGuard();
    } catch (error) {
      await this.abort(error);
      return this.result;
    }

    // Step 5: mutate the live file
    try {
      await this.apply();
    } catch (error) {
      await this.handleApplyFailure(error);
      return this.result;
    }

    // Step 6: confirm out of band, then cancel the guard
    await this.confirmOrRevert();
    return this.result;
  }

  private async takeSnapshot(): Promise<string | null> {
    const { livePath, backupPath } = this.paths;
    let current: string | null = null;

    try {
      // test -e exits 1 silently for an absent file; anything else means the check itself failed
      const exists = await this.executor.execute({ op: 'fileExists', path: livePath });
      if (exists.exitCode !== 0 && (exists.exitCode !== 1 || exists.stderr.trim() !== '')) {
        throw new RemoteCommandError(`check ${livePath}`, exists.exitCode, exists.stderr);
      }
      if (exists.exitCode === 0) {
        await executeOrThrow(this.executor, { op: 'copyFile', from: livePath, to: backupPath }, 'backup');
        current = (await executeOrThrow(this.executor, { op: 'readFile', path: livePath })).stdout;
        const mode = await executeOrThrow(this.executor, { op: 'run', argv: ['stat', '-c', '%a', livePath] });
        this.liveMode = mode.stdout.trim() || this.liveMode;
      }
    } catch (error) {
      throw new SnapshotError(this.resource.name, reasonOf(error));
    }

    this.snapshot = {
      livePath,
      backupPath,
      existed: current !== null,
      takenAt: new Date().toISOString(),
    };
    this.result.snapshot = this.snapshot;
    this.transition({ type: 'TAKE_SNAPSHOT' });
    return current;
  }

  private async stage(current: string | null): Promise<void> {
    const content = this.resource.render(current);

    try {
      await executeOrThrow(this.executor, { op: 'writeFile', path: this.paths.stagedPath, content }, 'stage');
    } catch (error) {
      throw new StageError(this.resource.name, reasonOf(error));
    }

    this.pending = { stagedPath: this.paths.stagedPath, content, status: 'untested' };
    this.transition({ type: 'STAGE' });
  }

  private async validate(): Promise<void> {
    if (this.resource.validate) {
      const check = await this.executor.execute(this.resource.validate(this.paths.stagedPath));
      if (check.exitCode !== 0) {
        throw new ValidationError(this.resource.name, check.stderr.trim() || check.stdout);
      }
    }

    if (this.pending) {
      this.pending.status = 'valid';
    }
    this.transition({ type: 'VALIDATE' });
  }

  private async armGuard(): Promise<void> {
    const spec: GuardSpec = {
      transactionId: this.id,
      resource: this.resource.name,
      livePath: this.paths.livePath,
      backupPath: this.paths.backupPath,
      stagedPath: this.paths.stagedPath,
      snapshotExisted: this.snapshot?.existed ?? false,
      activate: this.resource.activate,
      deadlineSeconds: this.deadlineSeconds,
    };

    try {
      this.guard = await this.guardDriver.arm(spec);
    } catch (error) {
      if (error instanceof GuardConflictError || error instanceof GuardFailedError) {
        throw error;
      }
      throw new GuardFailedError(this.resource.name, reasonOf(error));
    }

    const summary = this.guardSummary(this.guard);
    this.result.guard = summary;
    this.transition({ type: 'ARM_GUARD' });
    this.emit('guard:armed', summary);
  }

  private async apply(): Promise<void> {
    const { stagedPath, livePath } = this.paths;

    await executeOrThrow(
      this.executor,
      { op: 'installFile', from: stagedPath, to: livePath, mode: this.liveMode },
      'install',
    );
    if (this.pending) {
      this.pending.status = 'applied';
    }
    this.transition({ type: 'APPLY' });

    await executeOrThrow(this.executor, { op: 'removeFile', path: stagedPath });
    await executeSequence(this.executor, this.resource.activate);
  }

  private async abort(error: unknown): Promise<void> {
    const state = this.getState();
    if (state === 'staged' || state === 'validated') {
      await this.discardStaged();
    }

    this.fail(error instanceof HardlineError ? error : this.errorForState(state, reasonOf(error)));
    this.transition({ type: 'ABORT' });
  }

  private async discardStaged(): Promise<void> {
    try {
      await executeOrThrow(this.executor, { op: 'removeFile', path: this.paths.stagedPath });
    } catch (error) {
      console.warn(`[HARDLINE:Transaction] Could not remove ${this.paths.stagedPath}: ${reasonOf(error)}`);
    }
  }

  private errorForState(state: TransactionState, reason: string): HardlineError {
    switch (state) {
      case 'idle':
        return new SnapshotError(this.resource.name, reason);
      case 'snapshot-taken':
        return new StageError(this.resource.name, reason);
      case 'staged':
        return new ValidationError(this.resource.name, reason);
      default:
        return new GuardFailedError(this.resource.name, reason);
    }
  }

  /**
   * No synchronous revert after a failed apply: the guard owns the rollback.
   */
  private async handleApplyFailure(error: unknown): Promise<void> {
    const guard = this.requireGuard();
    this.fail(new ApplyError(this.resource.name, reasonOf(error), guard.deadlineAt));

    const status = await this.waitForGuard(guard);
    if (status) {
      await this.finishWithGuard(guard, status);
    }
  }

  private async confirmOrRevert(): Promise<void> {
    const guard = this.requireGuard();

    let check: ConfirmationResult;
    try {
      check = await this.confirm();
    } catch (error) {
      check = { ok: false, reason: reasonOf(error) };
    }

    if (check.ok) {
      let status: GuardStatus;
      try {
        status = await guard.cancel();
      } catch (error) {
        this.fail(new CancelError(this.resource.name, reasonOf(error), guard.deadlineAt));
        return;
      }

      if (status.outcome === 'cancelled') {
        this.transition({ type: 'CONFIRM' });
        this.emit('guard:cancelled', this.guardSummary(guard));
        console.log(`[HARDLINE:Transaction] ${this.id} confirmed ${this.resource.name}`);
        return;
      }

      // The deadline won the race: the change is being or has been reverted
      this.fail(new ConfirmationError(this.resource.name, 'the rollback guard fired before the change was confirmed'));
      await this.finishWithGuard(guard, status);
      return;
    }

    console.warn(`[HARDLINE:Transaction] Confirmation of ${this.resource.name} failed: ${check.reason}`);
    let status: GuardStatus;
    try {
      status = await guard.revertNow();
    } catch (error) {
      this.fail(error instanceof RevertError ? error : new RevertError(this.resource.name, reasonOf(error)));
      return;
    }

    if (status.outcome === 'pending') {
      this.fail(new ConfirmationError(
        this.resource.name,
        check.reason,
        `The immediate revert failed; the rollback guard restores the snapshot at ${guard.deadlineAt}`,
      ));
      return;
    }

    this.fail(new ConfirmationError(this.resource.name, check.reason, 'The previous configuration was restored'));
    await this.finishWithGuard(guard, status);
  }

  private async finishWithGuard(guard: GuardHandle, initial: GuardStatus): Promise<void> {
    let status = initial;
    if (status.outcome === 'reverting') {
      const settled = await this.waitForGuard(guard);
      if (!settled) {
        return;
      }
      status = settled;
    }

    if (status.outcome === 'reverted') {
      if (status.claimedBy === 'deadline' || status.claimedBy === 'explicit-revert') {
        this.result.revertedBy = status.claimedBy;
      }
      this.result.reverted = true;
      this.transition({ type: 'REVERT' });
      console.log(`[HARDLINE:Transaction] ${this.id} reverted ${this.resource.name} (by ${status.claimedBy ?? 'guard'})`);
      this.emit('transaction:reverted', this.result);
      return;
    }

    if (status.outcome === 'revert-failed') {
      this.fail(new RevertError(
        this.resource.name,
        'the rollback guard could not restore the snapshot',
        `Inspect ${guard.logPath} and restore ${this.paths.backupPath} from the console`,
      ));
      return;
    }

    console.warn(
      `[HARDLINE:Transaction] Guard ${guard.id} for ${this.resource.name} is still ${status.outcome}; ` +
      `it reverts at ${guard.deadlineAt}`
    );
  }

  /**
   * Wait until the guard settles, bounded by its deadline plus grace.
   * Returns null when its status cannot be read.
   */
  private async waitForGuard(guard: GuardHandle): Promise<GuardStatus | null> {
    try {
      return await guard.awaitOutcome(this.remainingGuardMs(guard));
    } catch (error) {
      console.error(
        `[HARDLINE:Transaction] Cannot read the status of guard ${guard.id}: ${reasonOf(error)}; ` +
        `inspect ${guard.logPath} on the target`
      );
      return null;
    }
  }

  private remainingGuardMs(guard: GuardHandle): number {
    const untilDeadline = Math.max(Date.parse(guard.deadlineAt) - Date.now(), 0);
    return untilDeadline + this.graceSeconds * 1000;
  }

  private requireGuard(): GuardHandle {
    if (!this.guard) {
      throw new Error(`Transaction ${this.id} has no armed guard`);
    }
    return this.guard;
  }

  private guardSummary(guard: GuardHandle): GuardSummary {
    return { id: guard.id, deadlineAt: guard.deadlineAt, logPath: guard.logPath };
  }

  private fail(error: HardlineError): void {
    this.result.error = error.toErrorMessage();
    console.error(`[HARDLINE:Transaction] ${this.id}: ${error.message}`);
  }

  private transition(event: TransactionEvent): void {
    const result = this.stateMachine.transition(event);
    if (!result.success) {
      throw new Error(`[HARDLINE:Transaction] State transition failed: ${result.error}`);
    }
    this.result.state = result.newState;
    this.result.timestamps[result.newState] = new Date().toISOString();
    this.emit('transaction:state', result.newState, this.result);
  }
}
