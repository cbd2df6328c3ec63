/**
 * In-process guard
 *
 * Timer-based guard for embedding callers and tests. It resolves through the
 * same single-winner primitive as the script guard and replays the same
 * revert plan, but lives only as long as this process.
 */

import {
  executeSequence,
  generateGuardId,
  GuardConflictError,
  GuardResolution,
  isSettledOutcome,
  RevertError,
  type GuardDriver,
  type GuardHandle,
  type GuardSpec,
  type GuardStatus,
  type RemoteExecutor,
} from '@hardline/core';
import { buildRevertPlan } from './revert-plan.js';

export class InProcessGuardDriver implements GuardDriver {
  readonly kind = 'in-process';
  private executor: RemoteExecutor;
  private active = new Map<string, InProcessGuardHandle>();

  constructor(executor: RemoteExecutor) {
    this.executor = executor;
  }

  async arm(spec: GuardSpec): Promise<GuardHandle> {
    const existing = this.active.get(spec.resource);
    if (existing) {
      throw new GuardConflictError(spec.resource, existing.id);
    }

    const handle = new InProcessGuardHandle(spec, this.executor, () => {
      if (this.active.get(spec.resource) === handle) {
        this.active.delete(spec.resource);
      }
    });
    this.active.set(spec.resource, handle);
    console.log(`[HARDLINE:Guard] Armed ${handle.id} for ${spec.resource} (reverts at ${handle.deadlineAt})`);
    return handle;
  }

  /** Guards not yet resolved, by resource */
  activeResources(): string[] {
    return [...this.active.keys()];
  }
}

export class InProcessGuardHandle implements GuardHandle {
  readonly id = generateGuardId();
  readonly resource: string;
  readonly deadlineAt: string;
  readonly logPath: string;
  private deadlineMs: number;
  private resolution = new GuardResolution();
  private timer: ReturnType<typeof setTimeout>;

  constructor(
    private spec: GuardSpec,
    private executor: RemoteExecutor,
    private onSettled: () => void,
  ) {
    this.resource = spec.resource;
    this.deadlineMs = Date.now() + spec.deadlineSeconds * 1000;
    this.deadlineAt = new Date(this.deadlineMs).toISOString();
    this.logPath = `in-process:${this.id}`;
    this.timer = setTimeout(() => {
      this.fire().catch((error) => {
        console.error(`[HARDLINE:Guard] ${this.id} failed to fire:`, error);
      });
    }, spec.deadlineSeconds * 1000);
  }

  async status(): Promise<GuardStatus> {
    return this.resolution.status();
  }

  async cancel(): Promise<GuardStatus> {
    if (!this.resolution.claim('cancel')) {
      return this.resolution.status();
    }
    clearTimeout(this.timer);
    this.resolution.settle('cancelled');
    this.onSettled();
    console.log(`[HARDLINE:Guard] Cancelled ${this.id} for ${this.resource}`);
    return this.resolution.status();
  }

  async revertNow(): Promise<GuardStatus> {
    if (!this.resolution.claim('explicit-revert')) {
      return this.resolution.status();
    }

    try {
      await executeSequence(this.executor, buildRevertPlan(this.spec));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.resolution.release('explicit-revert');
      if (Date.now() >= this.deadlineMs) {
        this.onSettled();
        throw new RevertError(this.resource, `${reason}; the guard deadline has already passed`);
      }
      console.error(
        `[HARDLINE:Guard] Explicit revert of ${this.resource} failed: ${reason}. ` +
        `Guard ${this.id} stays armed until ${this.deadlineAt}`
      );
      return this.resolution.status();
    }

    clearTimeout(this.timer);
    this.resolution.settle('reverted');
    this.onSettled();
    return this.resolution.status();
  }

  awaitOutcome(timeoutMs: number): Promise<GuardStatus> {
    const current = this.resolution.status();
    if (isSettledOutcome(current.outcome)) {
      return Promise.resolve(current);
    }

    return new Promise<GuardStatus>((resolve) => {
      const timeout = setTimeout(() => {
        unsubscribe();
        resolve(this.resolution.status());
      }, timeoutMs);
      const unsubscribe = this.resolution.onChange((status) => {
        if (isSettledOutcome(status.outcome)) {
          clearTimeout(timeout);
          unsubscribe();
          resolve(status);
        }
      });
    });
  }

  private async fire(): Promise<void> {
    if (!this.resolution.claim('deadline')) {
      return;
    }
    console.log(`[HARDLINE:Guard] Deadline reached without confirmation, reverting ${this.resource}`);

    try {
      await executeSequence(this.executor, buildRevertPlan(this.spec));
      this.resolution.settle('reverted');
      console.log(`[HARDLINE:Guard] Reverted ${this.resource} to its snapshot`);
    } catch (error) {
      this.resolution.settle('revert-failed');
      console.error(
        `[HARDLINE:Guard] REVERT FAILED for ${this.resource}: ` +
        `${error instanceof Error ? error.message : String(error)}; manual console intervention required`
      );
    } finally {
      this.onSettled();
    }
  }
}
