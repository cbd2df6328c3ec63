import type { GuardClaim, GuardOutcome, GuardStatus } from '../types/guard.js';

/**
 * Single-winner resolution of a guard.
 *
 * Cancellation, the deadline and an explicit revert all race to `claim()`.
 * Exactly one claim succeeds; losers observe the winner's status. A winner
 * that could not finish its revert may `release()` so the deadline still fires.
 */
export class GuardResolution {
  private claimedBy: GuardClaim | null = null;
  private outcome: GuardOutcome = 'pending';
  private listeners: Array<(status: GuardStatus) => void> = [];

  claim(by: GuardClaim): boolean {
    if (this.claimedBy !== null) {
      return false;
    }
    this.claimedBy = by;
    this.outcome = by === 'cancel' ? 'cancelled' : 'reverting';
    this.notify();
    return true;
  }

  /**
   * Record the final outcome of the current claim.
   */
  settle(outcome: Extract<GuardOutcome, 'cancelled' | 'reverted' | 'revert-failed'>): void {
    if (this.claimedBy === null) {
      throw new Error('Cannot settle an unclaimed guard');
    }
    this.outcome = outcome;
    this.notify();
  }

  release(by: GuardClaim): void {
    if (this.claimedBy !== by) {
      throw new Error(`Guard is not claimed by ${by}`);
    }
    this.claimedBy = null;
    this.outcome = 'pending';
    this.notify();
  }

  isClaimed(): boolean {
    return this.claimedBy !== null;
  }

  status(): GuardStatus {
    return this.claimedBy === null
      ? { outcome: this.outcome }
      : { outcome: this.outcome, claimedBy: this.claimedBy };
  }

  onChange(listener: (status: GuardStatus) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private notify(): void {
    const status = this.status();
    for (const listener of [...this.listeners]) {
      listener(status);
    }
  }
}
