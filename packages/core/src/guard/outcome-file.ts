/**
 * Guard outcome record
 *
 * Script guards persist their resolution on the target as one line,
 * "<claim> <outcome>", inside the lock directory.
 */

import type { GuardClaim, GuardOutcome, GuardStatus } from '../types/guard.js';

const CLAIMS: readonly GuardClaim[] = ['cancel', 'deadline', 'explicit-revert'];
const OUTCOMES: readonly GuardOutcome[] = ['pending', 'cancelled', 'reverting', 'reverted', 'revert-failed'];

export function formatGuardOutcome(claim: GuardClaim, outcome: GuardOutcome): string {
  return `${claim} ${outcome}\n`;
}

/**
 * Parse an outcome record. `null` means no lock exists yet. Unrecognised
 * content means the lock was taken but the winner has not written its line.
 */
export function parseGuardOutcome(content: string | null): GuardStatus {
  if (content === null) {
    return { outcome: 'pending' };
  }

  const [claim, outcome] = content.trim().split(/\s+/);
  const knownClaim = CLAIMS.find((c) => c === claim);
  const knownOutcome = OUTCOMES.find((o) => o === outcome);

  if (!knownClaim || !knownOutcome) {
    return { outcome: 'reverting' };
  }
  return { outcome: knownOutcome, claimedBy: knownClaim };
}
