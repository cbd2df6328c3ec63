/**
 * ID Generation Utilities
 */

import { randomBytes } from 'node:crypto';

function randomHex(length: number): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
}

/** e.g. "txn_a1b2c3d4e5f6" */
export function generateTransactionId(): string {
  return `txn_${randomHex(12)}`;
}

/** e.g. "grd_a1b2c3d4" */
export function generateGuardId(): string {
  return `grd_${randomHex(8)}`;
}

/**
 * Random secret suitable for chpasswd (base64, no colon or newline).
 */
export function generateSecret(bytes: number = 32): string {
  return randomBytes(bytes).toString('base64');
}
