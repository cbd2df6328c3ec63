import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));
// src/policies and dist/policies both sit two levels below the package root
const PAYLOAD_DIR = join(__dirname, '..', '..', 'payloads');

export const PAYLOAD_FILES = [
  'sshd-hardening.conf',
  'jail.local',
  '99-security.conf',
  '10-hardening.conf',
  'audit.rules',
  '20auto-upgrades',
  '50unattended-upgrades',
] as const;

export type PayloadName = typeof PAYLOAD_FILES[number];

export function loadPayload(name: PayloadName): string {
  return readFileSync(join(PAYLOAD_DIR, name), 'utf-8');
}
