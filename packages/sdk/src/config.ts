/**
 * Hardline Workflow Configuration
 */

import type {
  GuardDriver,
  RemoteExecutor,
  TargetEndpoint,
  TransactionResult,
} from '@hardline/core';

// ========== Steps ==========

export const HARDEN_STEPS = [
  'probe',
  'bootstrap',
  'root-password',
  'packages',
  'firewall',
  'auto-upgrades',
  'fail2ban',
  'rsyslog',
  'auditd',
  'sysctl',
  'sshd',
] as const;

export type HardenStep = typeof HARDEN_STEPS[number];

/** Steps every run needs; they cannot be skipped */
export const REQUIRED_STEPS: readonly HardenStep[] = ['probe', 'bootstrap'];

export function isHardenStep(value: string): value is HardenStep {
  return HARDEN_STEPS.some((step) => step === value);
}

// ========== Target & Identity ==========

export interface TargetConfig {
  host: string;
  port?: number;
  /** Existing account with sudo rights, reached by password */
  bootstrapUser: string;
  bootstrapPassword: string;
}

export interface IdentityConfig {
  username?: string;
  password: string;
  /** authorized_keys content for the identity */
  publicKey: string;
  /** Private key used for every login as the identity */
  identityFile: string;
  shell?: string;
}

// ========== Guard ==========

export interface GuardConfig {
  /** Seconds until an unconfirmed change is reverted */
  deadlineSeconds?: number;
  /** Directory on the target holding one guard directory per resource */
  stateDir?: string;
  /** How often outcome files are read while waiting for a guard */
  pollIntervalMs?: number;
  /** Extra seconds granted to a firing guard before giving up on it */
  graceSeconds?: number;
}

// ========== Hooks ==========

export interface HardenHooks {
  onStepStarted?: (step: HardenStep) => void;
  onStepCompleted?: (step: HardenStep) => void;
  onStepSkipped?: (step: HardenStep) => void;
  onTransactionCompleted?: (result: TransactionResult) => void;
  onWarning?: (message: string) => void;
  onError?: (step: HardenStep, error: Error) => void;
}

// ========== Config ==========

export type ExecutorFactory = (endpoint: TargetEndpoint) => RemoteExecutor;

export interface HardenConfig {
  target: TargetConfig;
  identity: IdentityConfig;
  /** Executor used for every change on the target */
  connect: ExecutorFactory;
  /** Executor used for probes and confirmations (default: connect) */
  connectProbe?: ExecutorFactory;
  /** Guard driver for an executor (default: detached script guard) */
  guardDriver?: (executor: RemoteExecutor) => GuardDriver;
  guard?: GuardConfig;
  /** Timeout for apt-get runs in ms */
  packageTimeoutMs?: number;
  skip?: HardenStep[];
  hooks?: HardenHooks;
}

// ========== Defaults ==========

export const DEFAULT_GUARD = {
  deadlineSeconds: 120,
  stateDir: '/var/lib/hardline/guards',
  pollIntervalMs: 5000,
  graceSeconds: 30,
} as const;

export const DEFAULT_IDENTITY = {
  username: 'operator',
  shell: '/bin/bash',
} as const;

export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_PACKAGE_TIMEOUT_MS = 15 * 60 * 1000;   // 15 minutes

// ========== Resolved ==========

export interface ResolvedHardenConfig {
  target: Required<TargetConfig>;
  identity: Required<IdentityConfig>;
  connect: ExecutorFactory;
  connectProbe: ExecutorFactory;
  guardDriver?: (executor: RemoteExecutor) => GuardDriver;
  guard: Required<GuardConfig>;
  packageTimeoutMs: number;
  skip: Set<HardenStep>;
  hooks: HardenHooks;
}

export function resolveHardenConfig(config: HardenConfig): ResolvedHardenConfig {
  const skip = new Set(config.skip ?? []);
  for (const step of REQUIRED_STEPS) {
    skip.delete(step);
  }

  return {
    target: {
      host: config.target.host,
      port: config.target.port ?? DEFAULT_SSH_PORT,
      bootstrapUser: config.target.bootstrapUser,
      bootstrapPassword: config.target.bootstrapPassword,
    },
    identity: {
      username: config.identity.username ?? DEFAULT_IDENTITY.username,
      password: config.identity.password,
      publicKey: config.identity.publicKey,
      identityFile: config.identity.identityFile,
      shell: config.identity.shell ?? DEFAULT_IDENTITY.shell,
    },
    connect: config.connect,
    connectProbe: config.connectProbe ?? config.connect,
    guardDriver: config.guardDriver,
    guard: {
      deadlineSeconds: config.guard?.deadlineSeconds ?? DEFAULT_GUARD.deadlineSeconds,
      stateDir: config.guard?.stateDir ?? DEFAULT_GUARD.stateDir,
      pollIntervalMs: config.guard?.pollIntervalMs ?? DEFAULT_GUARD.pollIntervalMs,
      graceSeconds: config.guard?.graceSeconds ?? DEFAULT_GUARD.graceSeconds,
    },
    packageTimeoutMs: config.packageTimeoutMs ?? DEFAULT_PACKAGE_TIMEOUT_MS,
    skip,
    hooks: config.hooks ?? {},
  };
}
