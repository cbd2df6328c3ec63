/**
 * @hardline/sdk
 *
 * Guarded configuration transactions and the hardening workflow built on them
 */

// Configuration
export {
  HARDEN_STEPS,
  REQUIRED_STEPS,
  DEFAULT_GUARD,
  DEFAULT_IDENTITY,
  DEFAULT_SSH_PORT,
  DEFAULT_PACKAGE_TIMEOUT_MS,
  isHardenStep,
  resolveHardenConfig,
  type HardenStep,
  type HardenConfig,
  type HardenHooks,
  type TargetConfig,
  type IdentityConfig,
  type GuardConfig,
  type ExecutorFactory,
  type ResolvedHardenConfig,
} from './config.js';

// Connectivity
export * from './probe/index.js';

// Bootstrap
export * from './bootstrap/index.js';

// Transactions
export * from './transaction/index.js';

// Guards
export * from './guard/index.js';

// Policies
export * from './policies/index.js';

// Workflow
export * from './workflow/index.js';
