export {
  ensureIdentity,
  sudoersLine,
  DEFAULT_STAGING_DIR,
  SUDOERS_DIR,
  type EnsureIdentityOptions,
  type IdentityState,
  type BootstrapStep,
} from './identity.js';
