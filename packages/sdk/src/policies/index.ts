export { loadPayload, PAYLOAD_FILES, type PayloadName } from './payloads.js';
export {
  renderManagedBlock,
  stripManagedBlock,
  prependManagedBlock,
  appendManagedBlock,
  type CommentPrefix,
} from './managed-block.js';
export {
  sshdResource,
  fail2banResource,
  sysctlResource,
  rsyslogResource,
  auditdResource,
  autoUpgradesResources,
} from './resources.js';
export {
  STEP_PACKAGES,
  packagesFor,
  packageActions,
  firewallActions,
  rootPasswordActions,
} from './commands.js';
