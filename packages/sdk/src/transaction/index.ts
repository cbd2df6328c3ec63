export {
  ConfigTransaction,
  type ConfigTransactionOptions,
  type ConfigTransactionEvents,
  type ConfirmationCheck,
  type ConfirmationResult,
} from './engine.js';
export { resolvePaths, DEFAULT_FILE_MODE, type ManagedResource, type ResourcePaths } from './resource.js';
