/**
 * @hardline/transport-local
 *
 * Executor for the machine hardline runs on
 */

export { LocalExecutor, defaultLocalSudoMode } from './local-executor.js';
export type { LocalExecutorConfig } from './types.js';
