export { HardenWorkflow } from './harden.js';
export {
  formatSummary,
  restoreCommand,
  type HardenReport,
  type StepRecord,
  type StepStatus,
} from './report.js';
