export { GuardResolution } from './resolution.js';
export { formatGuardOutcome, parseGuardOutcome } from './outcome-file.js';
