export { buildRevertPlan } from './revert-plan.js';
export { guardPaths, type GuardPaths } from './paths.js';
export { renderGuardScript, type GuardScriptParams } from './guard-script.js';
export { ScriptGuardDriver, ScriptGuardHandle, type ScriptGuardOptions } from './script-guard.js';
export { InProcessGuardDriver, InProcessGuardHandle } from './in-process-guard.js';
