/**
 * Rollback guard script
 *
 * Renders the POSIX sh program that runs detached on the target. It sleeps
 * until the deadline, claims the resolution lock and replays the revert plan.
 * The script needs nothing but sh, mkdir, date and the plan's own commands.
 */

import {
  compileAction,
  describeAction,
  formatGuardOutcome,
  quoteArg,
  quoteArgv,
  type GuardSpec,
  type RemoteAction,
} from '@hardline/core';
import { buildRevertPlan } from './revert-plan.js';
import type { GuardPaths } from './paths.js';

export interface GuardScriptParams {
  guardId: string;
  spec: GuardSpec;
  paths: GuardPaths;
  deadlineAt: string;
}

function renderStep(action: RemoteAction): string {
  const { argv, stdin } = compileAction(action);
  const command = quoteArgv(argv);
  const line = stdin === undefined ? command : `printf '%s' ${quoteArg(stdin)} | ${command}`;
  return `${line} || fail ${quoteArg(describeAction(action))}`;
}

function writeOutcome(paths: GuardPaths, content: string): string {
  return `printf '%s' ${quoteArg(content)} > ${quoteArg(paths.outcome)}`;
}

export function renderGuardScript(params: GuardScriptParams): string {
  const { guardId, spec, paths, deadlineAt } = params;
  const resource = quoteArg(spec.resource);

  return [
    '#!/bin/sh',
    `# hardline rollback guard ${guardId} for ${spec.resource} (transaction ${spec.transactionId})`,
    '',
    'log() {',
    `  echo "$(date -u '+%Y-%m-%dT%H:%M:%SZ') [${guardId}] $*"`,
    '}',
    '',
    'fail() {',
    `  log "REVERT FAILED for "${resource}" at step: $1; manual console intervention required"`,
    `  ${writeOutcome(paths, formatGuardOutcome('deadline', 'revert-failed'))}`,
    '  exit 1',
    '}',
    '',
    `echo $$ > ${quoteArg(paths.pid)}`,
    `log "armed, reverting "${resource}" at ${deadlineAt} unless cancelled"`,
    `sleep ${spec.deadlineSeconds}`,
    '',
    `if ! mkdir ${quoteArg(paths.resolved)} 2>/dev/null; then`,
    `  log "already resolved: $(cat ${quoteArg(paths.outcome)} 2>/dev/null)"`,
    '  exit 0',
    'fi',
    writeOutcome(paths, formatGuardOutcome('deadline', 'reverting')),
    `log "deadline reached without confirmation, reverting "${resource}`,
    '',
    ...buildRevertPlan(spec).map(renderStep),
    '',
    writeOutcome(paths, formatGuardOutcome('deadline', 'reverted')),
    `log "reverted "${resource}" to its snapshot"`,
    `rm -f ${quoteArg(paths.script)}`,
    '',
  ].join('\n');
}
