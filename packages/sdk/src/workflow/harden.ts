/**
 * Hardening Workflow
 *
 * Probe, bootstrap, command payloads, then one guarded transaction per
 * managed file with the SSH daemon last. Every transaction is confirmed by a
 * fresh key-only login as the managed identity.
 */

import {
  ErrorCodes,
  executeSequence,
  exitCodeFor,
  HardlineError,
  PreconditionError,
  type GuardDriver,
  type RemoteExecutor,
  type TargetEndpoint,
  type TransactionResult,
} from '@hardline/core';
import { ensureIdentity } from '../bootstrap/identity.js';
import {
  HARDEN_STEPS,
  resolveHardenConfig,
  type HardenConfig,
  type HardenStep,
  type ResolvedHardenConfig,
} from '../config.js';
import { ScriptGuardDriver } from '../guard/script-guard.js';
import {
  firewallActions,
  packageActions,
  packagesFor,
  rootPasswordActions,
} from '../policies/commands.js';
import {
  auditdResource,
  autoUpgradesResources,
  fail2banResource,
  rsyslogResource,
  sshdResource,
  sysctlResource,
} from '../policies/resources.js';
import { assertReachable, verifyKeyLogin } from '../probe/connectivity.js';
import { ConfigTransaction, type ConfirmationCheck } from '../transaction/engine.js';
import type { ManagedResource } from '../transaction/resource.js';
import type { HardenReport, StepRecord } from './report.js';

const PUBLIC_KEY_PATTERN = /^(ssh-(ed25519|rsa|dss)|ecdsa-sha2-\S+|sk-\S+)\s+\S+/;

/** File steps in the order they run; sshd stays last */
const FILE_STEPS: ReadonlyArray<[HardenStep, () => ManagedResource[]]> = [
  ['auto-upgrades', autoUpgradesResources],
  ['fail2ban', () => [fail2banResource()]],
  ['rsyslog', () => [rsyslogResource()]],
  ['auditd', () => [auditdResource()]],
  ['sysctl', () => [sysctlResource()]],
  ['sshd', () => [sshdResource()]],
];

export class HardenWorkflow {
  private config: ResolvedHardenConfig;
  private report: HardenReport;

  constructor(config: HardenConfig) {
    this.config = resolveHardenConfig(config);
    this.report = {
      endpoint: { host: this.config.target.host, port: this.config.target.port },
      identity: this.config.identity.username,
      steps: [],
      transactions: [],
      warnings: [],
      startedAt: new Date().toISOString(),
      exitCode: 0,
    };
  }

  /**
   * Run every step not skipped. Stops at the first failure; the report is
   * returned either way.
   */
  async run(): Promise<HardenReport> {
    const { target, identity } = this.config;

    const bootstrapEndpoint: TargetEndpoint = {
      host: target.host,
      port: target.port,
      user: target.bootstrapUser,
      credential: { type: 'password', password: target.bootstrapPassword },
    };
    const managedEndpoint: TargetEndpoint = {
      host: target.host,
      port: target.port,
      user: identity.username,
      credential: { type: 'key', identityFile: identity.identityFile },
    };

    try {
      this.checkPreconditions();
      console.log(`[HARDLINE:Workflow] Hardening ${target.host}:${target.port}`);

      let admin = this.config.connect(bootstrapEndpoint);
      const confirmer = this.config.connectProbe(managedEndpoint);

      await this.runStep('probe', () => assertReachable(this.config.connectProbe(bootstrapEndpoint)));

      await this.runStep('bootstrap', async () => {
        await ensureIdentity(admin, {
          username: identity.username,
          password: identity.password,
          publicKey: identity.publicKey,
          shell: identity.shell,
        });

        const login = await verifyKeyLogin(confirmer);
        if (login.status === 'reachable') {
          admin = this.config.connect(managedEndpoint);
          console.log(`[HARDLINE:Workflow] Continuing as ${identity.username} with key authentication`);
        } else {
          this.warn(
            `Key login as ${identity.username} failed (${login.status}${login.detail ? `: ${login.detail}` : ''}); ` +
            `continuing as ${target.bootstrapUser}`
          );
        }
      });

      const guardDriver = this.createGuardDriver(admin);
      const confirm: ConfirmationCheck = async () => {
        const login = await verifyKeyLogin(confirmer);
        return login.status === 'reachable'
          ? { ok: true }
          : { ok: false, reason: `key login as ${identity.username} ${login.status}${login.detail ? `: ${login.detail}` : ''}` };
      };

      await this.runStep('root-password', () => executeSequence(admin, rootPasswordActions()));
      await this.runStep('packages', () =>
        executeSequence(
          admin,
          packageActions(packagesFor(this.enabledSteps())),
          { timeoutMs: this.config.packageTimeoutMs },
        ),
      );
      await this.runStep('firewall', () => executeSequence(admin, firewallActions(target.port)));

      for (const [step, resources] of FILE_STEPS) {
        await this.runStep(step, async () => {
          for (const resource of resources()) {
            await this.transact(admin, guardDriver, resource, confirm);
          }
        });
      }
    } catch (error) {
      this.report.error = error instanceof HardlineError
        ? error.toErrorMessage()
        : { code: ErrorCodes.COMMAND_FAILED, message: error instanceof Error ? error.message : String(error) };
      this.report.exitCode = exitCodeFor(error);
    }

    this.report.finishedAt = new Date().toISOString();
    return this.report;
  }

  private checkPreconditions(): void {
    const { target, identity } = this.config;
    if (!target.host) {
      throw new PreconditionError('No target host given');
    }
    if (!Number.isInteger(target.port) || target.port < 1 || target.port > 65535) {
      throw new PreconditionError(`Invalid SSH port: ${target.port}`);
    }
    if (!PUBLIC_KEY_PATTERN.test(identity.publicKey.trim())) {
      throw new PreconditionError(
        'The public key is not in OpenSSH format',
        'Pass the .pub file, e.g. ~/.ssh/id_ed25519.pub',
      );
    }
    if (identity.publicKey.trim().includes('\n')) {
      throw new PreconditionError('The public key file must hold exactly one key');
    }
  }

  private createGuardDriver(executor: RemoteExecutor): GuardDriver {
    if (this.config.guardDriver) {
      return this.config.guardDriver(executor);
    }
    return new ScriptGuardDriver(executor, {
      stateDir: this.config.guard.stateDir,
      pollIntervalMs: this.config.guard.pollIntervalMs,
    });
  }

  private async transact(
    executor: RemoteExecutor,
    guardDriver: GuardDriver,
    resource: ManagedResource,
    confirm: ConfirmationCheck,
  ): Promise<TransactionResult> {
    const transaction = new ConfigTransaction({
      executor,
      guardDriver,
      resource,
      confirm,
      deadlineSeconds: this.config.guard.deadlineSeconds,
      graceSeconds: this.config.guard.graceSeconds,
    });
    const result = await transaction.run();
    this.report.transactions.push(result);
    this.config.hooks.onTransactionCompleted?.(result);

    if (result.state !== 'confirmed') {
      throw new HardlineError(
        result.error?.code ?? ErrorCodes.CONFIRMATION_FAILED,
        result.error?.message ?? `${resource.name} ended ${result.state}`,
        result.error?.hint,
        resource.name,
      );
    }
    return result;
  }

  private enabledSteps(): HardenStep[] {
    return HARDEN_STEPS.filter((step) => !this.config.skip.has(step));
  }

  private async runStep(step: HardenStep, fn: () => Promise<void>): Promise<void> {
    const { hooks } = this.config;

    if (this.config.skip.has(step)) {
      this.report.steps.push({ step, status: 'skipped' });
      hooks.onStepSkipped?.(step);
      console.log(`[HARDLINE:Workflow] Skipping ${step}`);
      return;
    }

    const record: StepRecord = { step, status: 'completed', startedAt: new Date().toISOString() };
    this.report.steps.push(record);
    hooks.onStepStarted?.(step);
    console.log(`[HARDLINE:Workflow] ${step}...`);

    try {
      await fn();
    } catch (error) {
      record.status = 'failed';
      record.detail = error instanceof Error ? error.message : String(error);
      record.finishedAt = new Date().toISOString();
      hooks.onError?.(step, error instanceof Error ? error : new Error(String(error)));
      throw error;
    }

    record.finishedAt = new Date().toISOString();
    hooks.onStepCompleted?.(step);
  }

  private warn(message: string): void {
    this.report.warnings.push(message);
    this.config.hooks.onWarning?.(message);
    console.warn(`[HARDLINE:Workflow] ${message}`);
  }
}
