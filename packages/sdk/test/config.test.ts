import { describe, it, expect } from 'vitest';
import {
  DEFAULT_GUARD,
  DEFAULT_PACKAGE_TIMEOUT_MS,
  isHardenStep,
  resolveHardenConfig,
  type HardenConfig,
} from '../src/config.js';
import { FakeExecutor } from './helpers/fake-executor.js';

function config(overrides: Partial<HardenConfig> = {}): HardenConfig {
  const executor = new FakeExecutor();
  return {
    target: { host: '192.0.2.10', bootstrapUser: 'admin', bootstrapPassword: 'test-secret' },
    identity: { password: 'test-secret', publicKey: 'ssh-ed25519 AAAATEST test', identityFile: '/tmp/id_ed25519' },
    connect: () => executor,
    ...overrides,
  };
}

describe('resolveHardenConfig', () => {
  it('should fill in defaults', () => {
    const resolved = resolveHardenConfig(config());

    expect(resolved.target.port).toBe(22);
    expect(resolved.identity.username).toBe('operator');
    expect(resolved.identity.shell).toBe('/bin/bash');
    expect(resolved.guard).toEqual(DEFAULT_GUARD);
    expect(resolved.packageTimeoutMs).toBe(DEFAULT_PACKAGE_TIMEOUT_MS);
    expect(resolved.connectProbe).toBe(resolved.connect);
    expect(resolved.hooks).toEqual({});
  });

  it('should keep explicit guard settings', () => {
    const resolved = resolveHardenConfig(config({ guard: { deadlineSeconds: 30 } }));

    expect(resolved.guard.deadlineSeconds).toBe(30);
    expect(resolved.guard.stateDir).toBe('/var/lib/hardline/guards');
  });

  it('should never skip the required steps', () => {
    const resolved = resolveHardenConfig(config({ skip: ['probe', 'bootstrap', 'sysctl'] }));

    expect([...resolved.skip]).toEqual(['sysctl']);
  });
});

describe('isHardenStep', () => {
  it('should accept known steps only', () => {
    expect(isHardenStep('auto-upgrades')).toBe(true);
    expect(isHardenStep('kernel')).toBe(false);
  });
});
