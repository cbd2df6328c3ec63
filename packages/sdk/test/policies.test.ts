/**
 * Policy Payload Tests
 */

import { describe, it, expect } from 'vitest';
import {
  appendManagedBlock,
  prependManagedBlock,
  renderManagedBlock,
  stripManagedBlock,
} from '../src/policies/managed-block.js';
import { loadPayload, PAYLOAD_FILES } from '../src/policies/payloads.js';
import {
  auditdResource,
  autoUpgradesResources,
  fail2banResource,
  rsyslogResource,
  sshdResource,
  sysctlResource,
} from '../src/policies/resources.js';
import {
  firewallActions,
  packageActions,
  packagesFor,
  rootPasswordActions,
} from '../src/policies/commands.js';

describe('managed blocks', () => {
  it('should wrap the body in markers', () => {
    expect(renderManagedBlock('PermitRootLogin no')).toBe(
      '# BEGIN hardline managed block\nPermitRootLogin no\n# END hardline managed block\n',
    );
  });

  it('should put the block first and keep the rest of the file', () => {
    expect(prependManagedBlock('Port 22\n', 'PermitRootLogin no\n')).toBe(
      '# BEGIN hardline managed block\nPermitRootLogin no\n# END hardline managed block\nPort 22\n',
    );
  });

  it('should replace a previous block', () => {
    const once = prependManagedBlock('Port 22\n', 'PermitRootLogin no\n');
    const twice = prependManagedBlock(once, 'PermitRootLogin no\n');

    expect(twice).toBe(once);
  });

  it('should append with the comment style of the file', () => {
    expect(appendManagedBlock('Unattended-Upgrade::Mail "root";', 'X "1";\n', '//')).toBe(
      'Unattended-Upgrade::Mail "root";\n// BEGIN hardline managed block\nX "1";\n// END hardline managed block\n',
    );
  });

  it('should leave an unterminated block alone', () => {
    const content = '# BEGIN hardline managed block\nPort 2222\n';
    expect(stripManagedBlock(content)).toBe(content);
  });

  it('should handle an absent file', () => {
    expect(prependManagedBlock(null, 'A yes\n')).toBe(
      '# BEGIN hardline managed block\nA yes\n# END hardline managed block\n',
    );
  });
});

describe('payloads', () => {
  it('should load every payload file', () => {
    for (const name of PAYLOAD_FILES) {
      expect(loadPayload(name).length).toBeGreaterThan(0);
    }
  });

  it('should disable password and root logins', () => {
    const lines = loadPayload('sshd-hardening.conf').split('\n');

    expect(lines).toContain('PermitRootLogin no');
    expect(lines).toContain('PasswordAuthentication no');
    expect(lines).toContain('PubkeyAuthentication yes');
  });
});

describe('resources', () => {
  it('should validate sshd_config with sshd itself and restart ssh', () => {
    const sshd = sshdResource();

    expect(sshd.livePath).toBe('/etc/ssh/sshd_config');
    expect(sshd.validate?.('/etc/ssh/sshd_config.pending')).toEqual({
      op: 'run',
      argv: ['sshd', '-t', '-f', '/etc/ssh/sshd_config.pending'],
    });
    expect(sshd.activate).toEqual([{ op: 'restartService', service: 'ssh' }]);
  });

  it('should keep the distribution sshd settings after the managed block', () => {
    const rendered = sshdResource().render('Include /etc/ssh/sshd_config.d/*.conf\nPort 22\n');

    expect(rendered.startsWith('# BEGIN hardline managed block\n')).toBe(true);
    expect(rendered.endsWith('# END hardline managed block\nInclude /etc/ssh/sshd_config.d/*.conf\nPort 22\n')).toBe(true);
  });

  it('should check rsyslog rules before applying them', () => {
    expect(rsyslogResource().validate?.('/tmp/x')).toEqual({ op: 'run', argv: ['rsyslogd', '-N1', '-f', '/tmp/x'] });
  });

  it('should activate the kernel parameters from the live file', () => {
    expect(sysctlResource().activate).toEqual([
      { op: 'run', argv: ['sysctl', '-p', '/etc/sysctl.d/99-security.conf'] },
    ]);
  });

  it('should restart auditd through its init script', () => {
    expect(auditdResource().activate).toEqual([{ op: 'run', argv: ['service', 'auditd', 'restart'] }]);
  });

  it('should enable fail2ban before restarting it', () => {
    expect(fail2banResource().activate).toEqual([
      { op: 'run', argv: ['systemctl', 'enable', 'fail2ban'] },
      { op: 'restartService', service: 'fail2ban' },
    ]);
  });

  it('should append the origins to 50unattended-upgrades with apt comments', () => {
    const [periodic, origins] = autoUpgradesResources();

    expect(periodic?.livePath).toBe('/etc/apt/apt.conf.d/20auto-upgrades');
    expect(origins?.livePath).toBe('/etc/apt/apt.conf.d/50unattended-upgrades');
    expect(origins?.render('// distribution defaults\n').startsWith('// distribution defaults\n// BEGIN hardline managed block\n')).toBe(true);
  });
});

describe('command payloads', () => {
  it('should collect the packages of the enabled steps once', () => {
    expect(packagesFor(['probe', 'firewall', 'auto-upgrades', 'sshd'])).toEqual([
      'ufw',
      'unattended-upgrades',
      'apt-listchanges',
    ]);
  });

  it('should install non-interactively after an update', () => {
    expect(packageActions(['ufw'])).toEqual([
      { op: 'run', argv: ['apt-get', 'update'] },
      { op: 'run', argv: ['env', 'DEBIAN_FRONTEND=noninteractive', 'apt-get', 'install', '-y', 'ufw'] },
    ]);
    expect(packageActions([])).toEqual([]);
  });

  it('should open the configured ssh port', () => {
    const actions = firewallActions(2222);

    expect(actions).toContainEqual({ op: 'run', argv: ['ufw', 'allow', '2222/tcp'] });
    expect(actions[actions.length - 1]).toEqual({ op: 'run', argv: ['ufw', '--force', 'enable'] });
  });

  it('should feed the root password on stdin', () => {
    expect(rootPasswordActions('test-secret')).toEqual([
      { op: 'run', argv: ['chpasswd'], stdin: 'root:test-secret\n' },
    ]);
  });

  it('should generate a fresh root password by default', () => {
    const [first] = rootPasswordActions();
    const [second] = rootPasswordActions();

    expect(first).not.toEqual(second);
  });
});
