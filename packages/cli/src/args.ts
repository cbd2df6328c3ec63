/**
 * Command line parsing
 *
 * Positional arguments and options fall back to HARDLINE_* environment
 * variables; the merged values are validated with zod.
 */

import { existsSync } from 'node:fs';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { PreconditionError } from '@hardline/core';
import { DEFAULT_GUARD, DEFAULT_IDENTITY, DEFAULT_SSH_PORT, HARDEN_STEPS } from '@hardline/sdk';

export const POSITIONALS = [
  'host',
  'bootstrapUser',
  'bootstrapPassword',
  'publicKeyFile',
  'identityPassword',
] as const;

type Positional = typeof POSITIONALS[number];

export interface ParsedArgs {
  positionals: string[];
  help: boolean;
  identity?: string;
  port?: string;
  identityFile?: string;
  guardDeadline?: string;
  connectTimeout?: string;
  skip?: string;
  local?: boolean;
  json?: boolean;
  report?: string;
  logFile?: string;
  envFile?: string;
}

type ValueOption = Exclude<keyof ParsedArgs, 'positionals' | 'help' | 'local' | 'json'>;

const VALUE_OPTIONS: Record<string, ValueOption> = {
  '--identity': 'identity',
  '--port': 'port',
  '--identity-file': 'identityFile',
  '--guard-deadline': 'guardDeadline',
  '--connect-timeout': 'connectTimeout',
  '--skip': 'skip',
  '--report': 'report',
  '--log-file': 'logFile',
  '--env-file': 'envFile',
};

/** Environment variables consulted when an argument is absent */
export const ENV_KEYS: Record<Positional | ValueOption, string> = {
  host: 'HARDLINE_HOST',
  bootstrapUser: 'HARDLINE_BOOTSTRAP_USER',
  bootstrapPassword: 'HARDLINE_BOOTSTRAP_PASSWORD',
  publicKeyFile: 'HARDLINE_PUBLIC_KEY_FILE',
  identityPassword: 'HARDLINE_IDENTITY_PASSWORD',
  identity: 'HARDLINE_IDENTITY',
  port: 'HARDLINE_PORT',
  identityFile: 'HARDLINE_IDENTITY_FILE',
  guardDeadline: 'HARDLINE_GUARD_DEADLINE',
  connectTimeout: 'HARDLINE_CONNECT_TIMEOUT',
  skip: 'HARDLINE_SKIP',
  report: 'HARDLINE_REPORT',
  logFile: 'HARDLINE_LOG_FILE',
  envFile: 'HARDLINE_ENV_FILE',
};

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = { positionals: [], help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--local':
        result.local = true;
        break;
      case '--json':
        result.json = true;
        break;

      default: {
        const option = VALUE_OPTIONS[arg];
        if (option) {
          const value = args[i + 1];
          if (value === undefined || value.startsWith('--')) {
            throw new PreconditionError(`Option ${arg} needs a value`, 'Run hardline --help for usage');
          }
          result[option] = value;
          i++;
        } else if (arg.startsWith('-')) {
          throw new PreconditionError(`Unknown option: ${arg}`, 'Run hardline --help for usage');
        } else {
          result.positionals.push(arg);
        }
      }
    }
  }

  return result;
}

/**
 * Load HARDLINE_* defaults. An explicit env file must exist; `./.env` is
 * read when present. Variables already set in the environment win.
 */
export function loadEnvironment(envFile?: string): void {
  if (envFile) {
    if (!existsSync(envFile)) {
      throw new PreconditionError(`Env file not found: ${envFile}`);
    }
    loadDotenv({ path: envFile });
    console.log(`[HARDLINE:Config] Loaded ${envFile}`);
    return;
  }
  if (existsSync('.env')) {
    loadDotenv();
    console.log('[HARDLINE:Config] Loaded .env');
  }
}

// ========== Validation ==========

const positiveSeconds = z.coerce.number().int().positive();

export const cliOptionsSchema = z
  .object({
    host: z.string({ required_error: 'target host is required' }).min(1),
    bootstrapUser: z.string({ required_error: 'bootstrap user is required' }).min(1),
    bootstrapPassword: z.string({ required_error: 'bootstrap password is required' }).min(1),
    publicKeyFile: z.string({ required_error: 'public key file is required' }).min(1),
    identityPassword: z.string({ required_error: 'identity password is required' }).min(1),
    identity: z
      .string()
      .regex(/^[a-z_][a-z0-9_-]{0,31}$/, 'not a valid user name')
      .default(DEFAULT_IDENTITY.username),
    port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_SSH_PORT),
    identityFile: z.string().min(1).optional(),
    guardDeadline: positiveSeconds.default(DEFAULT_GUARD.deadlineSeconds),
    connectTimeout: positiveSeconds.default(10),
    skip: z.array(z.enum(HARDEN_STEPS)).default([]),
    local: z.boolean().default(false),
    json: z.boolean().default(false),
    report: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
  })
  .transform((options) => ({
    ...options,
    // The private key sits next to its .pub file
    identityFile: options.identityFile ?? options.publicKeyFile.replace(/\.pub$/, ''),
  }));

export type CliOptions = z.output<typeof cliOptionsSchema>;

function fromEnv(env: NodeJS.ProcessEnv, key: Positional | ValueOption): string | undefined {
  const value = env[ENV_KEYS[key]];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Merge parsed arguments with the environment and validate the result.
 */
export function resolveCliOptions(parsed: ParsedArgs, env: NodeJS.ProcessEnv = process.env): CliOptions {
  if (parsed.positionals.length > POSITIONALS.length) {
    throw new PreconditionError(
      `Too many arguments: ${parsed.positionals.slice(POSITIONALS.length).join(' ')}`,
      'Run hardline --help for usage',
    );
  }

  const positional = (key: Positional): string | undefined =>
    parsed.positionals[POSITIONALS.indexOf(key)] ?? fromEnv(env, key);
  const option = (key: ValueOption): string | undefined => parsed[key] ?? fromEnv(env, key);

  const skip = option('skip');
  const input = {
    host: positional('host'),
    bootstrapUser: positional('bootstrapUser'),
    bootstrapPassword: positional('bootstrapPassword'),
    publicKeyFile: positional('publicKeyFile'),
    identityPassword: positional('identityPassword'),
    identity: option('identity'),
    port: option('port'),
    identityFile: option('identityFile'),
    guardDeadline: option('guardDeadline'),
    connectTimeout: option('connectTimeout'),
    skip: skip?.split(',').map((step) => step.trim()).filter((step) => step !== ''),
    local: parsed.local ?? false,
    json: parsed.json ?? false,
    report: option('report'),
    logFile: option('logFile'),
  };

  const result = cliOptionsSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new PreconditionError(`Invalid arguments: ${problems.join('; ')}`, 'Run hardline --help for usage');
  }
  return result.data;
}

export function printHelp(): void {
  console.log(`hardline - harden a fresh Debian host over SSH

Every configuration change is staged, validated and applied under a rollback
guard on the target. The guard restores the previous file unless a fresh
key-only login as the new identity confirms the change in time.

Usage:
  hardline <host> <bootstrap-user> <bootstrap-password> <public-key-file> <identity-password> [options]

Options:
  --identity NAME            Account to create (default: ${DEFAULT_IDENTITY.username})
  --port PORT                SSH port of the target (default: ${DEFAULT_SSH_PORT})
  --identity-file PATH       Private key for the new account (default: public key path without .pub)
  --guard-deadline SECONDS   Revert unconfirmed changes after this long (default: ${DEFAULT_GUARD.deadlineSeconds})
  --connect-timeout SECONDS  SSH connect timeout (default: 10)
  --skip STEP,...            Steps to leave out: ${HARDEN_STEPS.filter((s) => s !== 'probe' && s !== 'bootstrap').join(', ')}
  --local                    Apply changes on this machine instead of over SSH
  --json                     Print the report as JSON; logs go to stderr
  --report PATH              Also write the JSON report to PATH
  --log-file PATH            Append logs to PATH
  --env-file PATH            Read HARDLINE_* defaults from PATH (default: ./.env)
  --help, -h                 Show this help message

Environment:
  Every argument can be given as a HARDLINE_* variable, e.g. HARDLINE_HOST,
  HARDLINE_BOOTSTRAP_PASSWORD, HARDLINE_IDENTITY_PASSWORD, HARDLINE_PORT.

Examples:
  hardline 192.0.2.10 debian 'initial-pw' ~/.ssh/id_ed25519.pub 'new-pw'
  hardline --env-file staging.env --skip auditd,sysctl`);
}
