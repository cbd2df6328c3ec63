#!/usr/bin/env node
/**
 * hardline CLI
 *
 * Hardens one Debian host and exits 0 on success, 1 on any failure.
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { HardlineError } from '@hardline/core';
import { formatSummary, HardenWorkflow } from '@hardline/sdk';
import { loadEnvironment, parseArgs, printHelp, resolveCliOptions } from '../args.js';
import { createHardenConfig, readPublicKey } from '../app.js';

function redirectLogs(logFile: string): WriteStream {
  const logStream = createWriteStream(logFile, { flags: 'a' });
  const timestamp = () => new Date().toISOString();

  for (const level of ['log', 'warn', 'error'] as const) {
    const original = console[level];
    console[level] = (...args: unknown[]) => {
      logStream.write(`[${timestamp()}] ${args.map(String).join(' ')}\n`);
      original.apply(console, args);
    };
  }
  console.log(`[HARDLINE] Logging to ${logFile}`);
  return logStream;
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.help) {
    printHelp();
    return 0;
  }

  // stdout carries only the JSON report
  if (parsed.json) {
    console.log = console.error;
    console.info = console.error;
    console.warn = console.error;
  }

  loadEnvironment(parsed.envFile ?? process.env['HARDLINE_ENV_FILE']);
  const options = resolveCliOptions(parsed);

  let logStream: WriteStream | undefined;
  if (options.logFile) {
    logStream = redirectLogs(options.logFile);
  }

  const publicKey = readPublicKey(options.publicKeyFile);
  const workflow = new HardenWorkflow(createHardenConfig(options, publicKey));
  const report = await workflow.run();

  if (options.report) {
    await writeFile(options.report, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
    console.error(`[HARDLINE] Report written to ${options.report}`);
  }

  if (options.json) {
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } else {
    console.log('');
    console.log(formatSummary(report));
  }

  if (logStream) {
    const stream = logStream;
    await new Promise<void>((resolve) => stream.end(resolve));
  }
  return report.exitCode;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (error instanceof HardlineError) {
      console.error(`Error [${error.code}]: ${error.message}`);
      if (error.hint) {
        console.error(`Hint: ${error.hint}`);
      }
    } else {
      console.error('[HARDLINE] Unexpected failure:', error);
    }
    process.exit(1);
  },
);
