/**
 * @hardline/cli
 *
 * Command line front end for the hardening workflow
 */

export {
  parseArgs,
  resolveCliOptions,
  loadEnvironment,
  printHelp,
  cliOptionsSchema,
  POSITIONALS,
  ENV_KEYS,
  type ParsedArgs,
  type CliOptions,
} from './args.js';
export { createHardenConfig, readPublicKey } from './app.js';
