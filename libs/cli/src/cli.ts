#!/usr/bin/env node
/**
 * Slotwarden CLI
 *
 * Deploys, checks and cleans up slot instances for the wallets configured in
 * local profiles.
 *
 * @example
 * ```bash
 * # Store credentials
 * slotwarden configure --chain mainnet --market uniswapv2 --wallet 0x... --signer 0x... \
 *   --signer-key ... --source-rpc https://...
 *
 * # Start every owned slot that is not running
 * slotwarden deploy --chain mainnet --market uniswapv2
 *
 * # Report coverage
 * slotwarden check --chain mainnet
 *
 * # Clean up slot 12
 * slotwarden diagnose --slot 12
 * ```
 */

import { Command } from 'commander';
import {
  createCheckCommand,
  createConfigureCommand,
  createDeployCommand,
  createDiagnoseCommand,
  createProfileCommand,
} from './commands/index';
import { openContext } from './utils/context';
import type { ContextFactory, ContextOpener } from './utils/context';
import { EXIT, reportError } from './utils/exit';

// Package version - will be replaced during build
const VERSION = '0.1.0';

/**
 * Create and configure the main CLI program
 */
export function createProgram(open: ContextOpener = (options) => openContext(process.env, options)): Command {
  const program = new Command();
  const contextFactory: ContextFactory = () =>
    open({ verbose: program.opts<{ verbose?: boolean }>().verbose === true });

  program
    .name('slotwarden')
    .description('Slotwarden - deploy and reconcile slot instances')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Debug logging on stderr')
    .addHelpText(
      'after',
      `
Examples:
  $ slotwarden configure -c mainnet -m uniswapv2 --wallet 0x...   Store credentials
  $ slotwarden deploy -c mainnet -m uniswapv2                     Start missing slots
  $ slotwarden deploy -c mainnet -m uniswapv2 -s 3-7 -y           Start slots 3 to 7
  $ slotwarden check -c mainnet                                   Owned vs running
  $ slotwarden diagnose --slot 12                                 Clean up one slot
  $ slotwarden profile list                                       List profiles
  $ slotwarden profile export ops -o ops.json                     Back up a profile
`,
    );

  program.addCommand(createDeployCommand(contextFactory));
  program.addCommand(createCheckCommand(contextFactory));
  program.addCommand(createDiagnoseCommand(contextFactory));
  program.addCommand(createProfileCommand(contextFactory));
  program.addCommand(createConfigureCommand(contextFactory));

  return program;
}

/** Usage errors (unknown option, missing argument) exit 2 */
function applyUsageExitCode(cmd: Command): void {
  cmd.exitOverride((err) => process.exit(err.exitCode === 0 ? 0 : EXIT.INVALID_INPUT));
  for (const sub of cmd.commands) applyUsageExitCode(sub);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  applyUsageExitCode(program);

  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    reportError(err);
  });
}
