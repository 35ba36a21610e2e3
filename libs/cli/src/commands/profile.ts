/**
 * Profile command
 *
 * Manage named credential profiles.
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import { InvalidInputError, parseIdentifier } from '@slotwarden/ipc';
import { confirm } from '../utils/confirm';
import { openContext, withContext } from '../utils/context';
import type { ContextFactory } from '../utils/context';
import { EXIT, reportError } from '../utils/exit';
import { formatProfiles, formatStoredBundles, styleFor } from '../utils/format';

type Handler<A extends unknown[]> = (...args: A) => Promise<number>;

function guarded<A extends unknown[]>(fn: Handler<A>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      process.exitCode = await fn(...args);
    } catch (err) {
      reportError(err);
    }
  };
}

/**
 * Create the profile command
 */
export function createProfileCommand(contextFactory: ContextFactory = openContext): Command {
  const cmd = new Command('profile').description('Manage configuration profiles');

  cmd
    .command('list')
    .description('List profiles')
    .action(
      guarded(() =>
        withContext(contextFactory, async (ctx) => {
          for (const line of formatProfiles(ctx.profiles.listProfiles(), styleFor())) console.log(line);
          return EXIT.OK;
        }),
      ),
    );

  cmd
    .command('create <name>')
    .description('Create an empty profile')
    .option('-d, --description <text>', 'Description')
    .action(
      guarded((name: string, options: { description?: string }) =>
        withContext(contextFactory, async (ctx) => {
          ctx.profiles.create(name, options.description);
          console.log(`Created profile ${name}.`);
          return EXIT.OK;
        }),
      ),
    );

  cmd
    .command('delete <name>')
    .description('Delete a profile and its configuration')
    .option('-f, --force', 'Allow deleting the default profile')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(
      guarded((name: string, options: { force?: boolean; yes?: boolean }) =>
        withContext(contextFactory, async (ctx) => {
          if (!(await confirm(`Delete profile ${name} and all of its configuration?`, { assumeYes: options.yes }))) {
            console.log('Delete cancelled.');
            return EXIT.OK;
          }
          ctx.profiles.delete(name, { force: options.force });
          console.log(`Deleted profile ${name}.`);
          return EXIT.OK;
        }),
      ),
    );

  cmd
    .command('copy <source> <target>')
    .description('Copy a profile and its configuration')
    .action(
      guarded((source: string, target: string) =>
        withContext(contextFactory, async (ctx) => {
          const copied = ctx.profiles.copy(source, target);
          console.log(`Copied ${source} to ${target} (${copied} bundle${copied === 1 ? '' : 's'}).`);
          return EXIT.OK;
        }),
      ),
    );

  cmd
    .command('set-default <name>')
    .description('Use this profile when none is given')
    .action(
      guarded((name: string) =>
        withContext(contextFactory, async (ctx) => {
          ctx.profiles.setDefault(name);
          console.log(`Default profile is now ${name}.`);
          return EXIT.OK;
        }),
      ),
    );

  cmd
    .command('show [name]')
    .description('Show a profile (the active one by default)')
    .action(
      guarded((name: string | undefined) =>
        withContext(contextFactory, async (ctx) => {
          const active = ctx.profiles.activeProfile(name);
          console.log(`Profile ${active.name} (${active.source})`);
          for (const line of formatStoredBundles(ctx.profiles.bundlesOf(active.name))) console.log(line);
          return EXIT.OK;
        }),
      ),
    );

  cmd
    .command('unset <chain> <market>')
    .description('Remove the credentials stored for a chain and market')
    .option('-p, --profile <name>', 'Profile to remove from')
    .action(
      guarded((chain: string, market: string, options: { profile?: string }) =>
        withContext(contextFactory, async (ctx) => {
          const c = parseIdentifier(chain, 'chain');
          const m = parseIdentifier(market, 'market');
          const active = ctx.profiles.activeProfile(options.profile);
          if (!ctx.profiles.removeBundle(active.name, c, m)) {
            console.log(`No configuration for ${c}/${m} in profile ${active.name}.`);
            return EXIT.OK;
          }
          console.log(`Removed ${c}/${m} from profile ${active.name}.`);
          return EXIT.OK;
        }),
      ),
    );

  cmd
    .command('export <name>')
    .description('Write a profile and its configuration as JSON')
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .option('--include-secrets', 'Include signer private keys')
    .action(
      guarded((name: string, options: { output?: string; includeSecrets?: boolean }) =>
        withContext(contextFactory, async (ctx) => {
          const doc = ctx.profiles.exportProfile(name, { includeSecrets: options.includeSecrets === true });
          const json = JSON.stringify(doc, null, 2);
          if (!options.output) {
            console.log(json);
            return EXIT.OK;
          }
          fs.writeFileSync(options.output, `${json}\n`, { mode: options.includeSecrets ? 0o600 : 0o644 });
          const count = doc.bundles.length;
          console.log(`Exported profile ${name} (${count} bundle${count === 1 ? '' : 's'}) to ${options.output}.`);
          return EXIT.OK;
        }),
      ),
    );

  cmd
    .command('import <file>')
    .description('Create a profile from an exported JSON file')
    .option('-n, --name <name>', 'Profile name to import as')
    .option('-f, --force', 'Write into an existing profile')
    .action(
      guarded((file: string, options: { name?: string; force?: boolean }) =>
        withContext(contextFactory, async (ctx) => {
          const result = ctx.profiles.importProfile(readExport(file), options);
          const count = result.imported.length;
          console.log(`Imported profile ${result.profile} (${count} bundle${count === 1 ? '' : 's'}).`);
          for (const { chain, market } of result.skipped) {
            console.log(`Skipped ${chain}/${market}: the file has no signer private key.`);
          }
          return EXIT.OK;
        }),
      ),
    );

  return cmd;
}

function readExport(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new InvalidInputError(`Cannot read ${file}: ${(err as NodeJS.ErrnoException).code ?? String(err)}`, 'file');
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidInputError(`${file} is not valid JSON`, 'file');
  }
}
