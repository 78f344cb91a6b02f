#!/usr/bin/env node

/**
 * CLI entry point for devbox-reauth
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import type { Argv } from 'yargs';
import { readFileSync, realpathSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import chalk from 'chalk';
import { syncCommand } from '../src/cli/commands/sync.js';
import { configCommand } from '../src/cli/commands/config.js';
import { addSyncOptions } from '../src/cli/common/options.js';
import { describeError } from '../src/errors.js';

const CLI_COMMAND_NAME = 'devbox-reauth';
const CLI_DIR = dirname(fileURLToPath(import.meta.url));

function resolveCliVersion(): string {
  const candidates = [resolve(CLI_DIR, '../package.json'), resolve(CLI_DIR, '../../package.json')];

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      const version: unknown = typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'version') : undefined;
      if (typeof version === 'string' && version) return version;
    } catch {
      // Try next candidate.
    }
  }

  return process.env.npm_package_version || '0.0.0';
}

export async function runCli(rawArgs: string[] = hideBin(process.argv)): Promise<void> {
  await yargs(rawArgs)
    .scriptName(CLI_COMMAND_NAME)
    .usage('$0 [host] [options]')
    .version(resolveCliVersion())
    .help()
    .strict()
    .fail((message, error, y) => {
      if (error) throw error;
      console.error(chalk.red(message));
      console.error(chalk.gray(`Run \`${CLI_COMMAND_NAME} --help\` for usage.`));
      y.exit(1, new Error(message));
    })
    .command(
      ['$0 [host]', 'sync [host]'],
      'Sync the remote build credential into the kernel keyring of an SSH host',
      (y: Argv) => addSyncOptions(y)
        .positional('host', { type: 'string', describe: 'SSH hostname to which to sync the credential (default: devbox)' }),
      async (argv) => {
        await syncCommand({
          host: argv.host,
          remote: argv.remote,
          credentialHelper: argv.credentialHelper,
          force: argv.force,
          forceLocal: argv.forceLocal,
          forceRemote: argv.forceRemote,
          sessionKeyring: argv.sessionKeyring,
          createSocket: argv.createSocket,
          reuseSocket: argv.reuseSocket,
          sshArgs: argv.sshArg ?? [],
          verify: argv.verify,
          quiet: argv.quiet,
        });
      },
    )
    .command(
      'config',
      'Show or update stored defaults',
      (y: Argv) => y
        .option('show', { type: 'boolean', default: false, describe: 'Print the effective configuration' })
        .option('reset', { type: 'boolean', default: false, describe: 'Remove the stored configuration file' })
        .option('remote', { type: 'string', describe: 'Set the remote build service DNS name' })
        .option('credential-helper', { type: 'string', describe: 'Set the credential helper executable' })
        .option('keychain-service', { type: 'string', describe: 'Set the keychain service the helper stores its credential under' })
        .option('key-prefix', { type: 'string', describe: 'Set the kernel key name prefix' })
        .option('key-realm', { type: 'string', describe: 'Set the kernel key name realm' })
        .option('default-host', { type: 'string', describe: 'Set the SSH host used when none is given' }),
      (argv) =>
        configCommand({
          show: argv.show,
          reset: argv.reset,
          remote: argv.remote,
          credentialHelper: argv.credentialHelper,
          keychainService: argv.keychainService,
          keyPrefix: argv.keyPrefix,
          keyRealm: argv.keyRealm,
          defaultHost: argv.defaultHost,
        }),
    )
    .parseAsync();
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli().catch((error: unknown) => {
    console.error(chalk.red(`❌ ${describeError(error)}`));
    process.exit(1);
  });
}
