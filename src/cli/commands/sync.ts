import chalk from 'chalk';
import type { ProcessRunner, ReauthConfig, SocketPolicy } from '../../types/index.js';
import { getConfig, requireRemote } from '../../config/index.js';
import { runSync, type SyncOutcome, type SyncStage } from '../../app/sync-service.js';
import { SystemKeychain, type Keychain } from '../../credentials/keychain.js';
import { resolveSocketPolicy } from '../common/options.js';

export interface SyncCommandOptions {
  host?: string;
  remote?: string;
  credentialHelper?: string;
  force?: boolean;
  forceLocal?: boolean;
  forceRemote?: boolean;
  sessionKeyring?: boolean;
  createSocket?: SocketPolicy;
  reuseSocket?: boolean;
  sshArgs?: string[];
  verify?: boolean;
  quiet?: boolean;
}

export interface SyncCommandDeps {
  config?: ReauthConfig;
  keychain?: Keychain;
  runner?: ProcessRunner;
}

function describeStage(stage: SyncStage, detail: string): string {
  switch (stage) {
    case 'checking':
      return `   Checking credentials locally and on ${detail}...`;
    case 'login':
      return `   Logging in to ${detail}...`;
    case 'push':
      return `   Pushing credential to ${detail}...`;
    case 'verify':
      return `   Verifying credential on ${detail}...`;
  }
}

export async function syncCommand(options: SyncCommandOptions, deps: SyncCommandDeps = {}): Promise<SyncOutcome> {
  const config = deps.config ?? getConfig();
  const remote = options.remote?.trim() || requireRemote(config);
  const host = options.host?.trim() || config.defaultHost;
  const policy = resolveSocketPolicy(options.createSocket, options.reuseSocket);

  const progress = (message: string): void => {
    if (!options.quiet) console.log(chalk.gray(message));
  };

  progress(`   Connecting to ${host}...`);
  const outcome = await runSync(
    { host, sshArgs: options.sshArgs ?? [], policy },
    {
      remote,
      credentialHelper: options.credentialHelper?.trim() || config.credentialHelper,
      keychainService: config.keychainService,
      keyPrefix: config.keyPrefix,
      keyRealm: config.keyRealm,
      keyring: options.sessionKeyring ? 'session' : 'user',
      force: options.force ?? false,
      forceLocal: options.forceLocal ?? false,
      forceRemote: options.forceRemote ?? false,
      verify: options.verify ?? false,
    },
    {
      keychain: deps.keychain ?? new SystemKeychain(),
      runner: deps.runner,
      onStage: (stage, detail) => progress(describeStage(stage, detail)),
    },
  );

  if (outcome.status === 'fresh') {
    console.log(chalk.green('✅ Credential refresh not needed. Have a nice day.'));
  } else {
    console.log(chalk.green(`✅ Credentials synced to ${host}. Have a nice day.`));
  }
  return outcome;
}
