import chalk from 'chalk';
import { STORED_KEYS, getDefaultConfigManager, type ConfigManager, type StoredConfig } from '../../config/index.js';
import { buildKeyName } from '../../credentials/keyctl.js';

export interface ConfigCommandOptions {
  show?: boolean;
  reset?: boolean;
  remote?: string;
  credentialHelper?: string;
  keychainService?: string;
  keyPrefix?: string;
  keyRealm?: string;
  defaultHost?: string;
}

const LABELS: Record<keyof StoredConfig, string> = {
  remote: 'Remote',
  credentialHelper: 'Credential helper',
  keychainService: 'Keychain service',
  keyPrefix: 'Key prefix',
  keyRealm: 'Key realm',
  defaultHost: 'Default host',
};

function printConfig(manager: ConfigManager): void {
  const config = manager.config;
  console.log(chalk.cyan('\n⚙️  devbox-reauth configuration\n'));
  console.log(chalk.gray(`   Config file: ${manager.getConfigPath()}`));
  console.log(chalk.gray(`   Remote: ${config.remote || '(not set)'}`));
  console.log(chalk.gray(`   Credential helper: ${config.credentialHelper}`));
  console.log(chalk.gray(`   Keychain service: ${config.keychainService}`));
  console.log(
    chalk.gray(
      `   Key name: ${config.remote ? buildKeyName(config.remote, config.keyPrefix, config.keyRealm) : '(needs remote)'}`,
    ),
  );
  console.log(chalk.gray(`   Default host: ${config.defaultHost}`));
  console.log('');
}

export function configCommand(options: ConfigCommandOptions, manager: ConfigManager = getDefaultConfigManager()): void {
  if (options.reset) {
    manager.clearStoredConfig();
    console.log(chalk.green(`✅ Removed ${manager.getConfigPath()}`));
  }

  const updates: Partial<StoredConfig> = {
    remote: options.remote,
    credentialHelper: options.credentialHelper,
    keychainService: options.keychainService,
    keyPrefix: options.keyPrefix,
    keyRealm: options.keyRealm,
    defaultHost: options.defaultHost,
  };
  const changed = STORED_KEYS.filter((key) => updates[key]?.trim());

  if (changed.length > 0) {
    manager.saveConfig(updates);
    for (const key of changed) {
      console.log(chalk.green(`✅ ${LABELS[key]} saved: ${manager.getConfigValue(key)}`));
    }
  }

  if (options.show || (changed.length === 0 && !options.reset)) {
    printConfig(manager);
  }
}
