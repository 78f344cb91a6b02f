/**
 * Configuration management
 */

import { config as loadEnv } from 'dotenv';
import { join } from 'path';
import type { ReauthConfig } from '../types/index.js';
import type { IStorage, IEnvironment } from '../types/interfaces.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';
import { DEFAULT_KEY_PREFIX, DEFAULT_KEY_REALM } from '../credentials/keyctl.js';

export const DEFAULT_CREDENTIAL_HELPER = 'aspect-credential-helper';
export const DEFAULT_KEYCHAIN_SERVICE = 'AspectWorkflows';
export const DEFAULT_HOST = 'devbox';

export interface StoredConfig {
  remote?: string;
  credentialHelper?: string;
  keychainService?: string;
  keyPrefix?: string;
  keyRealm?: string;
  defaultHost?: string;
}

export const STORED_KEYS: readonly (keyof StoredConfig)[] = [
  'remote',
  'credentialHelper',
  'keychainService',
  'keyPrefix',
  'keyRealm',
  'defaultHost',
];

export class ConfigManager {
  private storage: IStorage;
  private env: IEnvironment;
  private configDir: string;
  private configFile: string;
  private _config?: ReauthConfig;
  private envLoaded = false;

  constructor(storage?: IStorage, env?: IEnvironment, configDir?: string) {
    this.storage = storage || new FileStorage();
    this.env = env || new SystemEnvironment();
    this.configDir = configDir || join(this.env.homedir(), '.devbox-reauth');
    this.configFile = join(this.configDir, 'config.json');
  }

  get config(): ReauthConfig {
    if (!this._config) {
      // Lazy load environment variables only once
      if (!this.envLoaded) {
        loadEnv();
        this.envLoaded = true;
      }

      const stored = this.loadStoredConfig();
      const remote = stored.remote || this.envValue('DEVBOX_REAUTH_REMOTE');

      // Merge: stored config > environment variables > defaults
      this._config = {
        ...(remote ? { remote } : {}),
        credentialHelper:
          stored.credentialHelper || this.envValue('DEVBOX_REAUTH_CREDENTIAL_HELPER') || DEFAULT_CREDENTIAL_HELPER,
        keychainService:
          stored.keychainService || this.envValue('DEVBOX_REAUTH_KEYCHAIN_SERVICE') || DEFAULT_KEYCHAIN_SERVICE,
        keyPrefix: stored.keyPrefix || DEFAULT_KEY_PREFIX,
        keyRealm: stored.keyRealm || DEFAULT_KEY_REALM,
        defaultHost: stored.defaultHost || this.envValue('DEVBOX_REAUTH_DEFAULT_HOST') || DEFAULT_HOST,
      };
    }
    return this._config;
  }

  loadStoredConfig(): StoredConfig {
    if (!this.storage.exists(this.configFile)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.storage.readFile(this.configFile, 'utf-8'));
    } catch {
      return {};
    }
    return pickStoredConfig(parsed);
  }

  saveConfig(updates: Partial<StoredConfig>): void {
    if (!this.storage.exists(this.configDir)) {
      this.storage.mkdirp(this.configDir);
    }

    const current = this.loadStoredConfig();
    const newConfig = { ...current, ...trimValues(updates) };
    this.storage.writeFile(this.configFile, JSON.stringify(newConfig, null, 2));
    this.storage.chmod(this.configFile, 0o600);

    // Invalidate cached config
    this._config = undefined;
  }

  clearStoredConfig(): void {
    if (this.storage.exists(this.configFile)) {
      this.storage.unlink(this.configFile);
    }
    this._config = undefined;
  }

  getConfigValue<K extends keyof StoredConfig>(key: K): StoredConfig[K] {
    const stored = this.loadStoredConfig();
    return stored[key];
  }

  validateConfig(): void {
    requireRemote(this.config);
  }

  getConfigPath(): string {
    return this.configFile;
  }

  private envValue(key: string): string | undefined {
    const value = this.env.get(key)?.trim();
    return value ? value : undefined;
  }
}

export function requireRemote(config: ReauthConfig): string {
  if (!config.remote) {
    throw new Error(
      'Remote not configured.\n' +
      'Run: devbox-reauth config --remote <dns-name>\n' +
      'Or set DEVBOX_REAUTH_REMOTE environment variable',
    );
  }
  return config.remote;
}

function pickStoredConfig(raw: unknown): StoredConfig {
  if (typeof raw !== 'object' || raw === null) return {};
  const picked: StoredConfig = {};
  for (const key of STORED_KEYS) {
    const value: unknown = Reflect.get(raw, key);
    if (typeof value === 'string' && value.trim().length > 0) {
      picked[key] = value.trim();
    }
  }
  return picked;
}

function trimValues(updates: Partial<StoredConfig>): StoredConfig {
  const trimmed: StoredConfig = {};
  for (const key of STORED_KEYS) {
    const value = updates[key]?.trim();
    if (value) trimmed[key] = value;
  }
  return trimmed;
}

// Default instance used by the CLI
const defaultConfigManager = new ConfigManager();

export function getDefaultConfigManager(): ConfigManager {
  return defaultConfigManager;
}

export function getConfig(): ReauthConfig {
  return defaultConfigManager.config;
}
