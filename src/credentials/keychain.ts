import { Entry } from '@napi-rs/keyring';
import { KeychainError } from '../errors.js';

/** Local OS secret store, addressed by (service, account). */
export interface Keychain {
  getPassword(service: string, account: string): Promise<string>;
  setPassword(service: string, account: string, secret: string): Promise<void>;
}

/**
 * Keychain backed by the platform store (macOS Keychain, Secret Service, Windows
 * Credential Manager), where the credential helper saves its token after a login.
 */
export class SystemKeychain implements Keychain {
  async getPassword(service: string, account: string): Promise<string> {
    let secret: string | null | undefined;
    try {
      secret = new Entry(service, account).getPassword();
    } catch (error) {
      throw new KeychainError(`failed to get credential ${service}/${account} from keychain`, {
        service,
        account,
        cause: error,
      });
    }

    if (!secret) {
      throw new KeychainError(`no credential ${service}/${account} in keychain`, { service, account });
    }
    return secret;
  }

  async setPassword(service: string, account: string, secret: string): Promise<void> {
    try {
      new Entry(service, account).setPassword(secret);
    } catch (error) {
      throw new KeychainError(`failed to store credential ${service}/${account} in keychain`, {
        service,
        account,
        cause: error,
      });
    }
  }
}
