import { chmodSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

export const SOCKET_DIR_PREFIX = 'devbox-reauth-';
const SOCKET_NAME = 'sock';

/**
 * A socket path inside a fresh owner-only temporary directory.
 *
 * Only the path is handed out; ssh creates the socket itself. `destroy()` removes
 * the whole directory and is safe to call any number of times.
 */
export class ControlSocket {
  readonly directory: string;
  readonly path: string;
  private destroyed = false;

  private constructor(directory: string) {
    this.directory = directory;
    this.path = join(directory, SOCKET_NAME);
  }

  static create(prefix: string = SOCKET_DIR_PREFIX): ControlSocket {
    const directory = mkdtempSync(join(tmpdir(), prefix));
    chmodSync(directory, 0o700);
    return new ControlSocket(directory);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    rmSync(this.directory, { recursive: true, force: true });
  }
}
