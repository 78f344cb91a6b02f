/**
 * One ssh connection per run, multiplexed for every remote command.
 */

import chalk from 'chalk';
import type { ProcessInvocation, ProcessRunner, SocketPolicy } from '../types/index.js';
import { CleanupWarning, ConnectionError, describeError } from '../errors.js';
import { describeExit, formatFailure, runProcess } from '../infra/process.js';
import {
  buildExitInvocation,
  buildMasterInvocation,
  buildRemoteInvocation,
  type SshTarget,
} from '../infra/ssh.js';
import { ControlSocket, SOCKET_DIR_PREFIX } from './control-socket.js';
import { createConfigQuery, resolveCreateSocket, type ConfigQuery } from './socket-policy.js';

export interface SshSessionOptions {
  host: string;
  sshArgs?: readonly string[];
  policy: SocketPolicy;
  runner?: ProcessRunner;
  /** Replaces `ssh -G` when the policy is `infer`. */
  configQuery?: ConfigQuery;
  socketFactory?: (prefix: string) => ControlSocket;
  onWarning?: (warning: CleanupWarning) => void;
}

/** Anything that can build a remote command line for a host. */
export interface RemoteShell {
  readonly host: string;
  command(remoteCommand: string, ...remoteArgs: string[]): ProcessInvocation;
}

export function printCleanupWarning(warning: CleanupWarning): void {
  console.warn(chalk.yellow(`⚠️ cleanup ssh: ${describeError(warning)}`));
}

export class SshSession implements RemoteShell {
  readonly host: string;
  private readonly target: SshTarget;
  private readonly runner: ProcessRunner;
  private readonly onWarning: (warning: CleanupWarning) => void;
  private socket: ControlSocket | undefined;
  private closed = false;

  private constructor(target: SshTarget, socket: ControlSocket | undefined, options: SshSessionOptions) {
    this.host = target.host;
    this.target = target;
    this.socket = socket;
    this.runner = options.runner ?? runProcess;
    this.onWarning = options.onWarning ?? printCleanupWarning;
  }

  /**
   * Resolves the socket policy and blocks until the connection is usable. With an
   * own socket that means a persistent master is listening on it.
   */
  static async open(options: SshSessionOptions): Promise<SshSession> {
    const runner = options.runner ?? runProcess;
    const target: SshTarget = { host: options.host, sshArgs: options.sshArgs ?? [] };
    const ownSocket = await resolveCreateSocket(
      options.policy,
      target.host,
      options.configQuery ?? createConfigQuery(runner),
    );
    const socket = ownSocket ? (options.socketFactory ?? ControlSocket.create)(SOCKET_DIR_PREFIX) : undefined;
    const session = new SshSession(target, socket, options);

    try {
      const result = await runner(buildMasterInvocation(target, socket?.path), { stdout: 'ignore' });
      if (result.code !== 0) {
        throw new ConnectionError(formatFailure(`ssh ${target.host}`, result), {
          host: target.host,
          stderr: result.stderr,
        });
      }
    } catch (error) {
      session.discardSocket();
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(`failed to start SSH control master for ${target.host}`, {
        host: target.host,
        cause: error,
      });
    }

    return session;
  }

  get ownsSocket(): boolean {
    return this.socket !== undefined;
  }

  get socketPath(): string | undefined {
    return this.socket?.path;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  command(remoteCommand: string, ...remoteArgs: string[]): ProcessInvocation {
    if (this.closed) {
      throw new Error(`ssh session to ${this.host} is closed`);
    }
    return buildRemoteInvocation(this.target, [remoteCommand, ...remoteArgs], this.socket?.path);
  }

  /**
   * Tells an own control master to exit and removes its socket directory. Failures
   * become warnings. Only the first call does anything.
   */
  async cleanup(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const socket = this.socket;
    if (!socket) return;

    try {
      const result = await this.runner(buildExitInvocation(this.target, socket.path), {
        stdout: 'ignore',
        stderr: 'ignore',
      });
      if (result.code !== 0) {
        this.onWarning(
          new CleanupWarning(`ssh -Oexit ${this.host}: ${describeExit(result)}`, { host: this.host }),
        );
      }
    } catch (error) {
      this.onWarning(
        new CleanupWarning('failed to cleanup SSH control master', { host: this.host, cause: error }),
      );
    }

    this.discardSocket();
  }

  private discardSocket(): void {
    const socket = this.socket;
    if (!socket) return;
    this.socket = undefined;
    try {
      socket.destroy();
    } catch (error) {
      this.onWarning(
        new CleanupWarning(`failed to remove control socket directory ${socket.directory}`, {
          host: this.host,
          cause: error,
        }),
      );
    }
  }
}

/**
 * Runs `fn` against an open session and tears the session down on every way out.
 */
export async function withSshSession<T>(
  options: SshSessionOptions,
  fn: (session: SshSession) => Promise<T>,
): Promise<T> {
  const session = await SshSession.open(options);
  try {
    return await fn(session);
  } finally {
    await session.cleanup();
  }
}
