import { existsSync } from 'fs';
import { describe, expect, it, vi } from 'vitest';
import { HelperProtocolError, KeychainError, RemoteSyncError, StaleAfterSyncError } from '../../src/errors.js';
import { runSync, syncCredential, type SyncOptions } from '../../src/app/sync-service.js';
import { ControlSocket } from '../../src/ssh/control-socket.js';
import type { SshSessionOptions } from '../../src/ssh/session.js';
import type { ProcessInvocation, RunOptions } from '../../src/types/index.js';
import { classify, createFakeRunner, remoteArgv, type FakeReply } from '../helpers/fake-runner.js';
import { createFakeKeychain } from '../helpers/fake-keychain.js';

const LOGIN_REQUIRED = { code: 1, stderr: 'Please run helper login to continue\n' };

const baseOptions: SyncOptions = {
  remote: 'x.example.com',
  credentialHelper: 'helper',
  keychainService: 'AspectWorkflows',
  keyPrefix: 'keyring-rs',
  keyRealm: 'AspectWorkflows',
  keyring: 'user',
  force: false,
  forceLocal: false,
  forceRemote: false,
  verify: false,
};

interface Replies {
  localGet?: () => FakeReply | Promise<FakeReply>;
  remoteGet?: () => FakeReply | Promise<FakeReply>;
  login?: FakeReply;
  keyctl?: FakeReply;
}

function step(invocation: ProcessInvocation): string {
  const kind = classify(invocation);
  if (kind === 'local') return `local:${invocation.args[0] ?? ''}`;
  if (kind === 'remote') return `remote:${remoteArgv(invocation)[0] ?? ''}:${remoteArgv(invocation)[1] ?? ''}`;
  return kind;
}

function setup(replies: Replies = {}) {
  const sockets: ControlSocket[] = [];
  const runner = createFakeRunner(async (invocation: ProcessInvocation, _options: RunOptions) => {
    switch (step(invocation)) {
      case 'local:get':
        return replies.localGet ? replies.localGet() : {};
      case 'local:login':
        return replies.login ?? {};
      case 'remote:helper:get':
        return replies.remoteGet ? replies.remoteGet() : {};
      case 'remote:keyctl:padd':
        return replies.keyctl ?? {};
      default:
        return {};
    }
  });
  const keychain = createFakeKeychain({ 'AspectWorkflows/x.example.com': 'secret123' });
  const session: SshSessionOptions = {
    host: 'devbox',
    policy: 'create',
    onWarning: vi.fn(),
    socketFactory: (prefix) => {
      const socket = ControlSocket.create(prefix);
      sockets.push(socket);
      return socket;
    },
  };
  const steps = () => runner.mock.calls.map(([invocation]) => step(invocation));
  const keyctlInput = () =>
    runner.mock.calls.find(([invocation]) => step(invocation) === 'remote:keyctl:padd')?.[1]?.input;
  return { runner, keychain, session, sockets, steps, keyctlInput };
}

describe('runSync', () => {
  it('does nothing more when both credentials are valid', async () => {
    const { runner, keychain, session, sockets, steps } = setup();

    const outcome = await runSync(session, baseOptions, { keychain, runner });

    expect(outcome).toEqual({ status: 'fresh' });
    expect(keychain.getPassword).not.toHaveBeenCalled();
    expect(steps()).not.toContain('remote:keyctl:padd');
    expect(steps()).not.toContain('local:login');
    expect(steps().at(-1)).toBe('exit');
    expect(existsSync(sockets[0]?.directory ?? '')).toBe(false);
  });

  it('logs in, fetches and pushes when the helper asks for a login', async () => {
    const { runner, keychain, session, steps, keyctlInput } = setup({
      localGet: () => LOGIN_REQUIRED,
      remoteGet: () => LOGIN_REQUIRED,
    });

    const outcome = await runSync(session, baseOptions, { keychain, runner });

    expect(outcome).toEqual({ status: 'synced', loggedIn: true, verified: false });
    expect(steps()).toContain('local:login');
    expect(keychain.getPassword).toHaveBeenCalledWith('AspectWorkflows', 'x.example.com');
    expect(keyctlInput()).toBe('secret123');
    const login = runner.mock.calls.find(([invocation]) => step(invocation) === 'local:login');
    expect(login?.[0]).toEqual({ command: 'helper', args: ['login', 'x.example.com'] });
  });

  it('pushes the existing credential when only the host is stale', async () => {
    const { runner, keychain, session, steps, keyctlInput } = setup({ remoteGet: () => LOGIN_REQUIRED });

    const outcome = await runSync(session, baseOptions, { keychain, runner });

    expect(outcome).toEqual({ status: 'synced', loggedIn: false, verified: false });
    expect(steps()).not.toContain('local:login');
    expect(keyctlInput()).toBe('secret123');
  });

  it('reports a failed push and still removes the socket directory', async () => {
    const { runner, keychain, session, sockets, steps } = setup({
      remoteGet: () => LOGIN_REQUIRED,
      keyctl: { code: 1, stderr: 'permission denied\n' },
    });

    const syncing = runSync(session, baseOptions, { keychain, runner });

    await expect(syncing).rejects.toBeInstanceOf(RemoteSyncError);
    await expect(syncing).rejects.toThrow('permission denied');
    expect(steps().at(-1)).toBe('exit');
    expect(existsSync(sockets[0]?.directory ?? '')).toBe(false);
  });

  it('tears down after a keychain failure without pushing', async () => {
    const { runner, session, sockets, steps } = setup({ remoteGet: () => LOGIN_REQUIRED });
    const keychain = createFakeKeychain();

    await expect(runSync(session, baseOptions, { keychain, runner })).rejects.toBeInstanceOf(KeychainError);
    expect(steps()).not.toContain('remote:keyctl:padd');
    expect(existsSync(sockets[0]?.directory ?? '')).toBe(false);
  });
});

describe('syncCredential', () => {
  async function withSession<T>(
    replies: Replies,
    fn: (ctx: ReturnType<typeof setup>, run: (options: SyncOptions) => Promise<unknown>) => Promise<T>,
  ): Promise<T> {
    const ctx = setup(replies);
    const shell = {
      host: 'devbox',
      command: (remoteCommand: string, ...remoteArgs: string[]) => ({
        command: 'ssh',
        args: ['-xT', '--', 'devbox', remoteCommand, ...remoteArgs],
      }),
    };
    return fn(ctx, (options) => syncCredential(shell, options, { keychain: ctx.keychain, runner: ctx.runner }));
  }

  it('runs the local and remote checks concurrently', async () => {
    let markRemoteStarted: () => void = () => undefined;
    const remoteStarted = new Promise<void>((resolve) => {
      markRemoteStarted = resolve;
    });

    await withSession(
      {
        localGet: async () => {
          await remoteStarted;
          return {};
        },
        remoteGet: () => {
          markRemoteStarted();
          return {};
        },
      },
      async (_ctx, run) => {
        await expect(run(baseOptions)).resolves.toEqual({ status: 'fresh' });
      },
    );
  });

  it('reports the local failure over a remote one', async () => {
    await withSession(
      {
        localGet: () => ({ code: 2, stderr: 'local helper misconfigured' }),
        remoteGet: () => ({ code: 2, stderr: 'remote helper missing' }),
      },
      async (_ctx, run) => {
        const syncing = run(baseOptions);
        await expect(syncing).rejects.toBeInstanceOf(HelperProtocolError);
        await expect(syncing).rejects.toThrow('local helper misconfigured');
      },
    );
  });

  it('reports a remote failure when the local side succeeds', async () => {
    await withSession({ remoteGet: () => ({ code: 127, stderr: 'bash: helper: command not found' }) }, async (_ctx, run) => {
      await expect(run(baseOptions)).rejects.toThrow('helper get: exit status: 127\n\nbash: helper: command not found');
    });
  });

  it('skips both probes when forced', async () => {
    await withSession({}, async ({ steps, keyctlInput }, run) => {
      await expect(run({ ...baseOptions, force: true })).resolves.toEqual({
        status: 'synced',
        loggedIn: true,
        verified: false,
      });
      expect(steps()).toEqual(['local:login', 'remote:keyctl:padd']);
      expect(keyctlInput()).toBe('secret123');
    });
  });

  it('pushes without logging in when only the remote is forced', async () => {
    await withSession({}, async ({ steps }, run) => {
      await expect(run({ ...baseOptions, forceRemote: true })).resolves.toEqual({
        status: 'synced',
        loggedIn: false,
        verified: false,
      });
      expect(steps()).toEqual(['local:get', 'remote:keyctl:padd']);
    });
  });

  it('logs in and pushes when only the local side is forced', async () => {
    await withSession({}, async ({ steps }, run) => {
      await run({ ...baseOptions, forceLocal: true });
      expect(steps()).toEqual(['local:login', 'remote:helper:get', 'remote:keyctl:padd']);
    });
  });

  it('verifies the pushed credential once', async () => {
    let remoteProbes = 0;
    await withSession(
      {
        remoteGet: () => {
          remoteProbes += 1;
          return remoteProbes === 1 ? LOGIN_REQUIRED : {};
        },
      },
      async (_ctx, run) => {
        await expect(run({ ...baseOptions, verify: true })).resolves.toEqual({
          status: 'synced',
          loggedIn: false,
          verified: true,
        });
        expect(remoteProbes).toBe(2);
      },
    );
  });

  it('fails instead of retrying when the credential stays stale', async () => {
    let remoteProbes = 0;
    await withSession(
      {
        remoteGet: () => {
          remoteProbes += 1;
          return LOGIN_REQUIRED;
        },
      },
      async (_ctx, run) => {
        const syncing = run({ ...baseOptions, verify: true });
        await expect(syncing).rejects.toBeInstanceOf(StaleAfterSyncError);
        await expect(syncing).rejects.toThrow('retry with --force');
        expect(remoteProbes).toBe(2);
      },
    );
  });
});
