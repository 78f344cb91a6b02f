import type { Argv } from 'yargs';
import type { SocketPolicy } from '../../types/index.js';
import { parseSocketPolicy } from '../../ssh/socket-policy.js';

/**
 * `--create-socket` takes an optional value: a bare flag means `true`, and
 * `--no-create-socket` arrives here as `false`.
 */
export function toSocketPolicy(value: unknown): SocketPolicy | undefined {
  if (Array.isArray(value) && value.includes(false) && value.some((item) => item !== false)) {
    throw new Error('--no-create-socket cannot be combined with --create-socket');
  }
  const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
  if (last === undefined) return undefined;
  if (last === false) return 'reuse';
  if (last === true || last === '') return 'create';
  return parseSocketPolicy(String(last));
}

/** Repeated string options arrive as a string or an array depending on the count. */
export function toStringList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.map((item) => String(item));
}

export function resolveSocketPolicy(createSocket: SocketPolicy | undefined, reuseSocket: boolean | undefined): SocketPolicy {
  if (reuseSocket) {
    if (createSocket !== undefined && createSocket !== 'reuse') {
      throw new Error('--reuse-socket cannot be combined with --create-socket');
    }
    return 'reuse';
  }
  return createSocket ?? 'infer';
}

export function addSyncOptions<T>(y: Argv<T>) {
  return y
    .option('remote', { type: 'string', describe: 'Remote build service DNS name ($DEVBOX_REAUTH_REMOTE)' })
    .option('credential-helper', {
      type: 'string',
      describe: 'Credential helper executable name ($DEVBOX_REAUTH_CREDENTIAL_HELPER)',
    })
    .option('force', { alias: 'f', type: 'boolean', default: false, describe: 'Log in and push even if the credentials are still valid' })
    .option('force-local', { type: 'boolean', default: false, describe: 'Log in locally even if the local credential is valid' })
    .option('force-remote', { type: 'boolean', default: false, describe: 'Push even if the credential on the host is valid' })
    .option('session-keyring', {
      alias: 's',
      type: 'boolean',
      default: false,
      describe: 'Use the session (rather than user) keyring on the host',
    })
    .option('create-socket', {
      alias: 'c',
      type: 'string',
      describe: 'Create a temporary SSH control socket [values: true, false, infer] (default: infer)',
      coerce: toSocketPolicy,
    })
    .option('reuse-socket', {
      alias: 'C',
      type: 'boolean',
      describe: 'Do not create a temporary SSH control socket (same as --no-create-socket)',
    })
    .option('ssh-arg', {
      alias: 'A',
      type: 'string',
      describe: "Additional ssh argument, repeatable: --ssh-arg='-p 23' --ssh-arg=-4",
      coerce: toStringList,
    })
    .option('verify', { type: 'boolean', default: false, describe: 'Re-check the credential on the host once after pushing' })
    .option('quiet', { alias: 'q', type: 'boolean', default: false, describe: 'Only print the final result' });
}
