import type { ProcessRunner, SocketPolicy } from '../types/index.js';
import { buildConfigQuery } from '../infra/ssh.js';
import { formatFailure, runProcess } from '../infra/process.js';

/** Returns the effective ssh configuration for a host, or rejects. */
export type ConfigQuery = (host: string) => Promise<string>;

const CREATE_WORDS = new Set(['y', 'yes', 't', 'true', 'on', '1']);
const REUSE_WORDS = new Set(['n', 'no', 'f', 'false', 'off', '0']);

export function parseSocketPolicy(raw: string): SocketPolicy {
  if (raw === 'infer') return 'infer';
  if (CREATE_WORDS.has(raw)) return 'create';
  if (REUSE_WORDS.has(raw)) return 'reuse';
  throw new Error(`unknown value ${raw} (expected true, false or infer)`);
}

export function createConfigQuery(runner: ProcessRunner = runProcess): ConfigQuery {
  return async (host) => {
    const result = await runner(buildConfigQuery(host));
    if (result.code !== 0) {
      throw new Error(formatFailure('failed to check for existing control socket', result));
    }
    return result.stdout;
  };
}

/**
 * `ssh -G` prints one lowercased `<key> <value>` pair per line, so a line match is enough.
 */
export function declaresOwnMultiplexing(effectiveConfig: string): boolean {
  return effectiveConfig.split(/\r?\n/).some((line) => line.trim().toLowerCase() === 'controlmaster auto');
}

/**
 * Resolves a policy to "create our own control socket?".
 *
 * Inference errs towards creating one: an unneeded socket costs little, and whatever
 * broke the config query will break the real connection too and be reported there.
 */
export async function resolveCreateSocket(
  policy: SocketPolicy,
  host: string,
  query: ConfigQuery = createConfigQuery(),
): Promise<boolean> {
  if (policy === 'create') return true;
  if (policy === 'reuse') return false;

  return query(host).then(
    (effectiveConfig) => !declaresOwnMultiplexing(effectiveConfig),
    () => true,
  );
}
