/**
 * Client for the credential helper executable.
 *
 * `<helper> get` reads `{"uri":"https://<remote>"}` on stdin and exits 0 while the
 * stored credential is still good; otherwise it tells the user to run
 * `<helper> login` on stderr. `<helper> login <remote>` re-authenticates, possibly
 * through a browser.
 */

import { basename } from 'path';
import type { ProcessInvocation, ProcessResult, ProcessRunner } from '../types/index.js';
import { HelperProtocolError, LoginError } from '../errors.js';
import { formatFailure, runProcess } from '../infra/process.js';

export function buildProbeInput(remote: string): string {
  return `${JSON.stringify({ uri: `https://${remote}` })}\n`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches "please run ... <helper> login" anywhere in stderr, across lines and in any
 * case. The helper is matched by its basename since it names itself that way.
 */
export function buildLoginRequiredPattern(helper: string): RegExp {
  return new RegExp(`please\\s+run.*${escapeRegExp(basename(helper))}\\s+login`, 'is');
}

export function localProbe(helper: string): ProcessInvocation {
  return { command: helper, args: ['get'] };
}

/**
 * Asks the helper behind `probe` whether the credential for `remote` needs a login.
 * Any failure that is not the helper asking for a login is an error, never a "yes".
 */
export async function needsRefresh(
  probe: ProcessInvocation,
  remote: string,
  helper: string,
  runner: ProcessRunner = runProcess,
): Promise<boolean> {
  let result: ProcessResult;
  try {
    // stdout carries the credential itself on success; it is never read.
    result = await runner(probe, { input: buildProbeInput(remote), stdout: 'ignore' });
  } catch (error) {
    throw new HelperProtocolError(`failed to run ${helper} get`, { helper, cause: error });
  }

  if (result.code === 0) return false;
  if (buildLoginRequiredPattern(helper).test(result.stderr)) return true;

  throw new HelperProtocolError(formatFailure(`${helper} get`, result), {
    helper,
    stderr: result.stderr,
  });
}

export async function runLogin(helper: string, remote: string, runner: ProcessRunner = runProcess): Promise<void> {
  let result: ProcessResult;
  try {
    result = await runner({ command: helper, args: ['login', remote] }, { stdout: 'inherit', stderr: 'inherit' });
  } catch (error) {
    throw new LoginError(`failed to spawn ${helper}`, { helper, remote, cause: error });
  }

  if (result.code !== 0) {
    throw new LoginError(formatFailure(`${helper} login`, result), { helper, remote });
  }
}
