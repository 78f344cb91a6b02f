/**
 * Child process runner used for every ssh, helper and keyctl invocation.
 *
 * stdin is fed by its own write, independent of the listeners draining stdout and
 * stderr, so a child that produces output before it has read all of its input
 * cannot stall against us.
 */

import { spawn } from 'child_process';
import type { Writable } from 'stream';
import type { ProcessInvocation, ProcessResult, RunOptions } from '../types/index.js';

export function runProcess(invocation: ProcessInvocation, options: RunOptions = {}): Promise<ProcessResult> {
  const { input, stdout = 'pipe', stderr = 'pipe' } = options;

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(invocation.command, invocation.args, {
      stdio: [input === undefined ? 'ignore' : 'pipe', stdout, stderr],
    });

    let capturedStdout = '';
    let capturedStderr = '';
    let inputError: Error | undefined;

    child.stdout?.setEncoding('utf-8');
    child.stdout?.on('data', (chunk: string) => {
      capturedStdout += chunk;
    });
    child.stderr?.setEncoding('utf-8');
    child.stderr?.on('data', (chunk: string) => {
      capturedStderr += chunk;
    });

    child.on('error', reject);
    child.once('close', (code, signal) => {
      if (inputError) {
        reject(inputError);
        return;
      }
      resolve({ code, signal, stdout: capturedStdout, stderr: capturedStderr });
    });

    if (child.stdin && input !== undefined) {
      writeInput(child.stdin, input).catch((error: unknown) => {
        // The child may exit without reading everything; its exit status is the answer then.
        if (isBrokenPipe(error)) return;
        inputError = error instanceof Error ? error : new Error(String(error));
      });
    }
  });
}

function writeInput(stream: Writable, input: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.on('error', reject);
    stream.once('finish', () => resolve());
    stream.end(input, 'utf-8');
  });
}

function isBrokenPipe(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'EPIPE' || error.code === 'ECONNRESET');
}

/** `exit status: 1`, or `signal: SIGTERM` for a killed child. */
export function describeExit(result: Pick<ProcessResult, 'code' | 'signal'>): string {
  if (result.code !== null) return `exit status: ${result.code}`;
  return `signal: ${result.signal ?? 'unknown'}`;
}

/** One-line failure summary followed by the trimmed stderr, when there is any. */
export function formatFailure(label: string, result: ProcessResult): string {
  const detail = result.stderr.trim();
  const head = `${label}: ${describeExit(result)}`;
  return detail ? `${head}\n\n${detail}` : head;
}
