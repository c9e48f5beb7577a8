/**
 * @wanwatch/core - CommandRunner
 *
 * Runs the OS tools the daemon depends on (`ip`, `ping`, init scripts):
 *   - argv array, no shell
 *   - stdout/stderr collected as UTF-8
 *   - optional hard timeout (SIGKILL)
 *   - AbortSignal integration: aborting kills the child and rejects
 *
 * Everything that touches the host goes through this interface so tests can
 * substitute a scripted runner.
 */

import { spawn } from 'node:child_process';
import type { Logger } from '../logging/index.js';
import { createLogger } from '../logging/index.js';
import { abortErrorFrom } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunOptions {
  /** Kill the child after this many ms. No limit when omitted. */
  timeoutMs?: number;
  /** Aborting kills the child and rejects with an AbortError. */
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Process exit code; 137 when killed on timeout. */
  exitCode: number;
}

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/** Render an argv for logs and error messages. */
export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].join(' ');
}

// ---------------------------------------------------------------------------
// SystemCommandRunner
// ---------------------------------------------------------------------------

export class SystemCommandRunner implements CommandRunner {
  private readonly log: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.log = options.logger ?? createLogger('exec');
  }

  run(file: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const { timeoutMs, signal } = options;

    return new Promise<CommandResult>((resolve, reject) => {
      const proc = spawn(file, args, {
        env: process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        signal,
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      proc.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      proc.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      let timer: ReturnType<typeof setTimeout> | undefined;
      let timedOut = false;

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          this.log.warn({ command: formatCommand(file, args), timeoutMs }, 'Killing timed-out process');
          proc.kill('SIGKILL');
        }, timeoutMs);
      }

      // spawn() reports an abort only while it can still kill the child.
      const onAbort = (): void => {
        if (timer !== undefined) clearTimeout(timer);
        reject(abortErrorFrom(signal));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      proc.on('close', (code) => {
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (signal?.aborted) {
          reject(abortErrorFrom(signal));
          return;
        }
        resolve({
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
          exitCode: timedOut ? 137 : code ?? 1,
        });
      });

      proc.on('error', (err) => {
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        reject(err);
      });
    });
  }
}
