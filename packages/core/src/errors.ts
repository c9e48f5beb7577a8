/**
 * @wanwatch/core - Error types
 *
 * Environmental failures (route commands, service restarts, status files)
 * are caught and logged by the component that hits them. Only
 * ContractViolationError and ConfigError are meant to reach the entry point.
 */

export class WanwatchError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WanwatchError';
    this.code = code;
  }
}

/** Invalid configuration, including an unknown log level. Fatal at startup. */
export class ConfigError extends WanwatchError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** An internal hand-off carried a value outside its contract. Fatal. */
export class ContractViolationError extends WanwatchError {
  constructor(message: string) {
    super('CONTRACT_VIOLATION', message);
    this.name = 'ContractViolationError';
  }
}

/** An `ip route` mutation was rejected by the kernel or the tool. */
export class RouteCommandError extends WanwatchError {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    super('ROUTE_COMMAND_FAILED', `"${command}" exited with ${exitCode}: ${stderr.trim() || 'no output'}`);
    this.name = 'RouteCommandError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** The dependent tunnel service could not be restarted. */
export class ServiceRestartError extends WanwatchError {
  constructor(service: string, detail: string) {
    super('SERVICE_RESTART_FAILED', `Failed to restart ${service}: ${detail}`);
    this.name = 'ServiceRestartError';
  }
}

/**
 * Render any thrown value as a single-line message for logs.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  return String(err);
}

/**
 * True when the value is the rejection produced by an aborted signal.
 */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * The error to reject with once `signal` has aborted: its reason when that is
 * already an AbortError, a fresh one otherwise.
 */
export function abortErrorFrom(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error && isAbortError(reason)) return reason;
  const err = new Error('The operation was aborted', { cause: reason });
  err.name = 'AbortError';
  return err;
}
