/**
 * Spy logger for asserting log lines without pino output.
 */
import { vi, type Mock } from 'vitest';

export interface SpyLogger {
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function createSpyLogger(): SpyLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** The message argument (last string) of every call to one level. */
export function messages(level: Mock): string[] {
  return level.mock.calls.map((args: unknown[]) => {
    const last = args[args.length - 1];
    return typeof last === 'string' ? last : '';
  });
}
