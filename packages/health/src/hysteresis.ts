/**
 * @wanwatch/health - HysteresisTracker
 *
 * Turns per-cycle unreachable counts into debounced consecutive-failure
 * counters, one per uplink.
 *
 *   unreachable > 1  -> failure: counter + 1, saturating at the threshold
 *   unreachable == 1 -> noise: counter unchanged
 *   unreachable == 0 -> success: counter reset to 0
 *
 * An uplink whose counter equals the threshold is "down". The tracker keeps
 * no state of its own: the orchestrator owns the counters and passes them in.
 */

import {
  ContractViolationError,
  UPLINK_ROLES,
  createLogger,
  type Logger,
  type PerUplink,
  type UplinkRole,
} from '@wanwatch/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FailureCounters = PerUplink<number>;

/** How one cycle's result moved a counter. */
export type CounterOutcome = 'failure' | 'noise' | 'restored' | 'healthy';

export interface CounterStep {
  count: number;
  outcome: CounterOutcome;
}

export interface HysteresisOptions {
  /** Consecutive failing cycles before an uplink is down. */
  threshold: number;
  /** Size of the probe target set; results above it break the contract. */
  targetCount: number;
  /** Log label per role, e.g. { primary: 'WAN1', secondary: 'WAN2' }. */
  labels?: PerUplink<string>;
  logger?: Logger;
}

export const ZERO_COUNTERS: Readonly<FailureCounters> = Object.freeze({ primary: 0, secondary: 0 });

// ---------------------------------------------------------------------------
// Pure step
// ---------------------------------------------------------------------------

/**
 * Advance one counter by one cycle's unreachable count.
 */
export function stepCounter(count: number, unreachable: number, threshold: number): CounterStep {
  if (unreachable > 1) {
    return { count: Math.min(count + 1, threshold), outcome: 'failure' };
  }
  if (unreachable === 1) {
    return { count, outcome: 'noise' };
  }
  if (count > 0) {
    return { count: 0, outcome: 'restored' };
  }
  return { count: 0, outcome: 'healthy' };
}

/**
 * Check a probe result against its contract: an integer in [0, targetCount].
 */
export function assertProbeResult(value: unknown, targetCount: number, role: UplinkRole): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > targetCount) {
    throw new ContractViolationError(
      `Invalid unreachable count for ${role} uplink: ${JSON.stringify(value)} (expected an integer in 0..${targetCount})`,
    );
  }
  return value;
}

// ---------------------------------------------------------------------------
// HysteresisTracker
// ---------------------------------------------------------------------------

export class HysteresisTracker {
  readonly threshold: number;
  private readonly targetCount: number;
  private readonly labels: PerUplink<string>;
  private readonly log: Logger;

  constructor(options: HysteresisOptions) {
    if (!Number.isInteger(options.threshold) || options.threshold < 1) {
      throw new ContractViolationError(`Failure threshold must be a positive integer, got ${options.threshold}`);
    }
    this.threshold = options.threshold;
    this.targetCount = options.targetCount;
    this.labels = options.labels ?? { primary: 'primary', secondary: 'secondary' };
    this.log = options.logger ?? createLogger('hysteresis');
  }

  /**
   * Apply one cycle of results to `counters` and return the new counters.
   *
   * Throws ContractViolationError when a result is not an integer in
   * [0, targetCount].
   */
  update(counters: Readonly<FailureCounters>, unreachable: Readonly<PerUplink<unknown>>): FailureCounters {
    const next: FailureCounters = { ...counters };

    for (const role of UPLINK_ROLES) {
      const count = assertProbeResult(unreachable[role], this.targetCount, role);
      const step = stepCounter(counters[role], count, this.threshold);
      next[role] = step.count;

      const label = this.labels[role];
      if (step.outcome === 'failure') {
        this.log.warn(
          { uplink: role, unreachable: count, failures: step.count, threshold: this.threshold },
          `${label} connectivity check failed (${step.count}/${this.threshold} failures)`,
        );
      } else if (step.outcome === 'restored') {
        this.log.info({ uplink: role }, `${label} connectivity restored, resetting failure counter`);
      }
    }

    return next;
  }

  /**
   * Check counters handed in from outside the tracker: each an integer in
   * [0, threshold]. Throws ContractViolationError otherwise.
   */
  assertCounters(counters: Readonly<PerUplink<unknown>>): FailureCounters {
    const checked: FailureCounters = { primary: 0, secondary: 0 };
    for (const role of UPLINK_ROLES) {
      const value = counters[role];
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > this.threshold) {
        throw new ContractViolationError(
          `Invalid failure counter for ${role} uplink: ${JSON.stringify(value)} (expected an integer in 0..${this.threshold})`,
        );
      }
      checked[role] = value;
    }
    return checked;
  }

  /** Whether an uplink's counter has reached the threshold. */
  isDown(counters: Readonly<FailureCounters>, role: UplinkRole): boolean {
    return counters[role] >= this.threshold;
  }
}
