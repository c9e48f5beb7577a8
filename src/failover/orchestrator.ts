/**
 * wanwatch - Failover Orchestrator
 *
 * Drives the polling loop. Each cycle:
 *   1. No IPv4 address on either uplink -> NO_LINK: withdraw liveness slots,
 *      long sleep, no probing.
 *   2. Re-derive route ownership from the live table, then discover the
 *      secondary's gateway. Missing or malformed -> forced failback, long sleep.
 *   3. Probe both uplinks concurrently, update the failure counters, publish
 *      the counts, then apply the decision policy; short sleep.
 *
 * All state that survives a cycle lives in one FailoverState record, passed
 * into runCycle() and returned in its report.
 */

import {
  createLogger,
  isAbortError,
  isValidIpv4,
  sleep as abortableSleep,
  type Logger,
  type PerUplink,
  type RouteState,
  type Uplink,
} from '@wanwatch/core';
import {
  ZERO_COUNTERS,
  type FailureCounters,
  type HysteresisTracker,
  type LivenessSink,
} from '@wanwatch/health';
import type { ReachabilityProber } from '@wanwatch/probe';
import type { RouteController, RouteTable } from '@wanwatch/routing';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LinkState = 'NO_LINK' | 'PRIMARY_ACTIVE' | 'SECONDARY_ACTIVE';

/**
 * What the cycle did:
 *   none            - nothing to change
 *   failover        - tried to install the failover route
 *   failback        - tried to remove it after the primary recovered
 *   forced-failback - tried to remove it because the secondary gateway is unusable
 *   hold            - primary is down but so is the secondary; left as is
 */
export type CycleAction = 'none' | 'failover' | 'failback' | 'forced-failback' | 'hold';

export interface FailoverState {
  route: RouteState;
  counters: FailureCounters;
}

export interface CycleReport {
  linkState: LinkState;
  action: CycleAction;
  /** How long the loop should wait before the next cycle. */
  sleepMs: number;
  /** Secondary gateway as discovered this cycle (null when not reached). */
  gateway: string | null;
  /** Unreachable counts, or null when no probing happened. */
  unreachable: PerUplink<number> | null;
  /** State to pass into the next cycle. */
  state: FailoverState;
}

export interface OrchestratorOptions {
  table: RouteTable;
  controller: RouteController;
  prober: Pick<ReachabilityProber, 'probe'>;
  tracker: HysteresisTracker;
  liveness: LivenessSink;
  uplinks: PerUplink<Uplink>;
  intervals: { checkMs: number; errorMs: number };
  logger?: Logger;
  /** Abortable wait between cycles. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function initialFailoverState(): FailoverState {
  return { route: 'primary', counters: { ...ZERO_COUNTERS } };
}

function linkStateFor(route: RouteState): LinkState {
  return route === 'secondary' ? 'SECONDARY_ACTIVE' : 'PRIMARY_ACTIVE';
}

// ---------------------------------------------------------------------------
// FailoverOrchestrator
// ---------------------------------------------------------------------------

export class FailoverOrchestrator {
  private readonly table: RouteTable;
  private readonly controller: RouteController;
  private readonly prober: Pick<ReachabilityProber, 'probe'>;
  private readonly tracker: HysteresisTracker;
  private readonly liveness: LivenessSink;
  private readonly uplinks: PerUplink<Uplink>;
  private readonly intervals: { checkMs: number; errorMs: number };
  private readonly log: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: OrchestratorOptions) {
    this.table = options.table;
    this.controller = options.controller;
    this.prober = options.prober;
    this.tracker = options.tracker;
    this.liveness = options.liveness;
    this.uplinks = options.uplinks;
    this.intervals = options.intervals;
    this.log = options.logger ?? createLogger('orchestrator');
    this.sleep = options.sleep ?? abortableSleep;
  }

  // -----------------------------------------------------------------------
  // Loop
  // -----------------------------------------------------------------------

  /**
   * Run cycles until `signal` aborts. Resolves on abort; rejects only when a
   * cycle throws something other than an AbortError (a broken contract).
   */
  async run(signal: AbortSignal, initial: FailoverState = initialFailoverState()): Promise<void> {
    this.log.debug('Starting WAN failover loop');
    let state = initial;

    try {
      while (!signal.aborted) {
        const report = await this.runCycle(state, signal);
        state = report.state;
        await this.sleep(report.sleepMs, signal);
      }
    } catch (err) {
      if (isAbortError(err)) return;
      throw err;
    }
  }

  // -----------------------------------------------------------------------
  // Cycle
  // -----------------------------------------------------------------------

  /**
   * Run one cycle from `state`. Rejects with ContractViolationError when
   * `state.counters` lie outside [0, threshold].
   */
  async runCycle(state: FailoverState, signal?: AbortSignal): Promise<CycleReport> {
    const { primary, secondary } = this.uplinks;
    this.tracker.assertCounters(state.counters);

    // ---- 1. Link presence ----

    if (!(await this.hasAnyAddress(signal))) {
      this.log.debug(
        `No IP assigned to either ${primary.interface} or ${secondary.interface}; the router is down or is the HA backup`,
      );
      await this.liveness.clear();
      return {
        linkState: 'NO_LINK',
        action: 'none',
        sleepMs: this.intervals.errorMs,
        gateway: null,
        unreachable: null,
        state,
      };
    }

    // ---- 2. Route ownership and secondary gateway ----

    let route = await this.controller.deriveRouteState(signal);
    const linkState = linkStateFor(route);

    const gateway = await this.discoverSecondaryGateway(signal);
    if (gateway === null || !isValidIpv4(gateway)) {
      this.log.info(
        { iface: secondary.interface, gateway },
        `Invalid or missing gateway IP for ${secondary.interface}: ${gateway ?? ''}`,
      );
      const action: CycleAction = route === 'secondary' ? 'forced-failback' : 'none';
      route = await this.controller.switchToPrimary(route);
      return {
        linkState,
        action,
        sleepMs: this.intervals.errorMs,
        gateway,
        unreachable: null,
        state: { route, counters: state.counters },
      };
    }

    // ---- 3. Probe, debounce, decide ----

    const [primaryReport, secondaryReport] = await Promise.all([
      this.prober.probe(primary.interface, signal),
      this.prober.probe(secondary.interface, signal),
    ]);
    const unreachable: PerUplink<number> = {
      primary: primaryReport.unreachable,
      secondary: secondaryReport.unreachable,
    };

    const counters = this.tracker.update(state.counters, unreachable);
    await this.liveness.publish(unreachable);

    signal?.throwIfAborted();

    let action: CycleAction = 'none';

    if (route === 'primary') {
      if (this.tracker.isDown(counters, 'primary')) {
        if (!this.tracker.isDown(counters, 'secondary')) {
          this.log.info(`${primary.label} failure threshold reached, ${secondary.label} appears healthy`);
          action = 'failover';
          route = await this.controller.switchToSecondary(route, gateway);
        } else {
          this.log.warn(`${primary.label} failure threshold reached, but ${secondary.label} also appears down`);
          action = 'hold';
        }
      }
    } else if (counters.primary === 0) {
      this.log.info(`${primary.label} appears healthy, switching back from ${secondary.label}`);
      action = 'failback';
      route = await this.controller.switchToPrimary(route);
    } else {
      this.log.info(`${primary.label} still down, keeping ${secondary.label} active`);
    }

    return {
      linkState,
      action,
      sleepMs: this.intervals.checkMs,
      gateway,
      unreachable,
      state: { route, counters },
    };
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private async hasAnyAddress(signal?: AbortSignal): Promise<boolean> {
    const { primary, secondary } = this.uplinks;
    if ((await this.table.listIpv4Addresses(primary.interface, signal)).length > 0) return true;
    return (await this.table.listIpv4Addresses(secondary.interface, signal)).length > 0;
  }

  /**
   * The secondary's current gateway: the first default route on the
   * secondary interface at any metric. Null when there is none.
   */
  private async discoverSecondaryGateway(signal?: AbortSignal): Promise<string | null> {
    const routes = await this.table.listDefaultRoutes(this.uplinks.secondary.interface, undefined, signal);
    if (routes.length > 1) {
      this.log.debug(
        { routes: routes.map((r) => ({ gateway: r.gateway, metric: r.metric })) },
        'Several default routes on secondary; using the first',
      );
    }
    return routes[0]?.gateway ?? null;
  }
}
