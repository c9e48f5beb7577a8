/**
 * @wanwatch/probe - ReachabilityProber
 *
 * Pings every reference target through one interface and counts the targets
 * that did not answer. A target is reachable when `ping` exits 0, i.e. at
 * least one of its `count` attempts got a reply within `timeoutSec`.
 *
 * The prober holds only read-only settings, so one instance can serve both
 * uplinks concurrently.
 */

import {
  createLogger,
  describeError,
  formatCommand,
  isAbortError,
  type CommandRunner,
  type Logger,
} from '@wanwatch/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProberSettings {
  /** Reference IPv4 addresses, identical for every interface. */
  targets: readonly string[];
  /** Echo requests per target (`ping -c`). */
  count: number;
  /** Per-attempt reply timeout in seconds (`ping -W`). */
  timeoutSec: number;
  /** Path of the ping binary. Default "ping". */
  pingPath?: string;
}

export interface TargetResult {
  address: string;
  reachable: boolean;
}

export interface ProbeReport {
  interface: string;
  /** Number of targets that never answered, in [0, targets.length]. */
  unreachable: number;
  targets: TargetResult[];
}

// ---------------------------------------------------------------------------
// ReachabilityProber
// ---------------------------------------------------------------------------

export class ReachabilityProber {
  private readonly runner: CommandRunner;
  private readonly settings: Readonly<Required<ProberSettings>>;
  private readonly log: Logger;

  constructor(runner: CommandRunner, settings: ProberSettings, options: { logger?: Logger } = {}) {
    this.runner = runner;
    this.settings = {
      targets: [...settings.targets],
      count: settings.count,
      timeoutSec: settings.timeoutSec,
      pingPath: settings.pingPath ?? 'ping',
    };
    this.log = options.logger ?? createLogger('probe');
  }

  get targetCount(): number {
    return this.settings.targets.length;
  }

  /**
   * Probe all targets through `iface`.
   *
   * Rejects with an AbortError when `signal` fires; any in-flight ping is
   * killed by the runner.
   */
  async probe(iface: string, signal?: AbortSignal): Promise<ProbeReport> {
    const targets: TargetResult[] = [];

    for (const address of this.settings.targets) {
      signal?.throwIfAborted();
      const reachable = await this.ping(iface, address, signal);

      if (reachable) {
        this.log.debug({ iface, target: address }, `${address} is reachable via ${iface}`);
      } else {
        this.log.info({ iface, target: address }, `Cannot reach ${address} via ${iface}`);
      }
      targets.push({ address, reachable });
    }

    return {
      interface: iface,
      unreachable: targets.filter((t) => !t.reachable).length,
      targets,
    };
  }

  private async ping(iface: string, address: string, signal?: AbortSignal): Promise<boolean> {
    const { pingPath, count, timeoutSec } = this.settings;
    const args = ['-I', iface, '-c', String(count), '-W', String(timeoutSec), address];

    try {
      const { exitCode } = await this.runner.run(pingPath, args, { signal });
      return exitCode === 0;
    } catch (err) {
      if (isAbortError(err)) throw err;
      // A ping that cannot start proves nothing about the link; count it as lost.
      this.log.warn(
        { command: formatCommand(pingPath, args), error: describeError(err) },
        'Reachability probe could not run',
      );
      return false;
    }
  }
}
