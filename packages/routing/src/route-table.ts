/**
 * @wanwatch/routing - RouteTable
 *
 * Read and mutate the host's IPv4 default routes through iproute2.
 *
 * Queries never throw for environmental reasons: a failing `ip` invocation is
 * logged and reported as "nothing found". Mutations throw RouteCommandError
 * for any non-zero exit, including the kernel rejecting a duplicate route.
 */

import {
  RouteCommandError,
  createLogger,
  describeError,
  formatCommand,
  isAbortError,
  type CommandResult,
  type CommandRunner,
  type Logger,
} from '@wanwatch/core';
import { parseInterfaceAddresses, parseRouteTable, type RouteEntry } from './ip-parser.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DefaultRouteSpec {
  iface: string;
  gateway: string;
  metric: number;
}

export interface DefaultRouteSelector {
  iface: string;
  metric: number;
}

export interface RouteTable {
  /** IPv4 addresses (CIDR) currently assigned to `iface`. */
  listIpv4Addresses(iface: string, signal?: AbortSignal): Promise<string[]>;
  /** Default routes via `iface`, optionally only those at `metric`. */
  listDefaultRoutes(iface: string, metric?: number, signal?: AbortSignal): Promise<RouteEntry[]>;
  addDefaultRoute(route: DefaultRouteSpec): Promise<void>;
  deleteDefaultRoute(selector: DefaultRouteSelector): Promise<void>;
}

// ---------------------------------------------------------------------------
// IpRouteTable
// ---------------------------------------------------------------------------

export class IpRouteTable implements RouteTable {
  private readonly runner: CommandRunner;
  private readonly ipPath: string;
  private readonly log: Logger;

  constructor(runner: CommandRunner, options: { ipPath?: string; logger?: Logger } = {}) {
    this.runner = runner;
    this.ipPath = options.ipPath ?? 'ip';
    this.log = options.logger ?? createLogger('route-table');
  }

  async listIpv4Addresses(iface: string, signal?: AbortSignal): Promise<string[]> {
    const args = ['-4', 'addr', 'show', 'dev', iface];
    const output = await this.query(args, signal);
    if (output === null) {
      this.log.debug({ iface }, 'Address query failed; treating interface as unaddressed');
      return [];
    }
    return parseInterfaceAddresses(output);
  }

  async listDefaultRoutes(iface: string, metric?: number, signal?: AbortSignal): Promise<RouteEntry[]> {
    const args = ['-4', 'route', 'show', 'default', 'dev', iface];
    const output = await this.query(args, signal);
    if (output === null) {
      this.log.warn({ iface }, 'Route query failed; treating interface as having no default routes');
      return [];
    }

    const routes = parseRouteTable(output, iface).filter((r) => r.destination === 'default');
    return metric === undefined ? routes : routes.filter((r) => r.metric === metric);
  }

  async addDefaultRoute(route: DefaultRouteSpec): Promise<void> {
    await this.mutate([
      'route', 'add', 'default',
      'via', route.gateway,
      'dev', route.iface,
      'metric', String(route.metric),
    ]);
  }

  async deleteDefaultRoute(selector: DefaultRouteSelector): Promise<void> {
    await this.mutate([
      'route', 'del', 'default',
      'dev', selector.iface,
      'metric', String(selector.metric),
    ]);
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  /** Run a read-only query; stdout on success, null on any failure. */
  private async query(args: string[], signal?: AbortSignal): Promise<string | null> {
    try {
      const { stdout, stderr, exitCode } = await this.runner.run(this.ipPath, args, { signal });
      if (exitCode !== 0) {
        this.log.debug({ command: formatCommand(this.ipPath, args), exitCode, stderr: stderr.trim() }, 'ip query failed');
        return null;
      }
      return stdout;
    } catch (err) {
      if (isAbortError(err)) throw err;
      this.log.debug({ command: formatCommand(this.ipPath, args), error: describeError(err) }, 'ip query could not run');
      return null;
    }
  }

  private async mutate(args: string[]): Promise<void> {
    const command = formatCommand(this.ipPath, args);
    let result: CommandResult;
    try {
      result = await this.runner.run(this.ipPath, args);
    } catch (err) {
      throw new RouteCommandError(command, -1, describeError(err));
    }
    if (result.exitCode !== 0) {
      throw new RouteCommandError(command, result.exitCode, result.stderr);
    }
    this.log.debug({ command }, 'Route table updated');
  }
}
