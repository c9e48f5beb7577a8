/**
 * @wanwatch/routing - RouteController
 *
 * Owns exactly one route: `default via <gw> dev <secondary> metric <failoverMetric>`.
 * Other actors (DHCP hooks, keepalived, HA scripts) manage default routes at
 * their own metrics; this controller neither reads nor touches those.
 *
 * The controller keeps no state between calls. The caller passes the current
 * RouteState (re-derived from the live table every cycle) and receives the
 * state after the attempt:
 *
 *   - switchToSecondary: no-op unless on primary; add the route; on failure
 *     stay on primary and warn.
 *   - switchToPrimary: no-op unless on secondary; delete the route; on
 *     failure stay on secondary and warn. Either way, restart the tunnel
 *     service; a failed restart is logged at error and changes nothing.
 */

import {
  createLogger,
  describeError,
  type Logger,
  type RouteState,
  type Uplink,
} from '@wanwatch/core';
import type { RouteTable } from './route-table.js';
import type { ServiceController } from './service-control.js';

export interface RouteControllerOptions {
  primary: Uplink;
  secondary: Uplink;
  /** Metric reserved for the failover route. */
  metric: number;
  /** Service to restart after failback; null to skip. */
  tunnelService: string | null;
  logger?: Logger;
}

export class RouteController {
  private readonly table: RouteTable;
  private readonly services: ServiceController;
  private readonly primary: Uplink;
  private readonly secondary: Uplink;
  private readonly metric: number;
  private readonly tunnelService: string | null;
  private readonly log: Logger;

  constructor(table: RouteTable, services: ServiceController, options: RouteControllerOptions) {
    this.table = table;
    this.services = services;
    this.primary = options.primary;
    this.secondary = options.secondary;
    this.metric = options.metric;
    this.tunnelService = options.tunnelService;
    this.log = options.logger ?? createLogger('route-controller');
  }

  /**
   * Read the live table: "secondary" iff our failover route is installed.
   */
  async deriveRouteState(signal?: AbortSignal): Promise<RouteState> {
    const owned = await this.table.listDefaultRoutes(this.secondary.interface, this.metric, signal);
    if (owned.length > 0) {
      this.log.info(
        { iface: this.secondary.interface, metric: this.metric, gateway: owned[0]?.gateway ?? null },
        `Currently using ${this.secondary.label} route`,
      );
      return 'secondary';
    }
    this.log.debug('Currently using default routes not set by wanwatch');
    return 'primary';
  }

  async switchToSecondary(state: RouteState, gateway: string): Promise<RouteState> {
    if (state === 'secondary') return state;

    const { label, interface: iface } = this.secondary;
    this.log.info({ iface, gateway, metric: this.metric }, `Switching to ${label} (${iface})`);

    try {
      await this.table.addDefaultRoute({ iface, gateway, metric: this.metric });
    } catch (err) {
      this.log.warn({ iface, gateway, error: describeError(err) }, `Failed to add ${label} route`);
      return state;
    }

    this.log.info({ iface, gateway }, `Successfully switched to ${label}`);
    return 'secondary';
  }

  async switchToPrimary(state: RouteState): Promise<RouteState> {
    if (state !== 'secondary') return state;

    const { label, interface: iface } = this.secondary;
    this.log.info(
      { iface: this.primary.interface },
      `Switching back to ${this.primary.label} (${this.primary.interface})`,
    );

    let next: RouteState = state;
    try {
      await this.table.deleteDefaultRoute({ iface, metric: this.metric });
      next = 'primary';
      this.log.info(`Successfully switched back to ${this.primary.label}`);
    } catch (err) {
      this.log.warn({ iface, error: describeError(err) }, `Failed to remove ${label} route`);
    }

    await this.restartTunnel();
    return next;
  }

  private async restartTunnel(): Promise<void> {
    if (!this.tunnelService) return;
    const service = this.tunnelService;

    try {
      await this.services.restart(service);
      this.log.info(
        { service },
        `Successfully restarted ${service} service to switch back to ${this.primary.label}`,
      );
    } catch (err) {
      this.log.error({ service, error: describeError(err) }, `Failed to restart ${service} service`);
    }
  }
}
