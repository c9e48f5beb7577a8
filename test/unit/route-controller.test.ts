/**
 * Unit Tests for RouteController
 *
 * Tests route-state derivation, idempotent switching, failure handling on
 * add/delete, and the tunnel restart that follows every failback attempt.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { InitScriptServiceController, IpRouteTable, RouteController } from '@wanwatch/routing';
import type { Uplink } from '@wanwatch/core';
import { FakeHost } from '../helpers/fake-host.js';
import { createSpyLogger, messages, type SpyLogger } from '../helpers/spy-logger.js';

const primary: Uplink = { role: 'primary', interface: 'eth0', label: 'WAN1' };
const secondary: Uplink = { role: 'secondary', interface: 'eth1', label: 'WAN2' };

describe('RouteController', () => {
  let host: FakeHost;
  let log: SpyLogger;
  let controller: RouteController;

  function build(tunnelService: string | null = 'tailscale'): RouteController {
    const quiet = createSpyLogger();
    return new RouteController(
      new IpRouteTable(host, { logger: quiet }),
      new InitScriptServiceController(host, { initDir: '/etc/init.d' }),
      { primary, secondary, metric: 5, tunnelService, logger: log },
    );
  }

  beforeEach(() => {
    host = new FakeHost(['1.1.1.1']);
    log = createSpyLogger();
    controller = build();
  });

  // ---------------------------------------------------------------------------
  // deriveRouteState
  // ---------------------------------------------------------------------------
  describe('deriveRouteState', () => {
    it('is primary when only foreign-metric routes exist', async () => {
      host
        .addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 20 })
        .addRoute({ iface: 'eth0', gateway: '192.168.1.1', metric: 10 });
      expect(await controller.deriveRouteState()).toBe('primary');
    });

    it('is secondary when the failover route is installed', async () => {
      host.addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 5 });
      expect(await controller.deriveRouteState()).toBe('secondary');
      expect(messages(log.info)).toEqual(['Currently using WAN2 route']);
    });

    it('ignores a metric-5 route on the primary interface', async () => {
      host.addRoute({ iface: 'eth0', gateway: '192.168.1.1', metric: 5 });
      expect(await controller.deriveRouteState()).toBe('primary');
    });
  });

  // ---------------------------------------------------------------------------
  // switchToSecondary
  // ---------------------------------------------------------------------------
  describe('switchToSecondary', () => {
    it('installs the failover route', async () => {
      expect(await controller.switchToSecondary('primary', '192.168.2.1')).toBe('secondary');
      expect(host.routes).toEqual([{ iface: 'eth1', gateway: '192.168.2.1', metric: 5 }]);
      expect(messages(log.info)).toEqual(['Switching to WAN2 (eth1)', 'Successfully switched to WAN2']);
    });

    it('does nothing when already on secondary', async () => {
      expect(await controller.switchToSecondary('secondary', '192.168.2.1')).toBe('secondary');
      expect(host.invocations).toEqual([]);
    });

    it('stays on primary and warns when the add fails', async () => {
      host.failRouteAdd = true;
      expect(await controller.switchToSecondary('primary', '192.168.2.1')).toBe('primary');
      expect(messages(log.warn)).toEqual(['Failed to add WAN2 route']);
    });
  });

  // ---------------------------------------------------------------------------
  // switchToPrimary
  // ---------------------------------------------------------------------------
  describe('switchToPrimary', () => {
    it('removes the failover route and restarts the tunnel', async () => {
      host.addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 5 });
      expect(await controller.switchToPrimary('secondary')).toBe('primary');
      expect(host.hasRoute('eth1', 5)).toBe(false);
      expect(host.restarts).toEqual(['/etc/init.d/tailscale']);
      expect(messages(log.info)).toContain('Successfully restarted tailscale service to switch back to WAN1');
    });

    it('leaves foreign routes in place', async () => {
      host
        .addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 20 })
        .addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 5 });
      await controller.switchToPrimary('secondary');
      expect(host.routes).toEqual([{ iface: 'eth1', gateway: '192.168.2.1', metric: 20 }]);
    });

    it('does nothing when already on primary', async () => {
      expect(await controller.switchToPrimary('primary')).toBe('primary');
      expect(host.invocations).toEqual([]);
      expect(host.restarts).toEqual([]);
    });

    it('stays on secondary but still restarts the tunnel when the delete fails', async () => {
      host.failRouteDel = true;
      host.addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 5 });
      expect(await controller.switchToPrimary('secondary')).toBe('secondary');
      expect(messages(log.warn)).toEqual(['Failed to remove WAN2 route']);
      expect(host.restarts).toEqual(['/etc/init.d/tailscale']);
    });

    it('logs an error when the tunnel restart fails', async () => {
      host.restartExitCode = 1;
      host.addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 5 });
      expect(await controller.switchToPrimary('secondary')).toBe('primary');
      expect(messages(log.error)).toEqual(['Failed to restart tailscale service']);
    });

    it('skips the restart when no tunnel service is configured', async () => {
      controller = build(null);
      host.addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 5 });
      await controller.switchToPrimary('secondary');
      expect(host.restarts).toEqual([]);
    });
  });
});
