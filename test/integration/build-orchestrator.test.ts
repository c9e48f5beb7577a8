/**
 * Integration Tests for config-driven wiring
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DEFAULT_CONFIG, setLogLevel, type WanwatchConfig } from '@wanwatch/core';
import { buildOrchestrator, uplinksFromConfig } from '../../src/failover/build.js';
import { initialFailoverState } from '../../src/failover/orchestrator.js';
import { FakeHost } from '../helpers/fake-host.js';

describe('buildOrchestrator', () => {
  let tempDir: string;
  let config: WanwatchConfig;
  let host: FakeHost;

  beforeEach(async () => {
    setLogLevel('error');
    tempDir = await mkdtemp(join(tmpdir(), 'wanwatch-build-test-'));
    config = structuredClone(DEFAULT_CONFIG);
    config.probe.targets = ['192.0.2.1', '198.51.100.1'];
    config.liveness.dir = tempDir;
    host = new FakeHost(config.probe.targets)
      .setAddress('eth0', '192.168.1.2/24')
      .setAddress('eth1', '192.168.2.10/24')
      .addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 20 });
  });

  afterEach(async () => {
    setLogLevel('info');
    await rm(tempDir, { recursive: true, force: true });
  });

  it('derives uplinks from config', () => {
    expect(uplinksFromConfig(config)).toEqual({
      primary: { role: 'primary', interface: 'eth0', label: 'WAN1' },
      secondary: { role: 'secondary', interface: 'eth1', label: 'WAN2' },
    });
  });

  it('writes the status files into the configured directory', async () => {
    host.setUnreachableCount('eth1', 2);
    const report = await buildOrchestrator(config, host).runCycle(initialFailoverState());
    expect(report.unreachable).toEqual({ primary: 0, secondary: 2 });
    expect(await readFile(join(tempDir, 'wan1_status'), 'utf-8')).toBe('0\n');
    expect(await readFile(join(tempDir, 'wan2_status'), 'utf-8')).toBe('2\n');
  });

  it('uses the configured metric, probe settings and threshold', async () => {
    config.routing.failoverMetric = 7;
    config.probe.count = 1;
    config.hysteresis.failureThreshold = 1;
    host.setUnreachableCount('eth0', 2);

    const report = await buildOrchestrator(config, host).runCycle(initialFailoverState());
    expect(report.action).toBe('failover');
    expect(host.hasRoute('eth1', 7)).toBe(true);
    expect(host.invocations.find((c) => c.file === 'ping')?.args).toEqual(['-I', 'eth0', '-c', '1', '-W', '2', '192.0.2.1']);
  });

  it('skips the tunnel restart when the tunnel is disabled', async () => {
    config.tunnel.enabled = false;
    host.addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 5 });
    const report = await buildOrchestrator(config, host).runCycle(initialFailoverState());
    expect(report.action).toBe('failback');
    expect(host.restarts).toEqual([]);
  });

  it('restarts the configured service from the configured init directory', async () => {
    config.tunnel.service = 'wireguard';
    config.tunnel.initDir = '/etc/rc.d';
    host.addRoute({ iface: 'eth1', gateway: '192.168.2.1', metric: 5 });
    await buildOrchestrator(config, host).runCycle(initialFailoverState());
    expect(host.restarts).toEqual(['/etc/rc.d/wireguard']);
  });
});
