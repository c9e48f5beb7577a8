/**
 * wanwatch - Component wiring
 *
 * Builds the orchestrator and its collaborators from a validated config.
 */

import type { CommandRunner, PerUplink, Uplink, WanwatchConfig } from '@wanwatch/core';
import { HysteresisTracker, NullLivenessSink, StatusFileSink, type LivenessSink } from '@wanwatch/health';
import { ReachabilityProber } from '@wanwatch/probe';
import { InitScriptServiceController, IpRouteTable, RouteController } from '@wanwatch/routing';
import { FailoverOrchestrator } from './orchestrator.js';

export function uplinksFromConfig(config: WanwatchConfig): PerUplink<Uplink> {
  return {
    primary: { role: 'primary', ...config.uplinks.primary },
    secondary: { role: 'secondary', ...config.uplinks.secondary },
  };
}

export function buildOrchestrator(config: WanwatchConfig, runner: CommandRunner): FailoverOrchestrator {
  const uplinks = uplinksFromConfig(config);

  const table = new IpRouteTable(runner);
  const controller = new RouteController(table, new InitScriptServiceController(runner, { initDir: config.tunnel.initDir }), {
    primary: uplinks.primary,
    secondary: uplinks.secondary,
    metric: config.routing.failoverMetric,
    tunnelService: config.tunnel.enabled ? config.tunnel.service : null,
  });

  const prober = new ReachabilityProber(runner, config.probe);

  const tracker = new HysteresisTracker({
    threshold: config.hysteresis.failureThreshold,
    targetCount: config.probe.targets.length,
    labels: { primary: uplinks.primary.label, secondary: uplinks.secondary.label },
  });

  const liveness: LivenessSink = config.liveness.enabled
    ? new StatusFileSink({
        dir: config.liveness.dir,
        files: { primary: config.liveness.primaryFile, secondary: config.liveness.secondaryFile },
      })
    : new NullLivenessSink();

  return new FailoverOrchestrator({
    table,
    controller,
    prober,
    tracker,
    liveness,
    uplinks,
    intervals: config.intervals,
  });
}
