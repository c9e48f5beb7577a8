/**
 * @wanwatch/core - TypeBox schema for wanwatch.json
 *
 * Sections: uplinks, routing, probe, hysteresis, intervals, liveness, tunnel
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const SeveritySchema = Type.Union(
  [Type.Literal('debug'), Type.Literal('info'), Type.Literal('warn'), Type.Literal('error')],
  { default: 'info' },
);

const UplinkSchema = Type.Object({
  interface: Type.String({ minLength: 1, description: 'OS interface name, e.g. eth0' }),
  label: Type.String({ minLength: 1, description: 'Short name used in logs, e.g. WAN1' }),
});

const UplinksSchema = Type.Object({
  primary: UplinkSchema,
  secondary: UplinkSchema,
});

const RoutingSchema = Type.Object({
  // Routes printed without a metric parse as metric 0.
  failoverMetric: Type.Integer({
    minimum: 1,
    default: 5,
    description: 'Metric of the default route owned by this controller',
  }),
  foreignMetrics: Type.Array(Type.Integer({ minimum: 0 }), {
    default: [10, 20],
    description: 'Metrics used by other route managers (DHCP hooks, keepalived)',
  }),
});

const ProbeSchema = Type.Object({
  targets: Type.Array(Type.String(), { minItems: 1 }),
  count: Type.Integer({ minimum: 1, default: 3 }),
  timeoutSec: Type.Integer({ minimum: 1, default: 2 }),
});

const HysteresisSchema = Type.Object({
  failureThreshold: Type.Integer({ minimum: 1, default: 3 }),
});

const IntervalsSchema = Type.Object({
  checkMs: Type.Integer({ minimum: 0, default: 1000 }),
  errorMs: Type.Integer({ minimum: 0, default: 15000 }),
});

const LivenessSchema = Type.Object({
  enabled: Type.Boolean({ default: true }),
  dir: Type.String({ default: '/tmp' }),
  primaryFile: Type.String({ default: 'wan1_status' }),
  secondaryFile: Type.String({ default: 'wan2_status' }),
});

const TunnelSchema = Type.Object({
  enabled: Type.Boolean({ default: true }),
  service: Type.String({ default: 'tailscale' }),
  initDir: Type.String({ default: '/etc/init.d' }),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const WanwatchConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  logLevel: SeveritySchema,
  uplinks: UplinksSchema,
  routing: RoutingSchema,
  probe: ProbeSchema,
  hysteresis: HysteresisSchema,
  intervals: IntervalsSchema,
  liveness: LivenessSchema,
  tunnel: TunnelSchema,
});

export type WanwatchConfig = Static<typeof WanwatchConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: WanwatchConfig = {
  logLevel: 'info',
  uplinks: {
    primary: { interface: 'eth0', label: 'WAN1' },
    secondary: { interface: 'eth1', label: 'WAN2' },
  },
  routing: {
    failoverMetric: 5,
    foreignMetrics: [10, 20],
  },
  probe: {
    targets: ['1.1.1.1', '8.8.8.8', '208.67.222.222'],
    count: 3,
    timeoutSec: 2,
  },
  hysteresis: {
    failureThreshold: 3,
  },
  intervals: {
    checkMs: 1000,
    errorMs: 15000,
  },
  liveness: {
    enabled: true,
    dir: '/tmp',
    primaryFile: 'wan1_status',
    secondaryFile: 'wan2_status',
  },
  tunnel: {
    enabled: true,
    service: 'tailscale',
    initDir: '/etc/init.d',
  },
};
