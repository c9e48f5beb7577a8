/**
 * @wanwatch/probe - Reachability probing through a specific uplink
 *
 * @packageDocumentation
 */

export {
  ReachabilityProber,
  type ProberSettings,
  type ProbeReport,
  type TargetResult,
} from './prober.js';
