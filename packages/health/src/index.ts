/**
 * @wanwatch/health - Failure debouncing and liveness reporting
 *
 * @packageDocumentation
 */

// Hysteresis - debounced per-uplink failure counters
export {
  HysteresisTracker,
  stepCounter,
  assertProbeResult,
  ZERO_COUNTERS,
  type FailureCounters,
  type CounterOutcome,
  type CounterStep,
  type HysteresisOptions,
} from './hysteresis.js';

// Liveness - status slots for an external collector
export {
  StatusFileSink,
  NullLivenessSink,
  type LivenessSink,
  type StatusFileOptions,
} from './liveness.js';
