/**
 * @wanwatch/core - Configuration validator
 *
 * Validates a WanwatchConfig object using TypeBox, then applies the rules
 * the schema cannot express (distinct interfaces, IPv4 targets, metric
 * collisions, interval ordering).
 */

import { Value } from '@sinclair/typebox/value';
import { WanwatchConfigSchema, DEFAULT_CONFIG, type WanwatchConfig } from './schema.js';
import { isValidIpv4 } from '../net/ipv4.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  config: WanwatchConfig;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Validate and normalise a raw config object.
 *
 * 1. TypeBox schema check
 * 2. Business rules
 *
 * `config` is only meaningful when `valid` is true.
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const withDefaults = Value.Default(WanwatchConfigSchema, Value.Clone(raw));

  // ----- TypeBox schema validation -----
  for (const err of Value.Errors(WanwatchConfigSchema, withDefaults)) {
    errors.push({ path: err.path, message: err.message });
  }

  if (!Value.Check(WanwatchConfigSchema, withDefaults)) {
    return { valid: false, errors, warnings, config: structuredClone(DEFAULT_CONFIG) };
  }

  const config: WanwatchConfig = withDefaults;

  // ----- Business rules -----
  if (config.uplinks.primary.interface === config.uplinks.secondary.interface) {
    errors.push({
      path: '/uplinks/secondary/interface',
      message: `Primary and secondary uplinks must use different interfaces (both are "${config.uplinks.primary.interface}")`,
    });
  }

  config.probe.targets.forEach((target, i) => {
    if (!isValidIpv4(target)) {
      errors.push({
        path: `/probe/targets/${i}`,
        message: `Probe target "${target}" is not a dotted-quad IPv4 address`,
      });
    }
  });

  if (new Set(config.probe.targets).size !== config.probe.targets.length) {
    warnings.push({
      path: '/probe/targets',
      message: 'Probe targets contain duplicates; each duplicate counts separately',
    });
  }

  if (config.probe.targets.length < 2) {
    warnings.push({
      path: '/probe/targets',
      message: 'With fewer than two targets no cycle can exceed one unreachable target, so failover never triggers',
    });
  }

  if (config.routing.foreignMetrics.includes(config.routing.failoverMetric)) {
    errors.push({
      path: '/routing/failoverMetric',
      message: `Failover metric ${config.routing.failoverMetric} collides with a metric used by another route manager`,
    });
  }

  if (config.intervals.errorMs < config.intervals.checkMs) {
    warnings.push({
      path: '/intervals/errorMs',
      message: `errorMs (${config.intervals.errorMs}) is shorter than checkMs (${config.intervals.checkMs})`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}
