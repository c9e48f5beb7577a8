/**
 * @wanwatch/core - Shared foundation for the wanwatch daemon
 *
 * Config, logging, errors, the command runner seam and small utilities.
 */

// Types
export * from './types/index.js';

// Configuration
export * from './config/index.js';

// Logging
export * from './logging/index.js';

// Errors
export * from './errors.js';

// Host commands
export {
  SystemCommandRunner,
  formatCommand,
  type CommandRunner,
  type CommandResult,
  type RunOptions,
} from './exec/command-runner.js';

// Network helpers
export { isValidIpv4 } from './net/ipv4.js';

// Utilities
export { sleep, truncate, isPlainObject, deepMerge } from './utils/index.js';
