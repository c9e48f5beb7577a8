/**
 * wanwatch - Main Entry Point
 *
 * Boots the failover daemon:
 *   1. Load and validate configuration
 *   2. Apply the log level
 *   3. Wire the orchestrator
 *   4. Run the polling loop until SIGINT/SIGTERM
 */

import {
  ConfigError,
  SystemCommandRunner,
  createLogger,
  describeError,
  loadConfig,
  rootLogger,
  setLogLevel,
} from '@wanwatch/core';
import { buildOrchestrator } from './failover/build.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const VERSION = '1.0.0';

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

async function main(): Promise<number> {
  // ---- 1. Config ----

  const { config, warnings, source } = await loadConfig();

  // ---- 2. Logging ----

  setLogLevel(config.logLevel);
  const log = createLogger('main');

  log.info({ version: VERSION, config: source ?? 'defaults' }, 'wanwatch starting');
  for (const warn of warnings) {
    log.warn({ path: warn.path }, `Config warning: ${warn.message}`);
  }

  // ---- 3. Wiring ----

  const orchestrator = buildOrchestrator(config, new SystemCommandRunner());

  // ---- 4. Signals ----

  const controller = new AbortController();

  function shutdown(signal: NodeJS.Signals): void {
    if (controller.signal.aborted) return;
    log.info({ signal }, 'Received signal, stopping probes and exiting');
    controller.abort();
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    log.error({ error: describeError(reason) }, 'Unhandled rejection');
  });

  // ---- 5. Loop ----

  log.info(
    {
      primary: config.uplinks.primary.interface,
      secondary: config.uplinks.secondary.interface,
      metric: config.routing.failoverMetric,
      threshold: config.hysteresis.failureThreshold,
    },
    'Monitoring uplinks',
  );

  await orchestrator.run(controller.signal);

  log.info('Shutdown complete');
  return 0;
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof ConfigError) {
      rootLogger.fatal({ issues: err.issues }, err.message);
    } else {
      rootLogger.fatal({ error: describeError(err) }, 'Fatal error, exiting');
    }
    process.exit(1);
  },
);
