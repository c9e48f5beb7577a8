/**
 * @wanwatch/routing - Dependent service control
 *
 * The tunnel daemon (tailscale by default) binds to whichever uplink carried
 * traffic when it started, so it has to be restarted after a failback.
 */

import { ServiceRestartError, truncate, type CommandRunner } from '@wanwatch/core';
import { join } from 'node:path';

export interface ServiceController {
  /** Restart `service`. Rejects with ServiceRestartError on failure. */
  restart(service: string): Promise<void>;
}

const SERVICE_NAME_RE = /^[A-Za-z0-9._-]+$/;

/**
 * Restarts services through their init script: `<initDir>/<service> restart`
 * (OpenWrt procd and SysV style).
 */
export class InitScriptServiceController implements ServiceController {
  private readonly runner: CommandRunner;
  private readonly initDir: string;
  private readonly timeoutMs: number;

  constructor(runner: CommandRunner, options: { initDir?: string; timeoutMs?: number } = {}) {
    this.runner = runner;
    this.initDir = options.initDir ?? '/etc/init.d';
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async restart(service: string): Promise<void> {
    if (!SERVICE_NAME_RE.test(service) || service === '.' || service === '..') {
      throw new ServiceRestartError(service, 'invalid service name');
    }

    const script = join(this.initDir, service);
    let exitCode: number;
    let stderr: string;
    try {
      ({ exitCode, stderr } = await this.runner.run(script, ['restart'], { timeoutMs: this.timeoutMs }));
    } catch (err) {
      throw new ServiceRestartError(service, err instanceof Error ? err.message : String(err));
    }

    if (exitCode !== 0) {
      const detail = stderr.trim() ? `exit ${exitCode}: ${truncate(stderr.trim(), 200)}` : `exit ${exitCode}`;
      throw new ServiceRestartError(service, detail);
    }
  }
}
