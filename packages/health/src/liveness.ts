/**
 * @wanwatch/health - Liveness handoff
 *
 * Publishes each cycle's unreachable counts for an external metrics collector
 * and withdraws them when the router has no WAN address (e.g. it is the
 * standby node of an HA pair). Absence of the slots is the standby signal.
 */

import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  UPLINK_ROLES,
  createLogger,
  describeError,
  type Logger,
  type PerUplink,
} from '@wanwatch/core';

export interface LivenessSink {
  /** Record the latest unreachable count per uplink. */
  publish(unreachable: Readonly<PerUplink<number>>): Promise<void>;
  /** Remove both slots. */
  clear(): Promise<void>;
}

/** Sink used when the handoff is disabled in config. */
export class NullLivenessSink implements LivenessSink {
  async publish(): Promise<void> {}
  async clear(): Promise<void> {}
}

export interface StatusFileOptions {
  dir: string;
  files: PerUplink<string>;
  logger?: Logger;
}

/**
 * One file per uplink holding the count as a decimal line. Write and remove
 * failures are logged and otherwise ignored: the collector is an observer,
 * not a dependency.
 */
export class StatusFileSink implements LivenessSink {
  private readonly paths: PerUplink<string>;
  private readonly log: Logger;

  constructor(options: StatusFileOptions) {
    this.paths = {
      primary: join(options.dir, options.files.primary),
      secondary: join(options.dir, options.files.secondary),
    };
    this.log = options.logger ?? createLogger('liveness');
  }

  pathFor(role: keyof PerUplink<string>): string {
    return this.paths[role];
  }

  async publish(unreachable: Readonly<PerUplink<number>>): Promise<void> {
    await Promise.all(
      UPLINK_ROLES.map(async (role) => {
        const path = this.paths[role];
        try {
          await writeFile(path, `${unreachable[role]}\n`, 'utf-8');
        } catch (err) {
          this.log.warn({ path, error: describeError(err) }, 'Failed to write status file');
        }
      }),
    );
  }

  async clear(): Promise<void> {
    await Promise.all(
      UPLINK_ROLES.map(async (role) => {
        const path = this.paths[role];
        try {
          await rm(path, { force: true });
        } catch (err) {
          this.log.warn({ path, error: describeError(err) }, 'Failed to remove status file');
        }
      }),
    );
  }
}
