/**
 * Table-driven concurrency oracle.
 *
 * An activity is enabled by the latest finished event that ended no later
 * than the probe started and whose activity is not concurrent with the
 * probe's activity.
 */

import { LogEvent } from '../event-log/types.js';
import { ConcurrencyOracle, ConcurrencyTable, ProbeEvent } from './types.js';

const NO_CONCURRENCY: ReadonlySet<string> = new Set<string>();

export class TableConcurrencyOracle implements ConcurrencyOracle {
  private readonly concurrency = new Map<string, Set<string>>();

  constructor(table: ConcurrencyTable = {}) {
    for (const [activity, concurrent] of Object.entries(table)) {
      this.concurrency.set(activity, new Set(concurrent));
    }
  }

  enabledSince(history: readonly LogEvent[], probe: ProbeEvent): Date | undefined {
    const concurrent = this.concurrency.get(probe.activity) ?? NO_CONCURRENCY;
    const limit = probe.startTime.getTime();

    let enabled: Date | undefined;
    for (const event of history) {
      if (event.endTime === null || event.endTime.getTime() > limit) continue;
      if (concurrent.has(event.activity)) continue;
      if (enabled === undefined || event.endTime > enabled) {
        enabled = event.endTime;
      }
    }
    return enabled;
  }

  hasActivity(activity: string): boolean {
    return this.concurrency.has(activity);
  }

  registerActivity(activity: string): void {
    if (!this.concurrency.has(activity)) {
      this.concurrency.set(activity, new Set());
    }
  }

  getConcurrentActivities(activity: string): ReadonlySet<string> | undefined {
    return this.concurrency.get(activity);
  }

  toJSON(): ConcurrencyTable {
    const table: ConcurrencyTable = {};
    for (const [activity, concurrent] of this.concurrency) {
      table[activity] = Array.from(concurrent).sort();
    }
    return table;
  }
}
