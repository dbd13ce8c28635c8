import { z } from 'zod';

import { LogEvent } from '../event-log/types.js';

/**
 * Synthetic event the oracle is asked about
 */
export interface ProbeEvent {
  activity: string;
  startTime: Date;
  endTime: Date;
}

/**
 * Determines when an activity actually became enabled, correcting for
 * branches that ran concurrently with it.
 *
 * The concurrency table is keyed by activity label. Callers may register a
 * label the oracle has not seen; it then starts with no concurrent activities.
 */
export interface ConcurrencyOracle {
  /** Time the probe's activity became enabled, given the finished history */
  enabledSince(history: readonly LogEvent[], probe: ProbeEvent): Date | undefined;
  hasActivity(activity: string): boolean;
  registerActivity(activity: string): void;
  getConcurrentActivities(activity: string): ReadonlySet<string> | undefined;
}

/**
 * Activity label -> labels that may run concurrently with it
 */
export const ConcurrencyTableSchema = z.record(z.array(z.string()));

export type ConcurrencyTable = z.infer<typeof ConcurrencyTableSchema>;
