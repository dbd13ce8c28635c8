/**
 * Event log operations: grouping, ordering, cut-off slicing and statistics.
 */

import { LogEvent, EventLogStats } from './types.js';

/**
 * Group events by case id; cases keep the order of their first event
 */
export function groupByCase(events: readonly LogEvent[]): Map<string, LogEvent[]> {
  const cases = new Map<string, LogEvent[]>();
  for (const event of events) {
    const existing = cases.get(event.caseId);
    if (existing) {
      existing.push(event);
    } else {
      cases.set(event.caseId, [event]);
    }
  }
  return cases;
}

/**
 * Events ordered by start time. Ties keep their log order.
 */
export function sortByStartTime(events: readonly LogEvent[]): LogEvent[] {
  return [...events].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
}

/**
 * View of the log as it looked at `cutoff`: events starting later are
 * dropped, and events ending later become ongoing.
 */
export function sliceAt(events: readonly LogEvent[], cutoff: Date): LogEvent[] {
  const limit = cutoff.getTime();
  const sliced: LogEvent[] = [];

  for (const event of events) {
    if (event.startTime.getTime() > limit) continue;

    if (event.endTime !== null && event.endTime.getTime() > limit) {
      sliced.push({ ...event, endTime: null });
    } else {
      sliced.push(event);
    }
  }
  return sliced;
}

export function maxEndTime(events: readonly LogEvent[]): Date | null {
  let latest: Date | null = null;
  for (const event of events) {
    if (event.endTime !== null && (latest === null || event.endTime > latest)) {
      latest = event.endTime;
    }
  }
  return latest;
}

export function minStartTime(events: readonly LogEvent[]): Date | null {
  let earliest: Date | null = null;
  for (const event of events) {
    if (earliest === null || event.startTime < earliest) {
      earliest = event.startTime;
    }
  }
  return earliest;
}

export function computeLogStats(events: readonly LogEvent[]): EventLogStats {
  const earliest = minStartTime(events);
  const latest = maxEndTime(events);
  return {
    cases: new Set(events.map(e => e.caseId)).size,
    events: events.length,
    earliest_start: earliest ? earliest.toISOString() : null,
    latest_end: latest ? latest.toISOString() : null,
  };
}
