/**
 * Event Log Reader
 *
 * Reads a CSV event log (header row + one row per activity execution) into
 * LogEvent records, renaming columns through an optional mapping.
 *
 * Case id, activity and start time columns are required. Resource, end time
 * and enabled time columns may be absent. Empty time cells mean "no value",
 * and so do unreadable optional timestamps.
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import { getLogger } from '../logging/audit.js';
import { parseUtcTimestamp } from './timestamps.js';
import {
  LogEvent,
  EventLogColumn,
  EventLogIds,
  ColumnMapping,
  DEFAULT_EVENT_LOG_IDS,
  EVENT_LOG_COLUMNS,
  REQUIRED_COLUMNS,
} from './types.js';

/**
 * Raised when an event log cannot be read or a required value is unusable
 */
export class EventLogError extends Error {
  readonly line?: number;
  readonly column?: string;

  constructor(message: string, location: { line?: number; column?: string } = {}) {
    super(`Invalid event log: ${message}`);
    this.name = 'EventLogError';
    if (location.line !== undefined) {
      this.line = location.line;
    }
    if (location.column !== undefined) {
      this.column = location.column;
    }
  }
}

const log = getLogger('event-log');

const RowsSchema = z.array(z.array(z.string()));

/**
 * Merge a partial mapping over the default column names
 */
export function resolveEventLogIds(mapping: ColumnMapping = {}): EventLogIds {
  const ids: EventLogIds = { ...DEFAULT_EVENT_LOG_IDS };
  for (const key of EVENT_LOG_COLUMNS) {
    const column = mapping[key];
    if (column !== undefined) {
      ids[key] = column;
    }
  }
  return ids;
}

function readRequiredTime(value: string | undefined, column: string, line: number): Date {
  if (value === undefined || value.length === 0) {
    throw new EventLogError('start time is required', { line, column });
  }
  const timestamp = parseUtcTimestamp(value);
  if (timestamp === null) {
    throw new EventLogError(`'${value}' is not a valid timestamp`, { line, column });
  }
  return timestamp;
}

function readOptionalTime(value: string | undefined, column: string, line: number): Date | null {
  if (value === undefined || value.length === 0) {
    return null;
  }
  const timestamp = parseUtcTimestamp(value);
  if (timestamp === null) {
    log.debug('Unreadable timestamp treated as missing', { line, column, value });
  }
  return timestamp;
}

/**
 * Parse CSV text into log events, in file order
 */
export function parseEventLog(csv: string, mapping?: ColumnMapping): LogEvent[] {
  const ids = resolveEventLogIds(mapping);

  let rows: string[][];
  try {
    const parsed: unknown = parse(csv, { bom: true, trim: true, skip_empty_lines: true });
    rows = RowsSchema.parse(parsed);
  } catch (error) {
    throw new EventLogError(error instanceof Error ? error.message : String(error));
  }

  const [header, ...records] = rows;
  if (!header) {
    throw new EventLogError('file is empty');
  }

  const positions = new Map<EventLogColumn, number>();
  for (const key of EVENT_LOG_COLUMNS) {
    const index = header.indexOf(ids[key]);
    if (index >= 0) {
      positions.set(key, index);
    } else if (REQUIRED_COLUMNS.includes(key)) {
      throw new EventLogError(`missing required column '${ids[key]}'`, { column: ids[key] });
    }
  }

  const cell = (record: string[], key: EventLogColumn): string | undefined => {
    const index = positions.get(key);
    return index === undefined ? undefined : record[index];
  };

  return records.map((record, index) => {
    const line = index + 2;
    const caseId = cell(record, 'case_id') ?? '';
    const activity = cell(record, 'activity') ?? '';
    if (caseId.length === 0 || activity.length === 0) {
      throw new EventLogError('case id and activity must not be empty', { line });
    }

    const startTime = readRequiredTime(cell(record, 'start_time'), ids.start_time, line);

    return {
      caseId,
      activity,
      resource: cell(record, 'resource') ?? '',
      startTime,
      endTime: readOptionalTime(cell(record, 'end_time'), ids.end_time, line),
      enabledTime: readOptionalTime(cell(record, 'enable_time'), ids.enable_time, line),
    };
  });
}

/**
 * Read and parse an event log file
 */
export async function readEventLog(path: string, mapping?: ColumnMapping): Promise<LogEvent[]> {
  let csv: string;
  try {
    csv = await readFile(path, 'utf-8');
  } catch (error) {
    throw new EventLogError(
      `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseEventLog(csv, mapping);
}
