import { z } from 'zod';

/**
 * One activity execution of the event log
 */
export interface LogEvent {
  caseId: string;
  /** Activity label as recorded in the log */
  activity: string;
  resource: string;
  startTime: Date;
  /** null while the activity is still running */
  endTime: Date | null;
  enabledTime: Date | null;
}

/**
 * Standard column keys of an event log
 */
export type EventLogColumn =
  | 'case_id'
  | 'activity'
  | 'resource'
  | 'start_time'
  | 'end_time'
  | 'enable_time';

export type EventLogIds = Record<EventLogColumn, string>;

export const EVENT_LOG_COLUMNS: readonly EventLogColumn[] = [
  'case_id',
  'activity',
  'resource',
  'start_time',
  'end_time',
  'enable_time',
];

/**
 * Default column names are the standard keys themselves
 */
export const DEFAULT_EVENT_LOG_IDS: EventLogIds = {
  case_id: 'case_id',
  activity: 'activity',
  resource: 'resource',
  start_time: 'start_time',
  end_time: 'end_time',
  enable_time: 'enable_time',
};

export const REQUIRED_COLUMNS: readonly EventLogColumn[] = ['case_id', 'activity', 'start_time'];

/**
 * Partial mapping from standard key to the CSV's own column name
 */
export const ColumnMappingSchema = z
  .object({
    case_id: z.string().min(1),
    activity: z.string().min(1),
    resource: z.string().min(1),
    start_time: z.string().min(1),
    end_time: z.string().min(1),
    enable_time: z.string().min(1),
  })
  .partial()
  .strict();

export type ColumnMapping = z.infer<typeof ColumnMappingSchema>;

export interface EventLogStats {
  cases: number;
  events: number;
  earliest_start: string | null;
  latest_end: string | null;
}
