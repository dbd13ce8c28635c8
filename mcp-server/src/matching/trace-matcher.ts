import { Marking } from '../reachability/types.js';

/**
 * Label placed before the first activity of every trace handed to a matcher
 */
export const TRACE_START = 'DEFAULT_TRACE_START_LABEL';

/**
 * Maps a prefix of executed activity labels to the most plausible marking.
 *
 * Input is the ordered list of activity labels, starting with TRACE_START.
 * A trace the matcher cannot place yields an empty marking.
 */
export interface TraceMatcher {
  getBestMarkingStateFor(trace: readonly string[]): Marking;
}
