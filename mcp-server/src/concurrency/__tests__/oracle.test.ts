/**
 * Concurrency Oracle Tests
 */
import { TableConcurrencyOracle } from '../oracle.js';
import { LogEvent } from '../../event-log/types.js';

function at(time: string): Date {
  return new Date(`2025-03-03T${time}:00.000Z`);
}

function finished(activity: string, start: string, end: string): LogEvent {
  return {
    caseId: 'case-1',
    activity,
    resource: '',
    startTime: at(start),
    endTime: at(end),
    enabledTime: null,
  };
}

const REGISTERED = finished('Register Claim', '08:00', '09:00');

const HISTORY: LogEvent[] = [
  REGISTERED,
  finished('Check Documents', '09:05', '10:00'),
];

function probe(activity: string, time: string) {
  return { activity, startTime: at(time), endTime: at(time) };
}

describe('TableConcurrencyOracle', () => {
  describe('enabledSince', () => {
    it('should use the latest end before the probe', () => {
      const oracle = new TableConcurrencyOracle();
      expect(oracle.enabledSince(HISTORY, probe('Assess Damage', '10:30'))).toEqual(at('10:00'));
    });

    it('should skip activities concurrent with the probe', () => {
      const oracle = new TableConcurrencyOracle({ 'Assess Damage': ['Check Documents'] });
      expect(oracle.enabledSince(HISTORY, probe('Assess Damage', '10:30'))).toEqual(at('09:00'));
    });

    it('should ignore events ending after the probe starts', () => {
      const oracle = new TableConcurrencyOracle();
      expect(oracle.enabledSince(HISTORY, probe('Assess Damage', '09:30'))).toEqual(at('09:00'));
    });

    it('should ignore events that are still running', () => {
      const oracle = new TableConcurrencyOracle();
      const running: LogEvent = { ...REGISTERED, endTime: null };
      expect(oracle.enabledSince([running], probe('Assess Damage', '10:30'))).toBeUndefined();
    });

    it('should return undefined when every candidate is concurrent', () => {
      const oracle = new TableConcurrencyOracle({
        'Assess Damage': ['Register Claim', 'Check Documents'],
      });
      expect(oracle.enabledSince(HISTORY, probe('Assess Damage', '10:30'))).toBeUndefined();
    });
  });

  describe('activity registry', () => {
    it('should know the activities of its table', () => {
      const oracle = new TableConcurrencyOracle({ 'Assess Damage': ['Check Documents'] });
      expect(oracle.hasActivity('Assess Damage')).toBe(true);
      expect(oracle.hasActivity('Check Documents')).toBe(false);
    });

    it('should register an activity with no concurrent activities', () => {
      const oracle = new TableConcurrencyOracle();
      oracle.registerActivity('Notify Customer');
      expect(oracle.hasActivity('Notify Customer')).toBe(true);
      expect(oracle.getConcurrentActivities('Notify Customer')?.size).toBe(0);
    });

    it('should keep existing relations when registering again', () => {
      const oracle = new TableConcurrencyOracle({ 'Assess Damage': ['Check Documents'] });
      oracle.registerActivity('Assess Damage');
      expect(Array.from(oracle.getConcurrentActivities('Assess Damage') ?? [])).toEqual([
        'Check Documents',
      ]);
    });

    it('should export a sorted table', () => {
      const oracle = new TableConcurrencyOracle({ B: ['z', 'a'] });
      oracle.registerActivity('A');
      expect(oracle.toJSON()).toEqual({ B: ['a', 'z'], A: [] });
    });
  });
});
