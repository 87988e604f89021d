import { describe, it, expect } from '@jest/globals';
import { isValidCron, nextRunTime, nextRunTimes, normalizeCron, parseCron } from '../scheduler/cron.js';
import { ConfigError } from '../shared/errors.js';

function at(iso: string): Date {
  return new Date(iso);
}

describe('cron expressions', () => {
  it('expands macros and collapses whitespace', () => {
    expect(normalizeCron('@daily')).toBe('0 0 * * *');
    expect(normalizeCron('@HOURLY')).toBe('0 * * * *');
    expect(normalizeCron('  0   9 * * 1-5 ')).toBe('0 9 * * 1-5');
  });

  it('parses fields into value sets', () => {
    const cron = parseCron('*/20 9-11 1,15 * 1-5');
    expect([...cron.minutes]).toEqual([0, 20, 40]);
    expect([...cron.hours]).toEqual([9, 10, 11]);
    expect([...cron.days]).toEqual([1, 15]);
    expect(cron.months.size).toBe(12);
    expect([...cron.weekdays]).toEqual([1, 2, 3, 4, 5]);
    expect(cron.eitherDay).toBe(true);
  });

  it('rejects malformed expressions', () => {
    expect(isValidCron('0 9 * * 1')).toBe(true);
    expect(isValidCron('61 * * * *')).toBe(false);
    expect(isValidCron('not a cron')).toBe(false);
    expect(() => parseCron('* * *')).toThrow(ConfigError);
    expect(() => parseCron('* * *')).toThrow('Invalid cron expression: * * *');
  });
});

describe('nextRunTime', () => {
  it('finds the next step boundary', () => {
    expect(nextRunTime('*/15 * * * *', at('2026-01-01T10:07:30Z')).toISOString()).toBe(
      '2026-01-01T10:15:00.000Z',
    );
  });

  it('is strictly after the reference time', () => {
    expect(nextRunTime('0 12 * * *', at('2026-01-01T12:00:00Z')).toISOString()).toBe(
      '2026-01-02T12:00:00.000Z',
    );
  });

  it('walks forward to the right weekday', () => {
    expect(nextRunTime('0 9 * * 1', at('2026-01-01T00:00:00Z')).toISOString()).toBe(
      '2026-01-05T09:00:00.000Z',
    );
  });

  it('reaches the next leap day', () => {
    expect(nextRunTime('0 0 29 2 *', at('2026-03-01T00:00:00Z')).toISOString()).toBe(
      '2028-02-29T00:00:00.000Z',
    );
  });

  it('matches either day field when both are restricted', () => {
    expect(nextRunTime('0 0 13 * 5', at('2026-02-01T00:00:00Z')).toISOString()).toBe(
      '2026-02-06T00:00:00.000Z',
    );
  });

  it('gives up on an expression that never fires', () => {
    expect(() => nextRunTime('0 0 31 2 *', at('2026-01-01T00:00:00Z'))).toThrow(
      'Cron expression never fires: 0 0 31 2 *',
    );
  });

  it('lists consecutive firings', () => {
    expect(
      nextRunTimes('0 * * * *', 3, at('2026-01-01T10:30:00Z')).map((d) => d.toISOString()),
    ).toEqual(['2026-01-01T11:00:00.000Z', '2026-01-01T12:00:00.000Z', '2026-01-01T13:00:00.000Z']);
  });
});
