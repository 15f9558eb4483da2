import { describe, expect, it } from 'vitest';
import {
  addDays,
  compactDay,
  daysBetween,
  enumerateDays,
  isIsoDay,
  localDay,
  midpointDay,
  parseSlashDate,
} from '../dates';

describe('isIsoDay', () => {
  it('accepts real calendar days only', () => {
    expect(isIsoDay('2024-02-29')).toBe(true);
    expect(isIsoDay('2023-02-29')).toBe(false);
    expect(isIsoDay('2024-13-01')).toBe(false);
    expect(isIsoDay('2024-1-01')).toBe(false);
  });
});

describe('day arithmetic', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(addDays('2023-12-31', 1)).toBe('2024-01-01');
  });

  it('counts days in both directions', () => {
    expect(daysBetween('2024-01-01', '2024-12-31')).toBe(365);
    expect(daysBetween('2024-01-10', '2024-01-01')).toBe(-9);
  });

  it('enumerates an inclusive ascending range', () => {
    expect(enumerateDays('2024-02-27', '2024-03-01')).toEqual(['2024-02-27', '2024-02-28', '2024-02-29', '2024-03-01']);
    expect(enumerateDays('2024-03-02', '2024-03-01')).toEqual([]);
  });

  it('picks the midpoint rounded toward the lower bound', () => {
    expect(midpointDay('2024-01-01', '2024-01-04')).toBe('2024-01-02');
    expect(midpointDay('2024-01-01', '2024-01-01')).toBe('2024-01-01');
  });
});

describe('formatting', () => {
  it('compacts ISO days for file names', () => {
    expect(compactDay('2024-01-05')).toBe('20240105');
  });

  it('reads the local calendar day', () => {
    expect(localDay(new Date(2024, 5, 15, 23, 30))).toBe('2024-06-15');
  });

  it('parses DD/MM/YYYY inside free text', () => {
    expect(parseSlashDate('Xalapa, Ver. 03/07/2019')).toBe('2019-07-03');
    expect(parseSlashDate('Xalapa, Ver.')).toBeNull();
  });
});
