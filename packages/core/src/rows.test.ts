import { describe, expect, it } from 'vitest';
import { formatUtcDate, formatUtcTime, toRowValues, toSpreadsheetRow } from './rows';

describe('spreadsheet rows', () => {
  it('formats date and time in UTC', () => {
    expect(formatUtcDate(1700000000)).toBe('2023-11-14');
    expect(formatUtcTime(1700000000)).toBe('22:13:20');
  });

  it('zero-pads single digit fields', () => {
    expect(formatUtcDate(1704157445)).toBe('2024-01-02');
    expect(formatUtcTime(1704157445)).toBe('01:04:05');
  });

  it('builds a row per link in column order', () => {
    const snapshot = {
      title: 'Building things live',
      observedAtEpochSeconds: 1700000000,
      links: ['https://example.com/a', 'https://example.org/b']
    };

    const row = toSpreadsheetRow(snapshot, 'https://example.org/b');

    expect(row).toEqual({
      title: 'Building things live',
      date: '2023-11-14',
      time: '22:13:20',
      link: 'https://example.org/b'
    });
    expect(toRowValues(row)).toEqual(['Building things live', '2023-11-14', '22:13:20', 'https://example.org/b']);
  });
});
