import type { SpreadsheetRow, StreamSnapshot } from './types';

// ISO form is `YYYY-MM-DDTHH:MM:SS.sssZ`, always UTC
function isoUtc(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

export function formatUtcDate(epochSeconds: number): string {
  return isoUtc(epochSeconds).slice(0, 10);
}

export function formatUtcTime(epochSeconds: number): string {
  return isoUtc(epochSeconds).slice(11, 19);
}

export function toSpreadsheetRow(snapshot: StreamSnapshot, link: string): SpreadsheetRow {
  return {
    title: snapshot.title,
    date: formatUtcDate(snapshot.observedAtEpochSeconds),
    time: formatUtcTime(snapshot.observedAtEpochSeconds),
    link
  };
}

export function toRowValues(row: SpreadsheetRow): [string, string, string, string] {
  return [row.title, row.date, row.time, row.link];
}
