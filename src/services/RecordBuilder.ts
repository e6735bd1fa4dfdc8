import { ExtractedTimes, LeaderboardRecord, LeaderboardRow } from '../types';

/**
 * Identifier for the next row: one past the largest id seen, or 1 for an
 * empty table. Reading the max and inserting are separate calls, so two
 * submissions landing together can get the same id.
 */
export function nextIdentifier(currentMax?: number | null): number {
  if (currentMax === undefined || currentMax === null) {
    return 1;
  }
  return currentMax + 1;
}

export function buildRecord(
  times: ExtractedTimes,
  date: string,
  identifier: number,
  now: Date = new Date()
): LeaderboardRecord {
  return Object.freeze({
    id: identifier,
    date,
    created_at: now.toISOString(),
    times: Object.freeze({ ...times }),
  });
}

/**
 * Flatten a record into the table layout. The id is sent in string form
 * and coerced to the column type by PostgREST.
 */
export function toRow(record: LeaderboardRecord): LeaderboardRow {
  const row: LeaderboardRow = {
    id: String(record.id),
    date: record.date,
    created_at: record.created_at,
  };

  for (const [player, time] of Object.entries(record.times)) {
    row[player] = time;
  }

  return row;
}
