import { LeaderboardRow, PlayerRoster, RecentEntriesView, RecentEntry } from '../types';

/**
 * Shape stored rows for display: id, date and the roster columns that
 * appear in at least one row, with empty cells as "".
 */
export function projectRecentEntries(rows: LeaderboardRow[], roster: PlayerRoster): RecentEntriesView {
  const players = roster
    .map((entry) => entry.name)
    .filter((name) => rows.some((row) => name in row));

  const entries = rows.map((row) => {
    const entry: RecentEntry = { id: Number(row.id), date: row.date };
    for (const name of players) {
      entry[name] = row[name] ?? '';
    }
    return entry;
  });

  return { columns: ['id', 'date', ...players], entries };
}
