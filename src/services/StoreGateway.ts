import { InsertOutcome, LeaderboardRecord, LeaderboardRow } from '../types';

/**
 * Access to the table of leaderboard submissions. Every method reports
 * failure through its return value instead of throwing.
 */
export interface StoreGateway {
  /** Largest stored id plus one; 1 for an empty table or a failed lookup */
  nextId(): Promise<number>;
  insert(record: LeaderboardRecord): Promise<InsertOutcome>;
  /** Most recent rows, highest id first; empty on failure */
  recent(limit?: number): Promise<LeaderboardRow[]>;
}
