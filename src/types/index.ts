export type PlayerName = string;

/**
 * Ordered, immutable list of recognised players together with the
 * pattern templates tried for each of them.
 */
export interface RosterEntry {
  readonly name: PlayerName;
  readonly patterns: readonly string[];
}

export type PlayerRoster = readonly RosterEntry[];

/** Player name -> time as a decimal string */
export type ExtractedTimes = Record<PlayerName, string>;

export interface LeaderboardRecord {
  readonly id: number;
  readonly date: string;
  readonly created_at: string;
  readonly times: Readonly<ExtractedTimes>;
}

/**
 * A row as it lives in the store: fixed columns plus one column per
 * player that has a time.
 */
export interface LeaderboardRow {
  id: number | string;
  date: string;
  created_at?: string;
  [player: string]: string | number | null | undefined;
}

export interface RecentEntry {
  id: number;
  date: string;
  [player: string]: string | number;
}

export interface RecentEntriesView {
  columns: string[];
  entries: RecentEntry[];
}

export type ErrorKind = 'ConfigurationMissing' | 'ProviderFailure' | 'EmptySubmission';

export interface AppError {
  kind: ErrorKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: AppError };

export type ExtractionResult = Result<string>;

export type InsertOutcome =
  | { success: true; identifier: number }
  | { success: false; identifier: null; error: AppError };

export type OcrProviderName = 'ocrspace' | 'tesseract';

export interface EntriesUpdate {
  entries: RecentEntry[];
  timestamp: number;
}

export interface WebSocketMessage {
  type: 'connected' | 'pong' | 'subscribed' | 'error' | 'heartbeat' | 'entries_update' | 'server_shutdown';
  message?: string;
  timestamp?: number;
  data?: EntriesUpdate;
}
