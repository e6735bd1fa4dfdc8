import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StoreConfig } from '../config';
import { InsertOutcome, LeaderboardRecord, LeaderboardRow } from '../types';
import { appError, errorMessage } from '../utils/result';
import { nextIdentifier, toRow } from './RecordBuilder';
import { StoreGateway } from './StoreGateway';

export interface SupabaseGatewayOptions {
  fetch?: typeof fetch;
}

function readId(value: unknown): number | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const raw = Reflect.get(value, 'id');
  const id = typeof raw === 'number' || typeof raw === 'string' ? Number(raw) : NaN;
  return Number.isInteger(id) ? id : null;
}

/**
 * Normalise a row read back from PostgREST. Rows without a usable id or
 * date are dropped.
 */
export function toLeaderboardRow(value: unknown): LeaderboardRow | null {
  const id = readId(value);
  if (id === null || typeof value !== 'object' || value === null) {
    return null;
  }

  const date = Reflect.get(value, 'date');
  if (typeof date !== 'string') {
    return null;
  }

  const row: LeaderboardRow = { id, date };
  for (const [column, cell] of Object.entries(value)) {
    if (column === 'id' || column === 'date') continue;
    if (typeof cell === 'string' || typeof cell === 'number' || cell === null) {
      row[column] = cell;
    }
  }
  return row;
}

export class SupabaseStoreGateway implements StoreGateway {
  private client: SupabaseClient;
  private readonly table: string;

  constructor(config: StoreConfig, options: SupabaseGatewayOptions = {}) {
    this.table = config.table;
    this.client = createClient(config.url, config.key, {
      auth: { persistSession: false, autoRefreshToken: false },
      global: { fetch: options.fetch },
    });
  }

  async nextId(): Promise<number> {
    try {
      const { data, error } = await this.client
        .from(this.table)
        .select('id')
        .order('id', { ascending: false })
        .limit(1);

      if (error) {
        console.error(`[Store] Error getting next ID: ${error.message}`);
        return 1;
      }

      const rows: unknown[] = data ?? [];
      return nextIdentifier(rows.length > 0 ? readId(rows[0]) : null);
    } catch (error) {
      console.error('[Store] Error getting next ID:', error);
      return 1;
    }
  }

  async insert(record: LeaderboardRecord): Promise<InsertOutcome> {
    try {
      const { data, error } = await this.client.from(this.table).insert(toRow(record)).select();

      if (error) {
        console.error(`[Store] Insert of record ${record.id} failed: ${error.message}`);
        return { success: false, identifier: null, error: appError('ProviderFailure', error.message) };
      }

      const rows: unknown[] = data ?? [];
      if (rows.length === 0) {
        console.error(`[Store] Insert of record ${record.id} returned no data`);
        return {
          success: false,
          identifier: null,
          error: appError('ProviderFailure', 'Insert returned no data'),
        };
      }

      console.log(`[Store] Inserted record ${record.id} for ${record.date}`);
      return { success: true, identifier: record.id };
    } catch (error) {
      console.error('[Store] Error updating database:', error);
      return {
        success: false,
        identifier: null,
        error: appError('ProviderFailure', `Error updating database: ${errorMessage(error)}`),
      };
    }
  }

  async recent(limit: number = 10): Promise<LeaderboardRow[]> {
    try {
      const { data, error } = await this.client
        .from(this.table)
        .select('*')
        .order('id', { ascending: false })
        .limit(limit);

      if (error) {
        console.error(`[Store] Error fetching recent entries: ${error.message}`);
        return [];
      }

      const rows: unknown[] = data ?? [];
      return rows
        .map(toLeaderboardRow)
        .filter((row): row is LeaderboardRow => row !== null);
    } catch (error) {
      console.error('[Store] Error fetching recent entries:', error);
      return [];
    }
  }
}
