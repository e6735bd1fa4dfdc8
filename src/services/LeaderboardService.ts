import { isStoreConfigured, OcrConfig, StoreConfig } from '../config';
import {
  AppError,
  EntriesUpdate,
  ExtractedTimes,
  PlayerRoster,
  RecentEntriesView,
  Result,
} from '../types';
import { errorMessage, fail, ok } from '../utils/result';
import { LeaderboardParser } from './LeaderboardParser';
import { createTextExtractor, TextExtractor } from './ocr';
import { projectRecentEntries } from './RecentEntries';
import { buildRecord } from './RecordBuilder';
import { SettingsService } from './SettingsService';
import { StoreGateway } from './StoreGateway';
import { SupabaseStoreGateway } from './SupabaseStoreGateway';

export interface ExtractionOutcome {
  text: string;
  times: ExtractedTimes;
  error?: AppError;
}

export interface SubmittedEntry {
  id: number;
  date: string;
}

export interface EntriesBroadcaster {
  broadcastEntries(update: EntriesUpdate): void;
}

export interface LeaderboardServiceOptions {
  createExtractor?: (config: OcrConfig) => TextExtractor;
  createGateway?: (config: StoreConfig) => StoreGateway;
  broadcaster?: EntriesBroadcaster;
  now?: () => Date;
}

export class LeaderboardService {
  private settings: SettingsService;
  private roster: PlayerRoster;
  private parser: LeaderboardParser;
  private createExtractor: (config: OcrConfig) => TextExtractor;
  private createGateway: (config: StoreConfig) => StoreGateway;
  private broadcaster: EntriesBroadcaster | null;
  private now: () => Date;

  constructor(settings: SettingsService, roster: PlayerRoster, options: LeaderboardServiceOptions = {}) {
    this.settings = settings;
    this.roster = roster;
    this.parser = new LeaderboardParser(roster);
    this.createExtractor = options.createExtractor ?? createTextExtractor;
    this.createGateway = options.createGateway ?? ((config) => new SupabaseStoreGateway(config));
    this.broadcaster = options.broadcaster ?? null;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * OCR the image and pull the roster's times out of the text. A provider
   * failure leaves the text empty and carries the error alongside.
   */
  async extract(image: Buffer, mimeType?: string): Promise<ExtractionOutcome> {
    const extractor = this.createExtractor(this.settings.current().ocr);
    const result = await extractor.extract(image, mimeType);

    if (!result.ok) {
      console.error(`[LeaderboardService] ${extractor.name} extraction failed: ${result.error.message}`);
      return { text: '', times: {}, error: result.error };
    }

    const times = this.parser.parse(result.value);
    console.log(
      `[LeaderboardService] ${extractor.name} extracted ${Object.keys(times).length} player time(s)`
    );
    return { text: result.value, times };
  }

  /**
   * Persist one submission. The id comes from reading the current maximum
   * and is not reserved, so concurrent submissions may collide.
   */
  async submit(times: ExtractedTimes, date: string): Promise<Result<SubmittedEntry>> {
    if (Object.keys(times).length === 0) {
      return fail('EmptySubmission', 'No data to submit');
    }

    const store = this.openStore();
    if (!store.ok) {
      return store;
    }

    const gateway = store.value;
    const identifier = await gateway.nextId();
    const record = buildRecord(times, date, identifier, this.now());
    const outcome = await gateway.insert(record);

    if (!outcome.success) {
      return { ok: false, error: outcome.error };
    }

    console.log(`[LeaderboardService] Added record with ID ${outcome.identifier} for ${date}`);
    await this.publishRecent(gateway);

    return ok({ id: outcome.identifier, date });
  }

  async recent(limit?: number): Promise<Result<RecentEntriesView>> {
    const store = this.openStore();
    if (!store.ok) {
      return store;
    }

    const rows = await store.value.recent(limit ?? this.settings.current().recentLimit);
    return ok(projectRecentEntries(rows, this.roster));
  }

  getRoster(): PlayerRoster {
    return this.roster;
  }

  private openStore(): Result<StoreGateway> {
    const { store } = this.settings.current();

    if (!isStoreConfigured(store)) {
      return fail('ConfigurationMissing', 'Supabase URL and API Key are required');
    }

    try {
      return ok(this.createGateway(store));
    } catch (error) {
      console.error('[LeaderboardService] Failed to connect to Supabase:', error);
      return fail('ProviderFailure', `Failed to connect to Supabase: ${errorMessage(error)}`);
    }
  }

  private async publishRecent(gateway: StoreGateway): Promise<void> {
    if (!this.broadcaster) {
      return;
    }

    const rows = await gateway.recent(this.settings.current().recentLimit);
    this.broadcaster.broadcastEntries({
      entries: projectRecentEntries(rows, this.roster).entries,
      timestamp: this.now().getTime(),
    });
  }
}
