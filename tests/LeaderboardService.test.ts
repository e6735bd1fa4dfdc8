import { beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config';
import { loadRoster } from '../src/config/roster';
import { EntriesBroadcaster, LeaderboardService } from '../src/services/LeaderboardService';
import { TextExtractor } from '../src/services/ocr';
import { SettingsService } from '../src/services/SettingsService';
import { SupabaseStoreGateway } from '../src/services/SupabaseStoreGateway';
import { EntriesUpdate, ExtractionResult } from '../src/types';
import { createFakePostgrest, FakePostgrest } from './helpers/fakePostgrest';

const roster = loadRoster();
const fixedNow = new Date('2024-01-01T09:15:00.000Z');

function stubExtractor(result: ExtractionResult): TextExtractor {
  return { name: 'stub', extract: async () => result };
}

function configuredSettings(): SettingsService {
  return new SettingsService(
    loadConfig({
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_KEY: 'test-service-key',
      OCR_API_KEY: 'test-ocr-key',
    })
  );
}

describe('LeaderboardService', () => {
  let postgrest: FakePostgrest;
  let broadcasts: EntriesUpdate[];
  let broadcaster: EntriesBroadcaster;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    postgrest = createFakePostgrest();
    broadcasts = [];
    broadcaster = { broadcastEntries: (update) => broadcasts.push(update) };
  });

  function createService(extraction: ExtractionResult, settings = configuredSettings()): LeaderboardService {
    return new LeaderboardService(settings, roster, {
      createExtractor: () => stubExtractor(extraction),
      createGateway: (store) => new SupabaseStoreGateway(store, { fetch: postgrest.fetch }),
      broadcaster,
      now: () => fixedNow,
    });
  }

  it('takes a screenshot from OCR text through to a stored row', async () => {
    const service = createService({ ok: true, value: 'Leaderboard\nMerrick - 1.23\nVy = 4.56' });

    const extracted = await service.extract(Buffer.from('image'), 'image/png');
    expect(extracted).toEqual({
      text: 'Leaderboard\nMerrick - 1.23\nVy = 4.56',
      times: { Merrick: '1.23', Vy: '4.56' },
    });

    const submitted = await service.submit(extracted.times, '2024-01-01');
    expect(submitted).toEqual({ ok: true, value: { id: 1, date: '2024-01-01' } });

    const insert = postgrest.requests.find((request) => request.method === 'POST');
    expect(insert?.body).toEqual({
      id: '1',
      date: '2024-01-01',
      created_at: '2024-01-01T09:15:00.000Z',
      Merrick: '1.23',
      Vy: '4.56',
    });
  });

  it('assigns the next id after the current maximum', async () => {
    postgrest.rows = [{ id: 6, date: '2023-12-31', Moi: '3.0' }];
    const service = createService({ ok: true, value: '' });

    const result = await service.submit({ Moi: '2.5' }, '2024-01-01');

    expect(result).toEqual({ ok: true, value: { id: 7, date: '2024-01-01' } });
  });

  it('returns empty text and times when OCR fails', async () => {
    const service = createService({
      ok: false,
      error: { kind: 'ProviderFailure', message: 'OCR processing failed: Unknown error' },
    });

    expect(await service.extract(Buffer.from('image'))).toEqual({
      text: '',
      times: {},
      error: { kind: 'ProviderFailure', message: 'OCR processing failed: Unknown error' },
    });
  });

  it('refuses an empty submission', async () => {
    const service = createService({ ok: true, value: '' });

    expect(await service.submit({}, '2024-01-01')).toEqual({
      ok: false,
      error: { kind: 'EmptySubmission', message: 'No data to submit' },
    });
    expect(postgrest.requests).toHaveLength(0);
  });

  it('does not touch the store without credentials', async () => {
    const service = createService({ ok: true, value: '' }, new SettingsService(loadConfig({})));

    expect(await service.submit({ John: '1.0' }, '2024-01-01')).toEqual({
      ok: false,
      error: { kind: 'ConfigurationMissing', message: 'Supabase URL and API Key are required' },
    });
    expect(await service.recent()).toEqual({
      ok: false,
      error: { kind: 'ConfigurationMissing', message: 'Supabase URL and API Key are required' },
    });
    expect(postgrest.requests).toHaveLength(0);
  });

  it('reports a failed insert', async () => {
    postgrest.insertReturnsNothing = true;
    const service = createService({ ok: true, value: '' });

    expect(await service.submit({ John: '1.0' }, '2024-01-01')).toEqual({
      ok: false,
      error: { kind: 'ProviderFailure', message: 'Insert returned no data' },
    });
    expect(broadcasts).toHaveLength(0);
  });

  it('reports a store client that cannot be created', async () => {
    const service = new LeaderboardService(configuredSettings(), roster, {
      createGateway: () => {
        throw new Error('Invalid supabaseUrl');
      },
    });

    expect(await service.recent()).toEqual({
      ok: false,
      error: { kind: 'ProviderFailure', message: 'Failed to connect to Supabase: Invalid supabaseUrl' },
    });
  });

  it('broadcasts the refreshed recent entries after a submission', async () => {
    postgrest.rows = [{ id: 1, date: '2023-12-31', Lauren: '5.5' }];
    const service = createService({ ok: true, value: '' });

    await service.submit({ Vy: '4.56' }, '2024-01-01');

    expect(broadcasts).toEqual([
      {
        entries: [
          { id: 2, date: '2024-01-01', Lauren: '', Vy: '4.56' },
          { id: 1, date: '2023-12-31', Lauren: '5.5', Vy: '' },
        ],
        timestamp: fixedNow.getTime(),
      },
    ]);
  });

  it('lists recent entries with roster columns in roster order', async () => {
    postgrest.rows = [
      { id: 1, date: '2024-01-01', created_at: 'x', Vy: '1.0', Merrick: '2.0' },
      { id: 2, date: '2024-01-02', created_at: 'y', Merrick: '3.0', Stranger: '9.9' },
      { id: 3, date: '2024-01-03', created_at: 'z', Moi: null },
    ];
    const service = createService({ ok: true, value: '' });

    const result = await service.recent(2);

    expect(result).toEqual({
      ok: true,
      value: {
        columns: ['id', 'date', 'Merrick', 'Moi'],
        entries: [
          { id: 3, date: '2024-01-03', Merrick: '', Moi: '' },
          { id: 2, date: '2024-01-02', Merrick: '3.0', Moi: '' },
        ],
      },
    });
  });

  it('uses the configured provider for extraction', async () => {
    const providers: string[] = [];
    const settings = configuredSettings();
    settings.update({ ocrProvider: 'tesseract' });

    const service = new LeaderboardService(settings, roster, {
      createExtractor: (ocr) => {
        providers.push(ocr.provider);
        return stubExtractor({ ok: true, value: 'John: 1.50' });
      },
    });

    expect((await service.extract(Buffer.from('image'))).times).toEqual({ John: '1.5' });
    expect(providers).toEqual(['tesseract']);
  });
});
