import { OcrProviderName } from '../types';

export const DEFAULT_OCR_SPACE_ENDPOINT = 'https://api.ocr.space/parse/image';
export const DEFAULT_TABLE = 'crossword_times';

export interface StoreConfig {
  url: string;
  key: string;
  table: string;
}

export interface OcrConfig {
  provider: OcrProviderName;
  apiKey: string;
  endpoint: string;
}

export interface AppConfig {
  port: number;
  recentLimit: number;
  store: StoreConfig;
  ocr: OcrConfig;
}

function parseInteger(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isNaN(value) || value <= 0 ? fallback : value;
}

function parseProvider(raw: string | undefined): OcrProviderName {
  return raw?.trim().toLowerCase() === 'tesseract' ? 'tesseract' : 'ocrspace';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInteger(env.PORT, 3000),
    recentLimit: parseInteger(env.RECENT_LIMIT, 10),
    store: {
      url: env.SUPABASE_URL?.trim() || '',
      key: env.SUPABASE_KEY?.trim() || '',
      table: env.SUPABASE_TABLE?.trim() || DEFAULT_TABLE,
    },
    ocr: {
      provider: parseProvider(env.OCR_PROVIDER),
      apiKey: env.OCR_API_KEY?.trim() || '',
      endpoint: env.OCR_SPACE_ENDPOINT?.trim() || DEFAULT_OCR_SPACE_ENDPOINT,
    },
  };
}

export function isStoreConfigured(store: StoreConfig): boolean {
  return store.url.length > 0 && store.key.length > 0;
}

/**
 * Startup summary with the credentials reduced to whether they are set.
 */
export function describeConfig(config: AppConfig): Record<string, string | number | boolean> {
  return {
    port: config.port,
    recentLimit: config.recentLimit,
    table: config.store.table,
    storeConfigured: isStoreConfigured(config.store),
    ocrProvider: config.ocr.provider,
    ocrKeyConfigured: config.ocr.apiKey.length > 0,
  };
}
