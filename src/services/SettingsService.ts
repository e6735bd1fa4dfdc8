import { AppConfig, isStoreConfigured } from '../config';
import { OcrProviderName } from '../types';

export interface SettingsOverride {
  supabaseUrl?: string;
  supabaseKey?: string;
  ocrApiKey?: string;
  ocrProvider?: OcrProviderName;
}

export interface SettingsStatus {
  storeConfigured: boolean;
  ocrKeyConfigured: boolean;
  ocrProvider: OcrProviderName;
  table: string;
}

/**
 * Holds the effective configuration: values from the environment, replaced
 * field by field by whatever the user enters at runtime.
 */
export class SettingsService {
  private config: AppConfig;

  constructor(initial: AppConfig) {
    this.config = initial;
  }

  current(): AppConfig {
    return this.config;
  }

  update(override: SettingsOverride): SettingsStatus {
    const { store, ocr } = this.config;

    this.config = {
      ...this.config,
      store: {
        ...store,
        url: override.supabaseUrl ?? store.url,
        key: override.supabaseKey ?? store.key,
      },
      ocr: {
        ...ocr,
        apiKey: override.ocrApiKey ?? ocr.apiKey,
        provider: override.ocrProvider ?? ocr.provider,
      },
    };

    console.log('[Settings] Configuration updated:', this.status());
    return this.status();
  }

  status(): SettingsStatus {
    return {
      storeConfigured: isStoreConfigured(this.config.store),
      ocrKeyConfigured: this.config.ocr.apiKey.length > 0,
      ocrProvider: this.config.ocr.provider,
      table: this.config.store.table,
    };
  }
}
