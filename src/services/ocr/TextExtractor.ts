import { ExtractionResult } from '../../types';

export const SUPPORTED_IMAGE_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/bmp'] as const;

/** `image/jpg` is a common alias; the registered type is `image/jpeg`. */
export function dataMarkerType(mimeType: string): string {
  const type = mimeType.trim().toLowerCase();
  return type === 'image/jpg' ? 'image/jpeg' : type;
}

/**
 * Turns image bytes into raw text. Implementations never throw: provider
 * errors come back as a failed result.
 */
export interface TextExtractor {
  readonly name: string;
  extract(image: Buffer, mimeType?: string): Promise<ExtractionResult>;
}
