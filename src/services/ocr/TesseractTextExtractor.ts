import * as path from 'path';
import { ExtractionResult } from '../../types';
import { errorMessage, fail, ok } from '../../utils/result';
import { TextExtractor } from './TextExtractor';

export type MinimalTesseractWorker = {
  recognize(image: Buffer): Promise<{ data: { text?: string } }>;
  terminate(): Promise<unknown>;
};

export type TesseractWorkerFactory = () => Promise<MinimalTesseractWorker>;

/** Directory holding the bundled English model */
export function englishLanguagePath(): string {
  return path.join(path.dirname(require.resolve('@tesseract.js-data/eng/package.json')), '4.0.0_best_int');
}

/**
 * Default worker: English model read from the installed data package, no
 * on-disk cache. Worker errors are logged here and reach the caller as the
 * rejected createWorker promise.
 */
export const createEnglishWorker: TesseractWorkerFactory = async () => {
  const tesseract = await import('tesseract.js');
  return tesseract.createWorker('eng', undefined, {
    langPath: englishLanguagePath(),
    cacheMethod: 'none',
    errorHandler: (error: unknown) => {
      console.error('[Tesseract] Worker error:', error);
    },
  });
};

/**
 * Local OCR with tesseract.js. A worker is created per image and
 * terminated afterwards.
 */
export class TesseractTextExtractor implements TextExtractor {
  readonly name = 'tesseract';
  private createWorker: TesseractWorkerFactory;

  constructor(createWorker: TesseractWorkerFactory = createEnglishWorker) {
    this.createWorker = createWorker;
  }

  async extract(image: Buffer): Promise<ExtractionResult> {
    let worker: MinimalTesseractWorker | null = null;

    try {
      worker = await this.createWorker();
      const result = await worker.recognize(image);
      return ok(result.data.text ?? '');
    } catch (error) {
      console.error('[Tesseract] Error extracting text from image:', error);
      return fail('ProviderFailure', `Error extracting text from image: ${errorMessage(error)}`);
    } finally {
      if (worker) {
        await worker.terminate().catch((error: unknown) => {
          console.error('[Tesseract] Failed to terminate worker:', error);
        });
      }
    }
  }
}
