import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_OCR_SPACE_ENDPOINT } from '../src/config';
import { createTextExtractor, OcrSpaceTextExtractor, TesseractTextExtractor } from '../src/services/ocr';
import { createEnglishWorker, englishLanguagePath } from '../src/services/ocr/TesseractTextExtractor';

type WorkerOptions = { langPath: string; cacheMethod: string; errorHandler: (error: unknown) => void };

const createWorker = vi.hoisted(() => vi.fn());

vi.mock('tesseract.js', () => ({
  createWorker,
  default: { createWorker },
}));

function fakeWorker(text: string) {
  return {
    recognize: vi.fn(async (_image: Buffer) => ({ data: { text } })),
    terminate: vi.fn(async () => undefined),
  };
}

describe('createTextExtractor', () => {
  it('picks the hosted extractor for ocrspace', () => {
    const extractor = createTextExtractor({ provider: 'ocrspace', apiKey: 'test-key', endpoint: DEFAULT_OCR_SPACE_ENDPOINT });
    expect(extractor).toBeInstanceOf(OcrSpaceTextExtractor);
    expect(extractor.name).toBe('ocrspace');
  });

  it('picks the local extractor for tesseract', () => {
    const extractor = createTextExtractor({ provider: 'tesseract', apiKey: '', endpoint: DEFAULT_OCR_SPACE_ENDPOINT });
    expect(extractor).toBeInstanceOf(TesseractTextExtractor);
    expect(extractor.name).toBe('tesseract');
  });
});

describe('default tesseract worker', () => {
  beforeEach(() => {
    createWorker.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('reads the English model from the installed data package without caching', async () => {
    createWorker.mockResolvedValueOnce(fakeWorker(''));

    await createEnglishWorker();

    expect(englishLanguagePath()).toMatch(/@tesseract\.js-data[\\/]eng[\\/]4\.0\.0_best_int$/);
    expect(createWorker).toHaveBeenCalledWith('eng', undefined, {
      langPath: englishLanguagePath(),
      cacheMethod: 'none',
      errorHandler: expect.any(Function),
    });
  });

  it('only logs worker errors', async () => {
    createWorker.mockResolvedValueOnce(fakeWorker(''));
    await createEnglishWorker();

    const options: WorkerOptions = createWorker.mock.calls[0][2];
    expect(() => options.errorHandler('Error: network error')).not.toThrow();
    expect(console.error).toHaveBeenCalledWith('[Tesseract] Worker error:', 'Error: network error');
  });

  it('recognises text through the default factory', async () => {
    const worker = fakeWorker('Vy = 4.56');
    createWorker.mockResolvedValueOnce(worker);

    const result = await new TesseractTextExtractor().extract(Buffer.from('png-bytes'));

    expect(result).toEqual({ ok: true, value: 'Vy = 4.56' });
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });

  it('turns a failed model load into a failed result', async () => {
    createWorker.mockRejectedValueOnce(new Error('eng.traineddata not found'));

    const result = await new TesseractTextExtractor().extract(Buffer.from('png-bytes'));

    expect(result).toEqual({
      ok: false,
      error: { kind: 'ProviderFailure', message: 'Error extracting text from image: eng.traineddata not found' },
    });
  });
});
