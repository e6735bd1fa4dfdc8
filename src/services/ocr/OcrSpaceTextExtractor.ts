import fetch from 'node-fetch';
import Joi from 'joi';
import { OcrConfig } from '../../config';
import { ExtractionResult } from '../../types';
import { errorMessage, fail, ok } from '../../utils/result';
import { dataMarkerType, TextExtractor } from './TextExtractor';

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<HttpResponseLike>;

interface OcrSpaceResponse {
  OCRExitCode: number;
  ErrorMessage?: string | string[] | null;
  ParsedResults?: { ParsedText?: string | null }[] | null;
}

const responseSchema = Joi.object<OcrSpaceResponse>({
  OCRExitCode: Joi.number().required(),
  ErrorMessage: Joi.alternatives()
    .try(Joi.string().allow(''), Joi.array().items(Joi.string().allow('')))
    .allow(null),
  ParsedResults: Joi.array()
    .items(Joi.object({ ParsedText: Joi.string().allow('', null) }).unknown(true))
    .allow(null),
}).unknown(true);

/**
 * Hosted OCR through the OCR.space parse endpoint.
 */
export class OcrSpaceTextExtractor implements TextExtractor {
  readonly name = 'ocrspace';
  private config: OcrConfig;
  private fetchImpl: FetchLike;

  constructor(config: OcrConfig, fetchImpl: FetchLike = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async extract(image: Buffer, mimeType: string = 'image/jpeg'): Promise<ExtractionResult> {
    if (!this.config.apiKey) {
      return fail('ConfigurationMissing', 'OCR.space API Key is required');
    }

    try {
      const payload = new URLSearchParams({
        apikey: this.config.apiKey,
        base64Image: `data:${dataMarkerType(mimeType)};base64,${image.toString('base64')}`,
        language: 'eng',
        scale: 'true',
        isTable: 'true',
        // Engine 2 is the more accurate one
        OCREngine: '2',
      });

      const response = await this.fetchImpl(this.config.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: payload.toString(),
      });

      const body = await response.text();

      if (response.status !== 200) {
        console.error(`[OCR.space] API error (HTTP ${response.status})`);
        return fail('ProviderFailure', `OCR.space API error: ${response.status} ${body}`.trim());
      }

      const parsed: unknown = JSON.parse(body);
      const { error, value } = responseSchema.validate(parsed);

      if (error || !value) {
        return fail('ProviderFailure', `Unexpected OCR.space response: ${error ? error.message : 'empty body'}`);
      }

      if (value.OCRExitCode !== 1) {
        const reason = this.describeError(value.ErrorMessage);
        console.error(`[OCR.space] Processing failed (exit code ${value.OCRExitCode}): ${reason}`);
        return fail('ProviderFailure', `OCR processing failed: ${reason}`);
      }

      const text = (value.ParsedResults ?? []).map((page) => page.ParsedText ?? '').join('');
      return ok(text);
    } catch (error) {
      console.error('[OCR.space] Error extracting text from image:', error);
      return fail('ProviderFailure', `Error extracting text from image: ${errorMessage(error)}`);
    }
  }

  private describeError(message: OcrSpaceResponse['ErrorMessage']): string {
    if (Array.isArray(message)) {
      return message.length > 0 ? message.join('; ') : 'Unknown error';
    }
    return message || 'Unknown error';
  }
}
