import { OcrConfig } from '../../config';
import { OcrSpaceTextExtractor } from './OcrSpaceTextExtractor';
import { TesseractTextExtractor } from './TesseractTextExtractor';
import { TextExtractor } from './TextExtractor';

export function createTextExtractor(config: OcrConfig): TextExtractor {
  switch (config.provider) {
    case 'tesseract':
      return new TesseractTextExtractor();
    case 'ocrspace':
      return new OcrSpaceTextExtractor(config);
  }
}

export { OcrSpaceTextExtractor, TesseractTextExtractor };
export type { TextExtractor };
export { SUPPORTED_IMAGE_TYPES } from './TextExtractor';
