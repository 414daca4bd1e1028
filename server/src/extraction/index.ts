import type { AppConfig } from '../lib/config.js';
import { ExtractionCascade } from './cascade.js';
import { MammothDocxReader } from './docx.js';
import { resolveLangPath, SharpImageNormalizer, TesseractOcrEngine } from './ocr.js';
import { PdfjsReader } from './pdf.js';

export interface DefaultCascade {
  cascade: ExtractionCascade;
  shutdown(): Promise<void>;
}

export function createDefaultCascade(config: AppConfig): DefaultCascade {
  const ocr = new TesseractOcrEngine({
    language: config.ocrLanguage,
    langPath: resolveLangPath(config.ocrLanguage, config.ocrLangPath),
  });
  const cascade = new ExtractionCascade({
    pdf: new PdfjsReader(),
    docx: new MammothDocxReader(),
    ocr,
    normalizer: new SharpImageNormalizer(),
    minTextLayerChars: config.ocrFallbackMinChars,
  });
  return { cascade, shutdown: () => ocr.terminate() };
}
