import { createRequire } from 'node:module';
import path from 'node:path';
import sharp from 'sharp';
import { createWorker, type Worker } from 'tesseract.js';
import logger from '../lib/logger.js';
import type { ImageNormalizer, OcrEngine } from './types.js';

export class SharpImageNormalizer implements ImageNormalizer {
  async normalize(image: Buffer): Promise<Buffer> {
    return sharp(image).greyscale().normalise().png().toBuffer();
  }
}

export interface TesseractOptions {
  language: string;
  /** Directory holding `<lang>.traineddata.gz`. */
  langPath: string;
}

// Same model variant tesseract.js fetches by default.
const TRAINED_DATA_VARIANT = '4.0.0_best_int';

/**
 * Picks the traineddata directory for a language. An explicit override wins;
 * otherwise the data must come from an installed `@tesseract.js-data/<lang>`
 * package so the worker never reaches for a CDN.
 */
export function resolveLangPath(language: string, override: string | null): string {
  if (override) return override;
  if (language.includes('+')) {
    throw new Error(`OCR: language ${language} combines several models; set OCR_LANG_PATH to a directory holding them`);
  }
  const require = createRequire(import.meta.url);
  let manifest: string;
  try {
    manifest = require.resolve(`@tesseract.js-data/${language}/package.json`);
  } catch {
    throw new Error(`OCR: no bundled data for ${language}; install @tesseract.js-data/${language} or set OCR_LANG_PATH`);
  }
  return path.join(path.dirname(manifest), TRAINED_DATA_VARIANT);
}

/**
 * One long-lived tesseract.js worker, started on first use.
 */
export class TesseractOcrEngine implements OcrEngine {
  private worker: Promise<Worker> | null = null;

  constructor(private readonly options: TesseractOptions) {}

  async recognize(image: Buffer): Promise<string> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(image);
    return data.text;
  }

  async terminate(): Promise<void> {
    if (!this.worker) return;
    const pending = this.worker;
    this.worker = null;
    const worker = await pending;
    await worker.terminate();
  }

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      const { language, langPath } = this.options;
      logger.info({ language, langPath }, 'OCR: starting tesseract worker');
      const starting = createWorker(language, undefined, { langPath, gzip: true });
      // A failed start must not poison every later call.
      void starting.catch(() => {
        if (this.worker === starting) this.worker = null;
      });
      this.worker = starting;
    }
    return this.worker;
  }
}
