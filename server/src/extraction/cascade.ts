import type { Logger } from 'pino';
import logger from '../lib/logger.js';
import type {
  DocumentFormat,
  DocxReader,
  ExtractionResult,
  ImageNormalizer,
  OcrEngine,
  PdfReader,
} from './types.js';

export const DEFAULT_MIN_TEXT_LAYER_CHARS = 100;

const WORD_MEDIA_TYPES = new Set([
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'application/msword',
]);

const EMPTY: ExtractionResult = { text: '', method: 'none' };

export function classifyMediaType(contentType: string): DocumentFormat {
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  if (mediaType === 'application/pdf') return 'pdf';
  if (WORD_MEDIA_TYPES.has(mediaType)) return 'word';
  if (mediaType.startsWith('image/')) return 'image';
  if (mediaType === 'text/plain') return 'text';
  return 'unknown';
}

function stripNulls(text: string): string {
  return text.replace(/\u0000/g, '');
}

/** One line break after each page that carries text; blank pages add nothing. */
function joinPages(pages: string[]): string {
  return pages
    .map(stripNulls)
    .filter((page) => page.trim().length > 0)
    .map((page) => `${page}\n`)
    .join('');
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface ExtractionCascadeDeps {
  pdf: PdfReader;
  docx: DocxReader;
  ocr: OcrEngine;
  normalizer: ImageNormalizer;
  /** Trimmed text-layer length below which a PDF goes to OCR. */
  minTextLayerChars?: number;
}

/**
 * Turns stored document bytes into raw text, cheapest reliable method first.
 * Never throws: an empty string is the single failure signal.
 */
export class ExtractionCascade {
  private readonly minTextLayerChars: number;

  constructor(private readonly deps: ExtractionCascadeDeps) {
    this.minTextLayerChars = deps.minTextLayerChars ?? DEFAULT_MIN_TEXT_LAYER_CHARS;
  }

  async extract(bytes: Buffer, contentType: string, log: Logger = logger): Promise<ExtractionResult> {
    const format = classifyMediaType(contentType);
    log.debug({ contentType, format, size: bytes.byteLength }, 'Extraction: dispatching');

    switch (format) {
      case 'pdf':
        return this.extractPdf(bytes, log);
      case 'word':
        return this.extractWord(bytes, log);
      case 'image':
        return this.extractImage(bytes, log);
      case 'text':
      case 'unknown':
        return this.extractPlainText(bytes, log);
    }
  }

  private extractPlainText(bytes: Buffer, log: Logger): ExtractionResult {
    try {
      const text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
      return { text: stripNulls(text), method: 'text' };
    } catch (err) {
      log.warn({ error: describe(err) }, 'Extraction: bytes are not valid UTF-8');
      return EMPTY;
    }
  }

  private async extractWord(bytes: Buffer, log: Logger): Promise<ExtractionResult> {
    try {
      const text = await this.deps.docx.readText(bytes);
      return { text: stripNulls(text), method: 'docx' };
    } catch (err) {
      log.warn({ error: describe(err) }, 'Extraction: word document could not be read');
      return EMPTY;
    }
  }

  private async extractImage(bytes: Buffer, log: Logger): Promise<ExtractionResult> {
    try {
      const text = await this.recognize(bytes);
      return { text: stripNulls(text), method: 'image_ocr' };
    } catch (err) {
      log.warn({ error: describe(err) }, 'Extraction: image OCR failed');
      return EMPTY;
    }
  }

  private async extractPdf(bytes: Buffer, log: Logger): Promise<ExtractionResult> {
    try {
      const pages = await this.deps.pdf.readPageTexts(bytes);
      const text = joinPages(pages);
      const length = text.trim().length;
      if (length >= this.minTextLayerChars) {
        return { text, method: 'pdf_text' };
      }
      log.info(
        { pages: pages.length, chars: length, threshold: this.minTextLayerChars },
        'Extraction: text layer too short, falling back to OCR',
      );
    } catch (err) {
      log.warn({ error: describe(err) }, 'Extraction: text layer unreadable, falling back to OCR');
    }

    try {
      const images = await this.deps.pdf.renderPages(bytes);
      const pages: string[] = [];
      for (const image of images) {
        pages.push(await this.recognize(image));
      }
      return { text: joinPages(pages), method: 'pdf_ocr' };
    } catch (err) {
      log.warn({ error: describe(err) }, 'Extraction: PDF OCR failed');
      return EMPTY;
    }
  }

  private async recognize(image: Buffer): Promise<string> {
    const normalized = await this.deps.normalizer.normalize(image);
    return this.deps.ocr.recognize(normalized);
  }
}
