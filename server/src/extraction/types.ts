export type DocumentFormat = 'pdf' | 'word' | 'image' | 'text' | 'unknown';

export type ExtractionMethod = 'text' | 'docx' | 'image_ocr' | 'pdf_text' | 'pdf_ocr' | 'none';

export interface ExtractionResult {
  /** Empty string when every strategy failed. */
  text: string;
  method: ExtractionMethod;
}

// ─── Strategy seams ──────────────────────────────────────────────────

export interface PdfReader {
  /** Text layer of every page, in page order. */
  readPageTexts(bytes: Uint8Array): Promise<string[]>;
  /** Every page rendered to a PNG, in page order. */
  renderPages(bytes: Uint8Array): Promise<Buffer[]>;
}

export interface DocxReader {
  readText(bytes: Buffer): Promise<string>;
}

export interface ImageNormalizer {
  /** Greyscale plus contrast stretch ahead of OCR. */
  normalize(image: Buffer): Promise<Buffer>;
}

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
  terminate?(): Promise<void>;
}
