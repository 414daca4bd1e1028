import { createCanvas } from '@napi-rs/canvas';
import type { PdfReader } from './types.js';

type PdfjsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

let pdfjsModule: Promise<PdfjsModule> | null = null;

function loadPdfjs(): Promise<PdfjsModule> {
  if (!pdfjsModule) pdfjsModule = import('pdfjs-dist/legacy/build/pdf.mjs');
  return pdfjsModule;
}

async function openDocument(bytes: Uint8Array) {
  const pdfjs = await loadPdfjs();
  // pdfjs takes ownership of the buffer it is given, so hand it a copy.
  return pdfjs.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    useSystemFonts: true,
  }).promise;
}

/**
 * Text layer and page rendering through pdfjs-dist's legacy (Node) build.
 */
export class PdfjsReader implements PdfReader {
  constructor(private readonly renderScale = 2) {}

  async readPageTexts(bytes: Uint8Array): Promise<string[]> {
    const pdf = await openDocument(bytes);
    try {
      const pages: string[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();
        const text = content.items
          .map((item) => ('str' in item ? `${item.str}${item.hasEOL ? '\n' : ''}` : ''))
          .join('');
        pages.push(text);
      }
      return pages;
    } finally {
      await pdf.destroy();
    }
  }

  async renderPages(bytes: Uint8Array): Promise<Buffer[]> {
    const pdf = await openDocument(bytes);
    try {
      const images: Buffer[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const viewport = page.getViewport({ scale: this.renderScale });
        const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
        const context = canvas.getContext('2d');
        await page.render({ canvasContext: context, viewport }).promise;
        images.push(canvas.toBuffer('image/png'));
        page.cleanup();
      }
      return images;
    } finally {
      await pdf.destroy();
    }
  }
}
