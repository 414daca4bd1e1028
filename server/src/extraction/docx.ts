import type { DocxReader } from './types.js';

/**
 * Paragraph text in document order, one paragraph per line.
 */
export class MammothDocxReader implements DocxReader {
  async readText(bytes: Buffer): Promise<string> {
    const { default: mammoth } = await import('mammoth');
    const result = await mammoth.extractRawText({ buffer: bytes });
    // mammoth separates paragraphs with a blank line
    return result.value.replace(/\n\n/g, '\n');
  }
}
