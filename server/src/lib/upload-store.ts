import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface UploadStore {
  /** Writes the bytes and returns the path later passed to read/remove. */
  save(documentId: string, fileName: string, bytes: Buffer): Promise<string>;
  read(storagePath: string): Promise<Buffer>;
  remove(storagePath: string): Promise<void>;
}

/**
 * Keeps uploads on local disk as `<uploadsDir>/<documentId>_<basename>`.
 */
export class DiskUploadStore implements UploadStore {
  constructor(private readonly uploadsDir: string) {}

  async save(documentId: string, fileName: string, bytes: Buffer): Promise<string> {
    await mkdir(this.uploadsDir, { recursive: true });
    const safeName = path.basename(fileName).replace(/[^A-Za-z0-9._-]/g, '_') || 'upload';
    const storagePath = path.join(this.uploadsDir, `${documentId}_${safeName}`);
    await writeFile(storagePath, bytes);
    return storagePath;
  }

  async read(storagePath: string): Promise<Buffer> {
    return readFile(storagePath);
  }

  async remove(storagePath: string): Promise<void> {
    await rm(storagePath, { force: true });
  }
}
