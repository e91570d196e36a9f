/**
 * Loading and saving document text.
 */

import { readFileSync, renameSync, writeFileSync } from 'node:fs';
import { splitLines } from './document';

export interface Persistence {
  /** Read a file as rows. Throws when the file cannot be read. */
  load(path: string): string[];
  /**
   * Write the full text of a document.
   * @returns The number of bytes written.
   */
  save(path: string, text: string): number;
}

/**
 * Node filesystem persistence. Saves are written to `<path>.tmp` and then
 * renamed over the target.
 */
export class FileSystemPersistence implements Persistence {
  load(path: string): string[] {
    return splitLines(readFileSync(path, 'utf8'));
  }

  save(path: string, text: string): number {
    const tmpPath = `${path}.tmp`;
    writeFileSync(tmpPath, text, 'utf8');
    renameSync(tmpPath, path);
    return Buffer.byteLength(text, 'utf8');
  }
}
