/**
 * Debug log: appends timestamped lines to a file when a path is configured.
 */

import { appendFileSync } from 'node:fs';

export class DebugLog {
  private readonly path: string | null;

  constructor(path: string | null) {
    this.path = path;
    if (path) {
      appendFileSync(path, '\n============= new stream ==========\n');
    }
  }

  get enabled(): boolean {
    return this.path !== null;
  }

  log(message: string): void {
    if (!this.path) return;
    appendFileSync(this.path, `${new Date().toISOString()} ${message}\n`);
  }
}
