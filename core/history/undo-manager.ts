/**
 * Linear undo/redo journal.
 *
 * `undoPos` is the index of the last applied entry (-1 before the first).
 * Pushing while entries exist after `undoPos` discards them. The journal
 * also remembers which position matched the file on disk, so undoing or
 * redoing back to it can clear the dirty flag.
 */

import { revertEntry, replayEntry, type UndoEntry, type UndoTarget } from './operation';

/** Saved position that no sequence of undo/redo can reach again. */
const UNREACHABLE = -2;

export type UndoResult =
  | { ok: true; entry: UndoEntry; atSavedState: boolean }
  | { ok: false; message: string };

export class UndoManager {
  private entries: UndoEntry[] = [];
  private _undoPos = -1;
  private savedPos = -1;

  get undoPos(): number {
    return this._undoPos;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Record an action, discarding every entry after `undoPos`. */
  push(entry: UndoEntry): void {
    if (this._undoPos < this.entries.length - 1) {
      this.entries.length = this._undoPos + 1;
      if (this.savedPos > this._undoPos) this.savedPos = UNREACHABLE;
    }
    this.entries.push({ ...entry });
    this._undoPos = this.entries.length - 1;
  }

  canUndo(): boolean {
    return this._undoPos >= 0;
  }

  canRedo(): boolean {
    return this._undoPos < this.entries.length - 1;
  }

  /** Undo the entry at `undoPos`. */
  undo(target: UndoTarget): UndoResult {
    if (!this.canUndo()) return { ok: false, message: 'already at oldest change' };
    const entry = this.entries[this._undoPos];
    this._undoPos--;
    revertEntry(entry, target);
    return { ok: true, entry, atSavedState: this._undoPos === this.savedPos };
  }

  /** Redo the entry after `undoPos`. */
  redo(target: UndoTarget): UndoResult {
    if (!this.canRedo()) return { ok: false, message: 'already at newest change' };
    this._undoPos++;
    const entry = this.entries[this._undoPos];
    replayEntry(entry, target);
    return { ok: true, entry, atSavedState: this._undoPos === this.savedPos };
  }

  /** Remember the current position as the one matching the saved file. */
  markSaved(): void {
    this.savedPos = this._undoPos;
  }

  isAtSavedState(): boolean {
    return this._undoPos === this.savedPos;
  }

  /** Clear all history, e.g. when a new file is loaded. */
  clear(): void {
    this.entries = [];
    this._undoPos = -1;
    this.savedPos = -1;
  }
}
