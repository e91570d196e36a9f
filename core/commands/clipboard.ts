/**
 * Clipboard commands: cut the cursor/mark region, paste.
 *
 * The engine talks to the clipboard through the Clipboard interface. The
 * host injects the system clipboard; InternalClipboard serves tests and
 * hosts without one.
 */

import { extractRegion } from '../buffer/region';
import { orderRegion } from '../cursor/selection';
import { insertChar, type EditContext } from './editing';

export interface Clipboard {
  setText(text: string): void;
  /** Current clipboard text, or null when there is none. */
  getText(): string | null;
}

export class InternalClipboard implements Clipboard {
  private text: string | null = null;

  setText(text: string): void {
    this.text = text;
  }

  getText(): string | null {
    return this.text;
  }
}

/**
 * Cut the region between the (clamped) mark and the cursor, hand it to the
 * clipboard and leave the cursor at the region start.
 * @returns The cut text, or null when mark and cursor coincide.
 */
export function cutRegion(ctx: EditContext, clipboard: Clipboard, record: boolean): string | null {
  const { buffer, cursor } = ctx;
  const region = orderRegion(cursor.clampedMark(), { row: cursor.cy, col: cursor.cx });
  if (!region) return null;

  const payload = extractRegion(buffer, region);
  cursor.setPosition(region.start.col, region.start.row);
  ctx.log.log(`clipboard: cut ${payload.length} chars`);
  clipboard.setText(payload);
  if (record) {
    ctx.history.push({
      kind: 'cutRegion',
      payload,
      originX: region.start.col,
      originY: region.start.row,
    });
  }
  return payload;
}

/**
 * Insert the clipboard text at the cursor, one character at a time.
 * @returns false when the clipboard is empty.
 */
export function paste(ctx: EditContext, clipboard: Clipboard, record: boolean): boolean {
  const text = clipboard.getText();
  if (text === null || text.length === 0) return false;

  const { cursor } = ctx;
  ctx.log.log(`clipboard: paste ${text.length} chars`);
  if (record) {
    ctx.history.push({ kind: 'paste', payload: text, originX: cursor.cx, originY: cursor.cy });
  }
  for (const ch of text) insertChar(ctx, ch, false);
  return true;
}
