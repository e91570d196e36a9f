/**
 * Incremental search state: the previous committed query and the
 * highlight span of the match currently shown.
 */

import type { SearchMatch } from './search-engine';

/** Rendered-column span, end exclusive. */
export interface HighlightSpan {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

export type SearchDirection = 'forward' | 'backward';

export class IncrementalSearch {
  private _lastQuery: string = '';
  private _span: HighlightSpan | null = null;

  get lastQuery(): string {
    return this._lastQuery;
  }

  get span(): HighlightSpan | null {
    return this._span;
  }

  /** Remember a query for later repeats. */
  commit(query: string): void {
    this._lastQuery = query;
  }

  showMatch(match: SearchMatch): void {
    this._span = {
      startRow: match.row,
      startCol: match.start,
      endRow: match.row,
      endCol: match.end,
    };
  }

  clearSpan(): void {
    this._span = null;
  }
}
