/**
 * @custodia/ledger — Append-only history log.
 *
 * Entries are sequenced from 1 in insertion order and never edited.
 * Reads never mutate or reorder the underlying log.
 */

import type { HistoryEntry } from "@custodia/types";
import { Journal } from "./journal.js";
import { encodeCursor, iteratePages, resolveCursor } from "./pagination.js";
import type { PaginatedResponse, PaginationQuery } from "./pagination.js";
import type { HistoryDraft } from "./types.js";
import { LedgerError } from "./types.js";

const CURSOR_FIELD = "sequence";

export class HistoryLog {
  private readonly _entries: HistoryEntry[] = [];
  private readonly _journal: Journal;

  constructor(journal: Journal) {
    this._journal = journal;
  }

  /**
   * Append an entry, assigning the next sequence number.
   */
  append(draft: HistoryDraft): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({
      ...draft,
      sequence: this._entries.length + 1,
    });
    this._entries.push(entry);
    this._journal.record(() => {
      this._entries.pop();
    });
    return entry;
  }

  /**
   * The last `min(n, length)` entries, most recent first.
   */
  recent(n: number): readonly HistoryEntry[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new LedgerError("INVALID_LIMIT", `recent() expects a non-negative integer, got ${String(n)}`);
    }
    const count = Math.min(n, this._entries.length);
    return this._entries.slice(this._entries.length - count).reverse();
  }

  /**
   * One page of entries in insertion order.
   */
  page(query: PaginationQuery): PaginatedResponse<HistoryEntry> {
    const after = resolveCursor(query, CURSOR_FIELD);
    // Sequence n lives at index n - 1, so the page starts at index `after`.
    const data = this._entries.slice(after, after + query.limit);
    const hasMore = after + data.length < this._entries.length;
    const last = data[data.length - 1];
    const cursor =
      hasMore && last !== undefined ? encodeCursor(CURSOR_FIELD, last.sequence) : null;
    return { data, pagination: { cursor, hasMore } };
  }

  /**
   * Lazily walk the whole log, `pageSize` entries at a time.
   */
  iterate(pageSize: number): Iterable<HistoryEntry> {
    return iteratePages((query) => this.page(query), pageSize);
  }

  /**
   * All entries touching `key`, in insertion order.
   */
  forKey(key: string): readonly HistoryEntry[] {
    return this._entries.filter((e) => e.key === key);
  }

  get length(): number {
    return this._entries.length;
  }

  /** Copy of every entry, for snapshots. */
  toArray(): readonly HistoryEntry[] {
    return [...this._entries];
  }
}
