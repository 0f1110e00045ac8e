/**
 * @custodia/ledger — Undo journal.
 *
 * Every mutation made while a savepoint is open registers an undo action.
 * Rolling back to a savepoint runs the undo actions recorded after it in
 * reverse order; releasing the outermost savepoint discards the journal.
 *
 * Savepoints nest. A nested savepoint that is released keeps its undo
 * actions so the enclosing savepoint can still roll them back.
 */

import { LedgerError } from "./types.js";

export type UndoAction = () => void;

export class Journal {
  private readonly _undo: UndoAction[] = [];
  private readonly _marks: number[] = [];

  /**
   * Record an undo action. No-op when no savepoint is open.
   */
  record(undo: UndoAction): void {
    if (this._marks.length > 0) {
      this._undo.push(undo);
    }
  }

  /**
   * Open a savepoint and return its handle.
   */
  savepoint(): number {
    const mark = this._undo.length;
    this._marks.push(mark);
    return mark;
  }

  /**
   * Undo everything recorded since `savepoint` and close it.
   */
  rollbackTo(savepoint: number): void {
    this._close(savepoint);
    while (this._undo.length > savepoint) {
      const undo = this._undo.pop();
      if (undo === undefined) break;
      undo();
    }
  }

  /**
   * Close `savepoint`, keeping its effects.
   */
  release(savepoint: number): void {
    this._close(savepoint);
    if (this._marks.length === 0) {
      this._undo.length = 0;
    }
  }

  /** Number of open savepoints. */
  get depth(): number {
    return this._marks.length;
  }

  private _close(savepoint: number): void {
    const top = this._marks[this._marks.length - 1];
    if (top !== savepoint) {
      throw new LedgerError(
        "INVALID_SAVEPOINT",
        `Savepoint ${String(savepoint)} is not the innermost open savepoint`,
      );
    }
    this._marks.pop();
  }
}
