/**
 * @wtoken/ledger — Undo journal.
 *
 * State holders record an undo closure before each write. Inside
 * `atomically()`, a throw replays the closures in reverse, so a failed
 * operation leaves no partial state behind.
 *
 * Nested `atomically()` calls join the outermost unit.
 */
export class Journal {
  private _undo: (() => void)[] | null = null;

  /** Whether a unit of work is currently open. */
  get active(): boolean {
    return this._undo !== null;
  }

  /**
   * Record how to revert a write that is about to happen.
   * Outside a unit of work the write is final and nothing is recorded.
   */
  record(undo: () => void): void {
    this._undo?.push(undo);
  }

  /**
   * Run `fn` as a single unit. On throw, every recorded write is reverted
   * and the error is rethrown unchanged.
   */
  atomically<T>(fn: () => T): T {
    if (this._undo !== null) {
      return fn();
    }

    const undo: (() => void)[] = [];
    this._undo = undo;
    try {
      return fn();
    } catch (err) {
      for (let i = undo.length - 1; i >= 0; i--) {
        undo[i]!();
      }
      throw err;
    } finally {
      this._undo = null;
    }
  }
}
