import type { Range } from './selection.js';
import { Selection } from './selection.js';

interface Change {
  from: number;
  to: number;
  insert: string;
}

/**
 * A set of replace-range edits against one text, optionally paired with the
 * selection the edited text should end up with.
 */
class Transaction {
  private constructor(
    readonly changes: readonly Change[],
    readonly selection?: Selection,
  ) {}

  /**
   * Changes are sorted by start. Overlapping deletions are coalesced; any
   * other overlap is rejected.
   */
  static change(text: string, changes: Iterable<Change>): Transaction {
    const sorted = [...changes].sort((a, b) => a.from - b.from || a.to - b.to);
    const output: Change[] = [];
    for (const change of sorted) {
      if (change.from < 0 || change.from > change.to || change.to > text.length) {
        throw new Error(
          `Change ${change.from}..${change.to} is out of bounds for a text of length ${text.length}`,
        );
      }
      const last = output[output.length - 1];
      if (last !== undefined && change.from < last.to) {
        if (last.insert.length > 0 || change.insert.length > 0) {
          throw new Error(`Change ${change.from}..${change.to} overlaps ${last.from}..${last.to}`);
        }
        last.to = Math.max(last.to, change.to);
        continue;
      }
      output.push({ ...change });
    }
    return new Transaction(output);
  }

  static changeBySelection(
    text: string,
    selection: Selection,
    fn: (range: Range) => Change,
  ): Transaction {
    return Transaction.change(text, selection.ranges.map(fn));
  }

  withSelection(selection: Selection): Transaction {
    return new Transaction(this.changes, selection);
  }

  apply(text: string): string {
    let output = '';
    let cursor = 0;
    for (const change of this.changes) {
      output += text.slice(cursor, change.from) + change.insert;
      cursor = change.to;
    }
    return output + text.slice(cursor);
  }

  /** The selection after this transaction, for a view holding `previous`. */
  selectionAfter(previous: Selection): Selection {
    return this.selection ?? previous.map(this.changes);
  }

  isEmpty(): boolean {
    return this.changes.every(
      (change) => change.from === change.to && change.insert.length === 0,
    );
  }
}

export { Transaction };
export type { Change };
