import type { Change } from './transaction.js';

type Assoc = 'before' | 'after';

/**
 * Maps an offset in the original text to its offset after `changes` were
 * applied. `changes` must be sorted and non-overlapping.
 */
function mapPosition(pos: number, changes: readonly Change[], assoc: Assoc): number {
  let delta = 0;
  for (const change of changes) {
    if (pos < change.from) {
      break;
    }
    const removed = change.to - change.from;
    if (pos > change.to) {
      delta += change.insert.length - removed;
      continue;
    }
    if (removed === 0) {
      return pos + delta + (assoc === 'after' ? change.insert.length : 0);
    }
    if (pos === change.to) {
      return change.from + delta + change.insert.length;
    }
    if (pos === change.from) {
      return change.from + delta;
    }
    return change.from + delta + (assoc === 'after' ? change.insert.length : 0);
  }
  return pos + delta;
}

class Range {
  constructor(
    readonly anchor: number,
    readonly head: number,
  ) {}

  static point(pos: number): Range {
    return new Range(pos, pos);
  }

  get from(): number {
    return Math.min(this.anchor, this.head);
  }

  get to(): number {
    return Math.max(this.anchor, this.head);
  }

  isEmpty(): boolean {
    return this.anchor === this.head;
  }

  isBackward(): boolean {
    return this.head < this.anchor;
  }

  overlaps(other: Range): boolean {
    if (this.from === other.from) {
      return true;
    }
    return this.from < other.to && other.from < this.to;
  }

  /** Joins two ranges, keeping this range's direction. */
  merge(other: Range): Range {
    const from = Math.min(this.from, other.from);
    const to = Math.max(this.to, other.to);
    return this.isBackward() ? new Range(to, from) : new Range(from, to);
  }

  map(changes: readonly Change[]): Range {
    if (this.isEmpty()) {
      return Range.point(mapPosition(this.head, changes, 'after'));
    }
    const from = mapPosition(this.from, changes, 'after');
    const to = Math.max(from, mapPosition(this.to, changes, 'before'));
    return this.isBackward() ? new Range(to, from) : new Range(from, to);
  }

  equals(other: Range): boolean {
    return this.anchor === other.anchor && this.head === other.head;
  }
}

/**
 * One or more ranges over a text, one of which is primary. Ranges are kept
 * sorted by start and never overlap.
 */
class Selection {
  private constructor(
    readonly ranges: readonly Range[],
    readonly primaryIndex: number,
  ) {}

  static create(ranges: readonly Range[], primaryIndex = 0): Selection {
    if (ranges.length === 0) {
      throw new Error('A selection needs at least one range');
    }
    if (primaryIndex < 0 || primaryIndex >= ranges.length) {
      throw new Error(`Primary index ${primaryIndex} out of bounds for ${ranges.length} ranges`);
    }
    return Selection.normalize(ranges, primaryIndex);
  }

  static single(anchor: number, head: number): Selection {
    return new Selection([new Range(anchor, head)], 0);
  }

  static point(pos: number): Selection {
    return Selection.single(pos, pos);
  }

  primary(): Range {
    const range = this.ranges[this.primaryIndex];
    if (range === undefined) {
      throw new Error('Selection has no primary range');
    }
    return range;
  }

  transform(fn: (range: Range) => Range): Selection {
    return Selection.create(this.ranges.map(fn), this.primaryIndex);
  }

  map(changes: readonly Change[]): Selection {
    if (changes.length === 0) {
      return this;
    }
    return this.transform((range) => range.map(changes));
  }

  isValidFor(length: number): boolean {
    return this.ranges.every(
      (range) => range.from >= 0 && range.to <= length,
    );
  }

  private static normalize(ranges: readonly Range[], primaryIndex: number): Selection {
    const indexed = ranges
      .map((range, index) => ({ range, primary: index === primaryIndex }))
      .sort((a, b) => a.range.from - b.range.from || a.range.to - b.range.to);

    const merged: { range: Range; primary: boolean }[] = [];
    for (const entry of indexed) {
      const last = merged[merged.length - 1];
      if (last !== undefined && last.range.overlaps(entry.range)) {
        last.range = last.range.merge(entry.range);
        last.primary = last.primary || entry.primary;
        continue;
      }
      merged.push({ ...entry });
    }

    return new Selection(
      merged.map((entry) => entry.range),
      merged.findIndex((entry) => entry.primary),
    );
  }

  equals(other: Selection): boolean {
    return (
      this.primaryIndex === other.primaryIndex &&
      this.ranges.length === other.ranges.length &&
      this.ranges.every((range, index) => {
        const candidate = other.ranges[index];
        return candidate !== undefined && range.equals(candidate);
      })
    );
  }
}

export { mapPosition, Range, Selection };
export type { Assoc };
