import { describe, expect, it } from 'vitest';
import { Range, Selection } from '../src/text/selection.js';
import { Transaction } from '../src/text/transaction.js';

describe('transaction', () => {
  it('applies changes against the original text', () => {
    const transaction = Transaction.change('hello world', [
      { from: 6, to: 11, insert: 'there' },
      { from: 0, to: 1, insert: 'J' },
    ]);
    expect(transaction.apply('hello world')).toBe('Jello there');
  });

  it('rejects changes outside the text', () => {
    expect(() => Transaction.change('hello', [{ from: 0, to: 9, insert: '' }])).toThrow(
      'Change 0..9 is out of bounds for a text of length 5',
    );
  });

  it('coalesces overlapping deletions', () => {
    const transaction = Transaction.change('abcdef', [
      { from: 1, to: 3, insert: '' },
      { from: 2, to: 4, insert: '' },
    ]);
    expect(transaction.apply('abcdef')).toBe('aef');
  });

  it('rejects other overlaps', () => {
    expect(() =>
      Transaction.change('abcdef', [
        { from: 1, to: 3, insert: 'x' },
        { from: 2, to: 4, insert: '' },
      ]),
    ).toThrow('Change 2..4 overlaps 1..3');
  });

  it('maps selections unless one is given', () => {
    const transaction = Transaction.change('abc', [{ from: 0, to: 0, insert: '>' }]);
    expect(transaction.selectionAfter(Selection.point(1))).toStrictEqual(Selection.point(2));

    const explicit = transaction.withSelection(Selection.point(0));
    expect(explicit.selectionAfter(Selection.point(1))).toStrictEqual(Selection.point(0));
  });

  it('builds one change per range', () => {
    const selection = Selection.create([Range.point(0), Range.point(2)]);
    const transaction = Transaction.changeBySelection('ab', selection, (range) => ({
      from: range.from,
      to: range.to,
      insert: '-',
    }));
    expect(transaction.apply('ab')).toBe('-ab-');
    expect(transaction.isEmpty()).toBe(false);
  });
});
