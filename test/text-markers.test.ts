import { describe, expect, it } from 'vitest';
import { parseMarked, renderMarked } from '../src/text/markers.js';
import { Range, Selection } from '../src/text/selection.js';

describe('parseMarked', () => {
  it('parses a cursor', () => {
    const { text, selection } = parseMarked('#[|]#hello');
    expect(text).toBe('hello');
    expect(selection).toStrictEqual(Selection.point(0));
  });

  it('parses forward and backward ranges', () => {
    expect(parseMarked('a#[bc|]#d').selection).toStrictEqual(Selection.single(1, 3));
    expect(parseMarked('#[|ab]#c').selection).toStrictEqual(Selection.single(2, 0));
  });

  it('parses secondary ranges', () => {
    const { text, selection } = parseMarked('a#(|)#b#[|]#');
    expect(text).toBe('ab');
    expect(selection).toStrictEqual(Selection.create([Range.point(1), Range.point(2)], 1));
  });

  it('rejects malformed literals', () => {
    expect(() => parseMarked('abc')).toThrow('No selection markers found');
    expect(() => parseMarked('#[ab]#')).toThrow('Range starting at 0 has no head marker');
    expect(() => parseMarked('#[a|b]#')).toThrow(
      'Head marker of range 0..2 must be at the start or the end',
    );
    expect(() => parseMarked('#[|a')).toThrow('Range starting at 0 is never closed');
    expect(() => parseMarked('#(|)#')).toThrow('No primary range found');
    expect(() => parseMarked('#[|]##[|]#')).toThrow('More than one primary range');
  });
});

describe('renderMarked', () => {
  it('writes heads where parseMarked reads them', () => {
    const literal = 'a#(|)#b#[cd|]#e';
    const { text, selection } = parseMarked(literal);
    expect(renderMarked(text, selection)).toBe(literal);
  });
});
