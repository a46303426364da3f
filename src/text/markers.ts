import { Range, Selection } from './selection.js';

class MarkerParseError extends Error {
  constructor(
    message: string,
    readonly literal: string,
  ) {
    super(message);
    this.name = 'MarkerParseError';
  }
}

interface MarkedText {
  text: string;
  selection: Selection;
}

interface OpenRange {
  primary: boolean;
  start: number;
  head?: number;
}

/**
 * Splits a literal with inline selection markers into plain text and a
 * selection.
 *
 * `#[` `]#` wrap the primary range and `#(` `)#` a secondary one. A `|` inside
 * the brackets marks the head and must sit at either end of the range, so
 * `#[|abc]#` selects `abc` backwards and `#[|]#` is a cursor.
 */
function parseMarked(literal: string): MarkedText {
  let text = '';
  const ranges: Range[] = [];
  let primaryIndex: number | undefined;
  let open: OpenRange | undefined;

  function fail(message: string): never {
    throw new MarkerParseError(message, literal);
  }

  let index = 0;
  while (index < literal.length) {
    const char = literal.charAt(index);
    const next = literal.charAt(index + 1);

    if (char === '#' && (next === '[' || next === '(')) {
      if (open) {
        fail(`Nested range opened at offset ${index}`);
      }
      open = { primary: next === '[', start: text.length };
      index += 2;
      continue;
    }

    if (open && char === '|') {
      if (open.head !== undefined) {
        fail(`Range starting at ${open.start} has more than one head marker`);
      }
      open.head = text.length;
      index += 1;
      continue;
    }

    if (open && next === '#' && char === (open.primary ? ']' : ')')) {
      const { primary, start, head } = open;
      const end = text.length;
      if (head === undefined) {
        fail(`Range starting at ${start} has no head marker`);
      } else if (head !== start && head !== end) {
        fail(`Head marker of range ${start}..${end} must be at the start or the end`);
      }
      if (primary) {
        if (primaryIndex !== undefined) {
          fail('More than one primary range');
        }
        primaryIndex = ranges.length;
      }
      ranges.push(head === start ? new Range(end, start) : new Range(start, end));
      open = undefined;
      index += 2;
      continue;
    }

    text += char;
    index += 1;
  }

  if (open) {
    fail(`Range starting at ${open.start} is never closed`);
  }
  if (ranges.length === 0) {
    fail('No selection markers found');
  }
  if (primaryIndex === undefined) {
    fail('No primary range found');
  }

  return { text, selection: Selection.create(ranges, primaryIndex) };
}

/** Inverse of {@link parseMarked}. */
function renderMarked(text: string, selection: Selection): string {
  let output = '';
  let cursor = 0;
  selection.ranges.forEach((range, index) => {
    const primary = index === selection.primaryIndex;
    const body = text.slice(range.from, range.to);
    output += text.slice(cursor, range.from);
    output += primary ? '#[' : '#(';
    output += range.isBackward() || range.isEmpty() ? `|${body}` : `${body}|`;
    output += primary ? ']#' : ')#';
    cursor = range.to;
  });
  return output + text.slice(cursor);
}

export { MarkerParseError, parseMarked, renderMarked };
export type { MarkedText };
