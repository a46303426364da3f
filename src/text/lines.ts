/** Zero-based row and column, as given on the command line. */
interface Position {
  row: number;
  col: number;
}

const ORIGIN: Position = { row: 0, col: 0 };

function lineStarts(text: string): number[] {
  const starts = [0];
  for (let index = 0; index < text.length; index += 1) {
    if (text.charCodeAt(index) === 10) {
      starts.push(index + 1);
    }
  }
  return starts;
}

function lineCount(text: string): number {
  return lineStarts(text).length;
}

function lineAt(text: string, pos: number): number {
  const starts = lineStarts(text);
  let line = 0;
  while (line + 1 < starts.length && (starts[line + 1] ?? Infinity) <= pos) {
    line += 1;
  }
  return line;
}

function lineStart(text: string, line: number): number {
  const starts = lineStarts(text);
  return starts[Math.min(line, starts.length - 1)] ?? 0;
}

/** Offset just past the line's ending, or the end of the text. */
function lineEndInclusive(text: string, line: number): number {
  const starts = lineStarts(text);
  return line + 1 < starts.length ? (starts[line + 1] ?? text.length) : text.length;
}

/** Offset of the line's ending, or the end of the text on the last line. */
function lineEnd(text: string, line: number): number {
  const end = lineEndInclusive(text, line);
  if (end > 0 && text[end - 1] === '\n') {
    return end >= 2 && text[end - 2] === '\r' ? end - 2 : end - 1;
  }
  return end;
}

function positionToOffset(text: string, position: Position): number {
  const line = Math.min(Math.max(position.row, 0), lineCount(text) - 1);
  const start = lineStart(text, line);
  return Math.min(start + Math.max(position.col, 0), lineEnd(text, line));
}

function offsetToPosition(text: string, offset: number): Position {
  const row = lineAt(text, offset);
  return { row, col: offset - lineStart(text, row) };
}

export {
  lineAt,
  lineCount,
  lineEnd,
  lineEndInclusive,
  lineStart,
  lineStarts,
  offsetToPosition,
  ORIGIN,
  positionToOffset,
};
export type { Position };
