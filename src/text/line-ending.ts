import os from 'node:os';

type LineEnding = '\n' | '\r\n';

const NATIVE_LINE_ENDING: LineEnding = os.EOL === '\r\n' ? '\r\n' : '\n';

/**
 * How a literal fixture's line feeds are treated before it becomes document
 * state.
 *
 * - `native` replaces every LF with the host line ending and makes sure the
 *   text ends with one.
 * - `asIs` leaves the text untouched.
 */
const LineFeedHandling = {
  Native: 'native',
  AsIs: 'asIs',
} as const;

type LineFeedHandling = (typeof LineFeedHandling)[keyof typeof LineFeedHandling];

function applyLineFeedHandling(handling: LineFeedHandling, text: string): string {
  if (handling === LineFeedHandling.AsIs) {
    return text;
  }

  // fixtures are written with LF, so only bare LF needs rewriting
  let output = text.replace(/\n/g, NATIVE_LINE_ENDING);
  if (!output.endsWith(NATIVE_LINE_ENDING)) {
    output += NATIVE_LINE_ENDING;
  }
  return output;
}

function detectLineEnding(text: string): LineEnding | undefined {
  const index = text.indexOf('\n');
  if (index < 0) {
    return undefined;
  }
  return index > 0 && text[index - 1] === '\r' ? '\r\n' : '\n';
}

function lineEndingFor(setting: 'native' | 'lf' | 'crlf'): LineEnding {
  switch (setting) {
    case 'native':
      return NATIVE_LINE_ENDING;
    case 'lf':
      return '\n';
    case 'crlf':
      return '\r\n';
  }
}

export {
  applyLineFeedHandling,
  detectLineEnding,
  lineEndingFor,
  LineFeedHandling,
  NATIVE_LINE_ENDING,
};
export type { LineEnding };
