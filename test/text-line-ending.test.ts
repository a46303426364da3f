import { describe, expect, it } from 'vitest';
import {
  applyLineFeedHandling,
  detectLineEnding,
  lineEndingFor,
  LineFeedHandling,
  NATIVE_LINE_ENDING,
} from '../src/text/line-ending.js';

const EOL = NATIVE_LINE_ENDING;

describe('line feed handling', () => {
  it('leaves text untouched as-is', () => {
    expect(applyLineFeedHandling(LineFeedHandling.AsIs, 'a\nb')).toBe('a\nb');
    expect(applyLineFeedHandling(LineFeedHandling.AsIs, '')).toBe('');
  });

  it('rewrites line feeds and adds a final line ending', () => {
    expect(applyLineFeedHandling(LineFeedHandling.Native, 'a\nb')).toBe(`a${EOL}b${EOL}`);
    expect(applyLineFeedHandling(LineFeedHandling.Native, '')).toBe(EOL);
  });

  it('does not add a second final line ending', () => {
    expect(applyLineFeedHandling(LineFeedHandling.Native, 'a\n')).toBe(`a${EOL}`);
  });

  it('keeps other characters', () => {
    expect(applyLineFeedHandling(LineFeedHandling.Native, '\t#[|]# x')).toBe(`\t#[|]# x${EOL}`);
  });
});

describe('line endings', () => {
  it('detects the first line ending', () => {
    expect(detectLineEnding('a\r\nb\nc')).toBe('\r\n');
    expect(detectLineEnding('a\nb')).toBe('\n');
    expect(detectLineEnding('abc')).toBeUndefined();
  });

  it('resolves configured endings', () => {
    expect(lineEndingFor('lf')).toBe('\n');
    expect(lineEndingFor('crlf')).toBe('\r\n');
    expect(lineEndingFor('native')).toBe(EOL);
  });
});
