import { describe, expect, it } from 'vitest';
import { key } from '../src/editor/input.js';
import { MacroParseError, parseMacro } from '../src/editor/macro.js';

describe('parseMacro', () => {
  it('turns every character into a key', () => {
    expect(parseMacro('ab')).toStrictEqual([key('a'), key('b')]);
  });

  it('reads named keys and modifiers', () => {
    expect(parseMacro('<esc>:q!<ret>').map((event) => event.code)).toStrictEqual([
      'esc',
      ':',
      'q',
      '!',
      'ret',
    ]);
    expect(parseMacro('<C-c>')).toStrictEqual([key('c', { ctrl: true })]);
    expect(parseMacro('<A-S-left>')).toStrictEqual([key('left', { alt: true, shift: true })]);
  });

  it('reads escaped characters', () => {
    expect(parseMacro('<lt><gt><space><minus>').map((event) => event.code)).toStrictEqual([
      '<',
      '>',
      ' ',
      '-',
    ]);
  });

  it('rejects malformed macros', () => {
    expect(() => parseMacro('<esc')).toThrow("Unclosed '<' at offset 0");
    expect(() => parseMacro('a<>')).toThrow('Empty key name at offset 1');
    expect(() => parseMacro('<foo>')).toThrow('Unknown key <foo>');
    expect(() => parseMacro('<C-C-x>')).toThrow('Repeated modifier in <C-C-x>');
    expect(() => parseMacro('<foo>')).toThrow(MacroParseError);
  });
});
