import { describe, expect, it } from 'vitest';
import { createSyntaxLoader, mergeLanguageConfig, SyntaxLoader } from '../src/editor/syntax.js';

describe('syntax loader', () => {
  it('finds languages by file extension', () => {
    const loader = createSyntaxLoader();
    expect(loader.languageForPath('/work/main.ts')?.name).toBe('typescript');
    expect(loader.languageForPath('/work/script.py')?.commentToken).toBe('#');
    expect(loader.languageForPath('/work/Makefile')).toBeUndefined();
  });

  it('merges overrides by name', () => {
    const loader = createSyntaxLoader({
      language: [
        { name: 'python', commentToken: ';' },
        { name: 'lisp', fileTypes: ['lisp'], commentToken: ';' },
      ],
    });
    expect(loader.languageByName('python')).toStrictEqual({
      name: 'python',
      fileTypes: ['py', 'pyi'],
      commentToken: ';',
      indent: { unit: '    ' },
    });
    expect(loader.languageForPath('core.lisp')?.name).toBe('lisp');
  });

  it('appends languages that are new', () => {
    const merged = mergeLanguageConfig(
      { language: [{ name: 'plain', fileTypes: ['txt'] }] },
      { language: [{ name: 'notes' }] },
    );
    expect(merged.language.map((language) => language.name)).toStrictEqual(['plain', 'notes']);
    expect(merged.language[1]?.fileTypes).toStrictEqual([]);
  });

  it('rejects duplicate names', () => {
    expect(
      () =>
        new SyntaxLoader({
          language: [
            { name: 'plain', fileTypes: [] },
            { name: 'plain', fileTypes: [] },
          ],
        }),
    ).toThrow('Language "plain" defined twice');
  });
});
