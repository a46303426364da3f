import {
  lineAt,
  lineCount,
  lineEnd,
  lineEndInclusive,
  lineStart,
  offsetToPosition,
  positionToOffset,
} from '../text/lines.js';
import { Range, Selection } from '../text/selection.js';
import { Transaction } from '../text/transaction.js';
import type { Change } from '../text/transaction.js';
import type { Document } from './document.js';
import type { Editor } from './editor.js';
import { CommandError } from './errors.js';

type StaticCommand = (editor: Editor) => void;

interface TypableCommand {
  name: string;
  aliases: string[];
  run(editor: Editor, args: string[], force: boolean): void;
}

const DEFAULT_COMMENT_TOKEN = '//';
const DEFAULT_INDENT_UNIT = '\t';

function previousOffset(text: string, pos: number): number {
  if (pos >= 2 && text.slice(pos - 2, pos) === '\r\n') {
    return pos - 2;
  }
  return Math.max(0, pos - 1);
}

function nextOffset(text: string, pos: number): number {
  if (text.slice(pos, pos + 2) === '\r\n') {
    return pos + 2;
  }
  return Math.min(text.length, pos + 1);
}

function setSelection(editor: Editor, selection: Selection): void {
  const { view, doc } = editor.current();
  doc.setSelection(view.id, selection);
}

function moveCursors(editor: Editor, fn: (text: string, head: number) => number): void {
  const { view, doc } = editor.current();
  const selection = doc
    .selection(view.id)
    .transform((range) => Range.point(fn(doc.text, range.head)));
  doc.setSelection(view.id, selection);
}

function collapse(editor: Editor, fn: (range: Range) => number): void {
  const { view, doc } = editor.current();
  doc.setSelection(view.id, doc.selection(view.id).transform((range) => Range.point(fn(range))));
}

function moveLine(text: string, head: number, delta: number): number {
  const { row, col } = offsetToPosition(text, head);
  const target = Math.min(Math.max(row + delta, 0), lineCount(text) - 1);
  return positionToOffset(text, { row: target, col });
}

function editSelection(editor: Editor, fn: (range: Range, doc: Document) => Change): void {
  const { view, doc } = editor.current();
  const transaction = Transaction.changeBySelection(doc.text, doc.selection(view.id), (range) =>
    fn(range, doc),
  );
  doc.apply(transaction, view.id);
}

/** Replaces every range with `text`; cursors end up after it. */
function insertText(editor: Editor, text: string): void {
  editSelection(editor, (range) => ({ from: range.from, to: range.to, insert: text }));
}

function deleteSelection(editor: Editor): void {
  editSelection(editor, (range) => ({ from: range.from, to: range.to, insert: '' }));
}

function extendLineBelow(editor: Editor): void {
  const { view, doc } = editor.current();
  const text = doc.text;
  const selection = doc.selection(view.id).transform((range) => {
    const firstLine = lineAt(text, range.from);
    const lastLine = lineAt(text, range.isEmpty() ? range.head : range.to - 1);
    const start = lineStart(text, firstLine);
    let end = lineEndInclusive(text, lastLine);
    if (range.from === start && range.to === end && !range.isEmpty()) {
      end = lineEndInclusive(text, lastLine + 1);
    }
    return new Range(start, end);
  });
  doc.setSelection(view.id, selection);
}

function killToLineEnd(editor: Editor): void {
  collapse(editor, (range) => range.head);
  editSelection(editor, (range, doc) => ({
    from: range.head,
    to: Math.max(range.head, lineEnd(doc.text, lineAt(doc.text, range.head))),
    insert: '',
  }));
}

function openBelow(editor: Editor): void {
  const { view, doc } = editor.current();
  const text = doc.text;
  const ends = new Set(
    doc.selection(view.id).ranges.map((range) => lineEnd(text, lineAt(text, range.head))),
  );
  doc.setSelection(view.id, Selection.create([...ends].map((end) => Range.point(end))));
  const transaction = Transaction.change(
    text,
    [...ends].map((end) => ({ from: end, to: end, insert: doc.lineEnding })),
  );
  doc.apply(transaction, view.id);
  editor.mode = 'insert';
}

function copySelectionOnNextLine(editor: Editor): void {
  const { view, doc } = editor.current();
  const text = doc.text;
  const selection = doc.selection(view.id);
  const copies: Range[] = [];
  let primaryCopy: number | undefined;
  selection.ranges.forEach((range, index) => {
    const { row, col } = offsetToPosition(text, range.head);
    if (row + 1 >= lineCount(text)) {
      return;
    }
    if (index === selection.primaryIndex) {
      primaryCopy = selection.ranges.length + copies.length;
    }
    copies.push(Range.point(positionToOffset(text, { row: row + 1, col })));
  });
  doc.setSelection(
    view.id,
    Selection.create([...selection.ranges, ...copies], primaryCopy ?? selection.primaryIndex),
  );
}

function toggleComments(editor: Editor): void {
  const { view, doc } = editor.current();
  const text = doc.text;
  const token = doc.language?.commentToken ?? DEFAULT_COMMENT_TOKEN;

  const rows = new Set<number>();
  for (const range of doc.selection(view.id).ranges) {
    const first = lineAt(text, range.from);
    const last = lineAt(text, range.isEmpty() ? range.to : range.to - 1);
    for (let row = first; row <= last; row += 1) {
      rows.add(row);
    }
  }

  const lines = [...rows]
    .sort((a, b) => a - b)
    .map((row) => {
      const start = lineStart(text, row);
      const content = text.slice(start, lineEnd(text, row));
      const indent = content.length - content.trimStart().length;
      return { at: start + indent, body: content.slice(indent) };
    })
    .filter((line) => line.body.length > 0);
  if (lines.length === 0) {
    return;
  }

  const commented = lines.every((line) => line.body.startsWith(token));
  const changes = lines.map(({ at, body }): Change => {
    if (!commented) {
      return { from: at, to: at, insert: `${token} ` };
    }
    const width = body.startsWith(`${token} `) ? token.length + 1 : token.length;
    return { from: at, to: at + width, insert: '' };
  });
  doc.apply(Transaction.change(text, changes), view.id);
}

const STATIC_COMMANDS: Record<string, StaticCommand> = {
  move_char_left: (editor) => moveCursors(editor, previousOffset),
  move_char_right: (editor) => moveCursors(editor, nextOffset),
  move_line_down: (editor) => moveCursors(editor, (text, head) => moveLine(text, head, 1)),
  move_line_up: (editor) => moveCursors(editor, (text, head) => moveLine(text, head, -1)),
  goto_line_start: (editor) =>
    moveCursors(editor, (text, head) => lineStart(text, lineAt(text, head))),
  goto_line_end: (editor) => moveCursors(editor, (text, head) => lineEnd(text, lineAt(text, head))),
  goto_file_start: (editor) => setSelection(editor, Selection.point(0)),
  goto_file_end: (editor) =>
    setSelection(editor, Selection.point(editor.currentDocument().text.length)),
  select_all: (editor) =>
    setSelection(editor, Selection.single(0, editor.currentDocument().text.length)),
  extend_line_below: extendLineBelow,
  delete_selection: deleteSelection,
  change_selection: (editor) => {
    deleteSelection(editor);
    editor.mode = 'insert';
  },
  kill_to_line_end: killToLineEnd,
  insert_mode: (editor) => {
    collapse(editor, (range) => range.from);
    editor.mode = 'insert';
  },
  append_mode: (editor) => {
    collapse(editor, (range) => range.to);
    editor.mode = 'insert';
  },
  open_below: openBelow,
  collapse_selection: (editor) => collapse(editor, (range) => range.head),
  copy_selection_on_next_line: copySelectionOnNextLine,
  toggle_comments: toggleComments,
  command_mode: (editor) => {
    editor.mode = 'command';
    editor.commandLine = '';
  },
  normal_mode: (editor) => {
    editor.mode = 'normal';
  },
  insert_newline: (editor) => insertText(editor, editor.currentDocument().lineEnding),
  insert_tab: (editor) =>
    insertText(editor, editor.currentDocument().language?.indent?.unit ?? DEFAULT_INDENT_UNIT),
  delete_char_backward: (editor) =>
    editSelection(editor, (range, doc) => ({
      from: previousOffset(doc.text, range.head),
      to: range.head,
      insert: '',
    })),
  delete_char_forward: (editor) =>
    editSelection(editor, (range, doc) => ({
      from: range.head,
      to: nextOffset(doc.text, range.head),
      insert: '',
    })),
};

function ensureSaved(editor: Editor, force: boolean, writing: readonly Document[] = []): void {
  if (force) {
    return;
  }
  const unsaved = editor.modifiedDocuments().filter((doc) => !writing.includes(doc));
  if (unsaved.length > 0) {
    const names = unsaved.map((doc) => doc.displayName()).join(', ');
    throw new CommandError(`${unsaved.length} unsaved buffer(s) remaining: ${names}`);
  }
}

function writeCurrent(editor: Editor, args: string[]): Document {
  const doc = editor.currentDocument();
  editor.save(doc, args[0]);
  return doc;
}

function writeAll(editor: Editor): Document[] {
  const modified = editor.modifiedDocuments();
  const unnamed = modified.filter((doc) => doc.filePath === undefined);
  if (unnamed.length > 0) {
    throw new CommandError('Cannot write a buffer without a filename');
  }
  for (const doc of modified) {
    editor.save(doc);
  }
  return modified;
}

const TYPABLE_COMMANDS: TypableCommand[] = [
  {
    name: 'quit',
    aliases: ['q'],
    run: (editor, _args, force) => {
      ensureSaved(editor, force);
      editor.requestExit();
    },
  },
  {
    name: 'quit-all',
    aliases: ['qa'],
    run: (editor, _args, force) => {
      ensureSaved(editor, force);
      editor.requestExit();
    },
  },
  {
    name: 'write',
    aliases: ['w'],
    run: (editor, args) => {
      writeCurrent(editor, args);
    },
  },
  {
    name: 'write-quit',
    aliases: ['wq', 'x'],
    run: (editor, args, force) => {
      const doc = writeCurrent(editor, args);
      ensureSaved(editor, force, [doc]);
      editor.requestExit();
    },
  },
  {
    name: 'write-all',
    aliases: ['wa'],
    run: (editor) => {
      writeAll(editor);
    },
  },
  {
    name: 'write-quit-all',
    aliases: ['wqa', 'xa'],
    run: (editor, _args, force) => {
      const written = writeAll(editor);
      ensureSaved(editor, force, written);
      editor.requestExit();
    },
  },
  {
    name: 'open',
    aliases: ['o', 'e', 'edit'],
    run: (editor, args) => {
      const [target] = args;
      if (target === undefined) {
        throw new CommandError('open needs a file path');
      }
      try {
        editor.open(target);
      } catch (error) {
        if (error instanceof CommandError || !(error instanceof Error)) {
          throw error;
        }
        throw new CommandError(`Failed to open ${target}: ${error.message}`);
      }
    },
  },
  {
    name: 'language',
    aliases: ['lang'],
    run: (editor, args) => {
      const doc = editor.currentDocument();
      const [name] = args;
      if (name === undefined) {
        editor.setStatus(doc.language?.name ?? 'text');
        return;
      }
      if (name === 'text') {
        doc.language = undefined;
        return;
      }
      const language = editor.syntax.languageByName(name);
      if (language === undefined) {
        throw new CommandError(`Unknown language: ${name}`);
      }
      doc.language = language;
    },
  },
];

function findTypableCommand(name: string): TypableCommand | undefined {
  return TYPABLE_COMMANDS.find(
    (command) => command.name === name || command.aliases.includes(name),
  );
}

/** Runs a `:` command line such as `w out.txt` or `q!`. */
function executeCommandLine(editor: Editor, line: string): void {
  const [head, ...args] = line.trim().split(/\s+/);
  if (head === undefined || head.length === 0) {
    return;
  }
  const force = head.endsWith('!');
  const name = force ? head.slice(0, -1) : head;
  const command = findTypableCommand(name);
  if (command === undefined) {
    throw new CommandError(`No such command: '${name}'`);
  }
  command.run(editor, args, force);
}

/**
 * Runs a keymap binding: a static command name, or a command line prefixed
 * with `:`.
 */
function runBinding(editor: Editor, binding: string): void {
  if (binding.startsWith(':')) {
    executeCommandLine(editor, binding.slice(1));
    return;
  }
  if (!Object.prototype.hasOwnProperty.call(STATIC_COMMANDS, binding)) {
    throw new CommandError(`No such command: '${binding}'`);
  }
  STATIC_COMMANDS[binding]?.(editor);
}

export { executeCommandLine, findTypableCommand, insertText, runBinding, STATIC_COMMANDS };
export type { StaticCommand, TypableCommand };
