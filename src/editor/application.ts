import { getLogger } from '../logger.js';
import type { Position } from '../text/lines.js';
import { executeCommandLine, insertText, runBinding } from './commands.js';
import type { Config } from './config.js';
import { Editor } from './editor.js';
import { CommandError } from './errors.js';
import { formatKey, isPrintable } from './input.js';
import type { EventSource, InputEvent, InputResult, KeyEvent } from './input.js';
import { lookup } from './keymap.js';
import type { SyntaxLoader } from './syntax.js';

/** Launch arguments: files to open, in order, with their cursor positions. */
interface Args {
  files: Map<string, Position[]>;
  workingDirectory?: string;
}

function createArgs(): Args {
  return { files: new Map() };
}

/**
 * The editor process, minus the terminal. Input arrives through an
 * {@link EventSource}; the caller decides how long the loop runs.
 */
class Application {
  readonly editor: Editor;

  constructor(args: Args, config: Config, syntaxLoader: SyntaxLoader) {
    this.editor = new Editor(config, syntaxLoader);
    if (args.files.size === 0) {
      this.editor.newFile();
      return;
    }
    for (const [filePath, positions] of args.files) {
      this.editor.open(filePath, positions);
    }
    // the first file keeps focus
    const [first] = args.files;
    if (first !== undefined && args.files.size > 1) {
      this.editor.open(first[0], first[1]);
    }
  }

  /**
   * Handles queued input and pending writes until neither is left. Resolves
   * `false` once the editor asked to exit, `true` when it is idle and waiting.
   */
  async eventLoopUntilIdle(events: EventSource<InputResult>): Promise<boolean> {
    for (;;) {
      if (this.editor.shouldClose()) {
        return false;
      }
      const next = events.tryRecv();
      if (next !== undefined) {
        this.handleInput(next);
        continue;
      }
      if (this.editor.writes.size > 0) {
        await this.editor.settleWrites();
        continue;
      }
      return true;
    }
  }

  /**
   * Runs until the editor exits (`false`) or the event source closes
   * (`true`).
   */
  async eventLoop(events: EventSource<InputResult>): Promise<boolean> {
    for (;;) {
      const alive = await this.eventLoopUntilIdle(events);
      if (!alive) {
        return false;
      }
      const next = await events.recv();
      if (next === undefined) {
        return true;
      }
      this.handleInput(next);
    }
  }

  /** Flushes outstanding writes; every failure is returned. */
  async close(): Promise<Error[]> {
    const errors = await this.editor.flushWrites();
    getLogger().debug('editor', `closed with ${errors.length} error(s)`);
    return errors;
  }

  private handleInput(input: InputResult): void {
    if (!input.ok) {
      throw input.error;
    }
    this.handleEvent(input.event);
  }

  private handleEvent(event: InputEvent): void {
    try {
      if (event.type === 'paste') {
        insertText(this.editor, event.text);
        return;
      }
      this.handleKey(event.key);
    } catch (error) {
      if (!(error instanceof CommandError)) {
        throw error;
      }
      this.editor.setError(error.message);
    }
  }

  private handleKey(key: KeyEvent): void {
    const editor = this.editor;
    if (editor.mode === 'command') {
      this.handleCommandLineKey(key);
      return;
    }

    if (editor.mode === 'normal' && editor.pendingKeys.length === 0) {
      editor.clearStatus();
    }
    const keys = [...editor.pendingKeys, formatKey(key)];
    const trie = editor.mode === 'insert' ? editor.config.keys.insert : editor.config.keys.normal;
    const found = lookup(trie, keys);
    switch (found.kind) {
      case 'pending':
        editor.pendingKeys = keys;
        return;
      case 'command':
        editor.pendingKeys = [];
        runBinding(editor, found.command);
        return;
      case 'none':
        editor.pendingKeys = [];
        if (editor.mode === 'insert' && keys.length === 1 && isPrintable(key)) {
          insertText(editor, key.code);
        }
        return;
    }
  }

  private handleCommandLineKey(key: KeyEvent): void {
    const editor = this.editor;
    const name = formatKey(key);
    if (name === 'esc') {
      editor.mode = 'normal';
      editor.commandLine = '';
      return;
    }
    if (name === 'ret') {
      const line = editor.commandLine;
      editor.mode = 'normal';
      editor.commandLine = '';
      executeCommandLine(editor, line);
      return;
    }
    if (name === 'backspace') {
      if (editor.commandLine.length === 0) {
        editor.mode = 'normal';
        return;
      }
      editor.commandLine = editor.commandLine.slice(0, -1);
      return;
    }
    if (isPrintable(key)) {
      editor.commandLine += key.code;
    }
  }
}

export { Application, createArgs };
export type { Args };
