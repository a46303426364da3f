import fs from 'node:fs';
import path from 'node:path';
import { Application, createArgs } from '../editor/application.js';
import type { Config } from '../editor/config.js';
import { defaultEditorConfig } from '../editor/config.js';
import { isNodeError } from '../editor/document.js';
import { defaultKeymaps, mergeKeys } from '../editor/keymap.js';
import { createSyntaxLoader } from '../editor/syntax.js';
import type { SyntaxLoader } from '../editor/syntax.js';
import type { EditorConfig } from '../schema/schema.js';
import { ORIGIN } from '../text/lines.js';
import type { Position } from '../text/lines.js';
import { parseMarked } from '../text/markers.js';
import type { MarkedText } from '../text/markers.js';
import { Transaction } from '../text/transaction.js';
import { ConfigurationError } from './errors.js';

/** Editor settings for tests: files are written with exactly the typed bytes. */
function testEditorConfig(): EditorConfig {
  return { ...defaultEditorConfig(), insertFinalNewline: false };
}

function testConfig(): Config {
  return { editor: testEditorConfig(), keys: defaultKeymaps() };
}

/** The bundled language table, with per-language `overrides` merged by name. */
function testSyntaxLoader(overrides?: unknown): SyntaxLoader {
  return createSyntaxLoader(overrides);
}

function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Collects what an in-process {@link Application} should start with. Calls
 * chain; {@link AppBuilder.build} validates and constructs it once.
 */
class AppBuilder {
  private readonly args = createArgs();
  private config: Config = testConfig();
  private syntaxLoader: SyntaxLoader | undefined;
  private input: MarkedText | undefined;
  private built = false;

  /**
   * Opens `filePath` with a cursor at `position` (default: start of the
   * document). Repeating a path adds another cursor.
   */
  withFile(filePath: string, position: Position = ORIGIN): this {
    const positions = this.args.files.get(filePath);
    if (positions) {
      positions.push(position);
    } else {
      this.args.files.set(filePath, [position]);
    }
    return this;
  }

  /** Recorded so that {@link build} can refuse it. */
  withWorkingDirectory(directory: string): this {
    this.args.workingDirectory = directory;
    return this;
  }

  /** Replaces the configuration; its key bindings still layer over the defaults. */
  withConfig(config: Config): this {
    this.config = {
      editor: config.editor,
      keys: mergeKeys(defaultKeymaps(), config.keys),
    };
    return this;
  }

  /** Marked text that replaces the focused document once the app exists. */
  withInputText(text: string): this {
    this.input = parseMarked(text);
    return this;
  }

  withLangLoader(loader: SyntaxLoader): this {
    this.syntaxLoader = loader;
    return this;
  }

  /** Paths to open, in registration order, with their cursors. */
  get files(): ReadonlyMap<string, readonly Position[]> {
    return this.args.files;
  }

  build(): Application {
    if (this.built) {
      throw new ConfigurationError('AppBuilder.build() was already called');
    }
    this.built = true;

    if (this.args.workingDirectory !== undefined) {
      throw new ConfigurationError(
        `Changing the working directory to ${this.args.workingDirectory} is not supported in-process`,
      );
    }
    const [first] = this.args.files.keys();
    if (first !== undefined && isDirectory(path.resolve(first))) {
      throw new ConfigurationError(`Opening a directory (${first}) is not supported in-process`);
    }

    const app = new Application(
      this.args,
      this.config,
      this.syntaxLoader ?? testSyntaxLoader(),
    );
    if (this.input) {
      const doc = app.editor.currentDocument();
      const transaction = Transaction.change(doc.text, [
        { from: 0, to: doc.text.length, insert: this.input.text },
      ]).withSelection(this.input.selection);
      app.editor.apply(transaction);
    }
    return app;
  }
}

export { AppBuilder, testConfig, testEditorConfig, testSyntaxLoader };
