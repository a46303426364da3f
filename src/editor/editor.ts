import fs from 'node:fs';
import path from 'node:path';
import type { Severity } from '../schema/schema.js';
import { detectLineEnding, lineEndingFor } from '../text/line-ending.js';
import { ORIGIN, positionToOffset } from '../text/lines.js';
import type { Position } from '../text/lines.js';
import { Range, Selection } from '../text/selection.js';
import { Transaction } from '../text/transaction.js';
import type { Config } from './config.js';
import { Document, isNodeError } from './document.js';
import type { DocumentId, ViewId, WriteResult } from './document.js';
import type { SyntaxLoader } from './syntax.js';
import { CommandError } from './errors.js';
import { WriteQueue } from './writes.js';
import { getLogger } from '../logger.js';

type Mode = 'normal' | 'insert' | 'command';

interface View {
  id: ViewId;
  documentId: DocumentId;
}

interface Status {
  message: string;
  severity: Severity;
}

const VIEW_ID: ViewId = 1;

class Editor {
  readonly documents = new Map<DocumentId, Document>();
  readonly writes = new WriteQueue();
  mode: Mode = 'normal';
  commandLine = '';
  pendingKeys: string[] = [];

  private nextDocumentId: DocumentId = 1;
  private view: View | undefined;
  private status: Status | undefined;
  private exitRequested = false;

  constructor(
    readonly config: Config,
    readonly syntax: SyntaxLoader,
  ) {}

  /** Opens an empty document without a path and focuses it. */
  newFile(): Document {
    const doc = new Document(
      this.nextDocumentId++,
      '',
      lineEndingFor(this.config.editor.lineEnding),
    );
    this.documents.set(doc.id, doc);
    this.focus(doc, Selection.point(0));
    return doc;
  }

  /**
   * Opens `filePath`, or switches to it when already open, placing a cursor
   * at each of `positions`. A missing file opens as an empty document bound
   * to the path.
   */
  open(filePath: string, positions: readonly Position[] = [ORIGIN]): Document {
    const absolute = path.resolve(filePath);
    const existing = Array.from(this.documents.values()).find(
      (doc) => doc.filePath === absolute,
    );
    const doc = existing ?? this.load(absolute);
    const anchors = positions.length > 0 ? positions : [ORIGIN];
    const selection = Selection.create(
      anchors.map((position) => Range.point(positionToOffset(doc.text, position))),
    );
    this.focus(doc, selection);
    return doc;
  }

  private load(absolute: string): Document {
    let text = '';
    try {
      const stat = fs.statSync(absolute);
      if (stat.isDirectory()) {
        throw new Error(`${absolute} is a directory`);
      }
      text = fs.readFileSync(absolute, 'utf8');
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }
    const doc = new Document(
      this.nextDocumentId++,
      text,
      detectLineEnding(text) ?? lineEndingFor(this.config.editor.lineEnding),
      absolute,
      this.syntax.languageForPath(absolute),
    );
    this.documents.set(doc.id, doc);
    return doc;
  }

  private focus(doc: Document, selection: Selection): void {
    this.view = { id: VIEW_ID, documentId: doc.id };
    doc.setSelection(VIEW_ID, selection);
  }

  /** The focused view and the document it shows. */
  current(): { view: View; doc: Document } {
    const view = this.view;
    if (view === undefined) {
      throw new Error('No document is open');
    }
    const doc = this.documents.get(view.documentId);
    if (doc === undefined) {
      throw new Error(`View ${view.id} shows missing document ${view.documentId}`);
    }
    return { view, doc };
  }

  currentDocument(): Document {
    return this.current().doc;
  }

  /** Applies `transaction` to the focused document. */
  apply(transaction: Transaction): void {
    const { view, doc } = this.current();
    doc.apply(transaction, view.id);
  }

  modifiedDocuments(): Document[] {
    return Array.from(this.documents.values()).filter((doc) => doc.isModified);
  }

  getStatus(): [string, Severity] | undefined {
    return this.status ? [this.status.message, this.status.severity] : undefined;
  }

  setStatus(message: string, severity: Severity = 'info'): void {
    this.status = { message, severity };
  }

  setError(message: string): void {
    getLogger().debug('editor', `status error: ${message}`);
    this.status = { message, severity: 'error' };
  }

  clearStatus(): void {
    this.status = undefined;
  }

  requestExit(): void {
    this.exitRequested = true;
  }

  shouldClose(): boolean {
    return this.exitRequested;
  }

  /**
   * Queues a write of `doc` to `target` (default: its own path). When the
   * configuration asks for it, a final line ending is added first.
   */
  save(doc: Document, target?: string): void {
    const destination = target !== undefined ? path.resolve(target) : doc.filePath;
    if (destination === undefined) {
      throw new CommandError('Cannot write a buffer without a filename');
    }
    if (target !== undefined) {
      doc.filePath = destination;
      doc.language = this.syntax.languageForPath(destination) ?? doc.language;
    }
    if (
      this.config.editor.insertFinalNewline &&
      doc.text.length > 0 &&
      !doc.text.endsWith('\n')
    ) {
      const end = doc.text.length;
      const transaction = Transaction.change(doc.text, [
        { from: end, to: end, insert: doc.lineEnding },
      ]);
      doc.apply(transaction, VIEW_ID);
    }
    const text = doc.text;
    this.writes.enqueue(() => doc.write(destination, text));
  }

  private record(results: WriteResult[]): Error[] {
    const errors: Error[] = [];
    for (const result of results) {
      if (result.error) {
        errors.push(result.error);
        continue;
      }
      this.documents.get(result.documentId)?.markSaved(result.text);
    }
    return errors;
  }

  /** Waits for queued writes and reports each outcome on the status line. */
  async settleWrites(): Promise<void> {
    const results = await this.writes.drain();
    const errors = this.record(results);
    const written = results.filter((result) => !result.error);
    if (errors.length > 0) {
      this.setError(errors.map((error) => error.message).join('; '));
    } else if (written.length > 0) {
      const names = written.map((result) => `'${result.path}'`).join(', ');
      this.setStatus(`${names} written`);
    }
  }

  /** Waits for queued writes and returns every failure. */
  async flushWrites(): Promise<Error[]> {
    return this.record(await this.writes.drain());
  }
}

export { Editor, VIEW_ID };
export type { Mode, Status, View };
