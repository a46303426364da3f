import fs from 'node:fs';
import path from 'node:path';
import type { LanguageConfig } from '../schema/schema.js';
import type { LineEnding } from '../text/line-ending.js';
import { Selection } from '../text/selection.js';
import type { Transaction } from '../text/transaction.js';

type DocumentId = number;
type ViewId = number;

interface WriteResult {
  documentId: DocumentId;
  path: string;
  /** The text that was written, or attempted. */
  text: string;
  error?: Error;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function isReadonly(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return (stat.mode & 0o222) === 0;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

class Document {
  private textValue: string;
  private savedText: string;
  private readonly selections = new Map<ViewId, Selection>();

  constructor(
    readonly id: DocumentId,
    text: string,
    readonly lineEnding: LineEnding,
    public filePath?: string,
    public language?: LanguageConfig,
  ) {
    this.textValue = text;
    this.savedText = text;
  }

  get text(): string {
    return this.textValue;
  }

  get isModified(): boolean {
    return this.textValue !== this.savedText;
  }

  displayName(): string {
    return this.filePath ?? '[scratch]';
  }

  selection(viewId: ViewId): Selection {
    const selection = this.selections.get(viewId);
    if (selection === undefined) {
      throw new Error(`Document ${this.id} is not shown in view ${viewId}`);
    }
    return selection;
  }

  /** Every view's selection of this document. */
  allSelections(): ReadonlyMap<ViewId, Selection> {
    return this.selections;
  }

  setSelection(viewId: ViewId, selection: Selection): void {
    if (!selection.isValidFor(this.textValue.length)) {
      throw new Error(`Selection out of bounds for document ${this.id}`);
    }
    this.selections.set(viewId, selection);
  }

  /** Applies the edit and updates the selection of every view at once. */
  apply(transaction: Transaction, viewId: ViewId): void {
    const text = transaction.apply(this.textValue);
    const next = new Map<ViewId, Selection>();
    for (const [id, selection] of this.selections) {
      next.set(id, id === viewId ? transaction.selectionAfter(selection) : selection.map(transaction.changes));
    }
    if (!next.has(viewId) && transaction.selection) {
      next.set(viewId, transaction.selection);
    }
    for (const [id, selection] of next) {
      if (!selection.isValidFor(text.length)) {
        throw new Error(`Transaction leaves view ${id} with a selection outside the document`);
      }
    }

    this.textValue = text;
    for (const [id, selection] of next) {
      this.selections.set(id, selection);
    }
  }

  markSaved(text: string): void {
    this.savedText = text;
  }

  /** Writes `text` to `target`; failures are returned, not thrown. */
  async write(target: string, text: string = this.textValue): Promise<WriteResult> {
    const result: WriteResult = { documentId: this.id, path: target, text };
    try {
      if (await isReadonly(target)) {
        throw new Error(`Cannot write to read-only file ${target}`);
      }
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, text, 'utf8');
    } catch (error) {
      result.error = error instanceof Error ? error : new Error(String(error));
    }
    return result;
  }
}

export { Document, isNodeError };
export type { DocumentId, ViewId, WriteResult };
