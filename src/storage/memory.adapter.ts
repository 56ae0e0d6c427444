import type { TapeDocument } from '../types/index.js';
import { type TapeStore, emptyDocument } from './base.js';
import { parseTapeDocument, stringifyTapeDocument } from './tape-codec.js';

let nextStoreId = 0;

/**
 * Keeps serialized tapes in memory. Documents pass through the YAML codec on
 * every load and save, so callers never share objects with the store.
 */
export class MemoryTapeStore implements TapeStore {
  private readonly id = ++nextStoreId;
  private documents: Map<string, string> = new Map();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, text] of Object.entries(initial)) {
      this.documents.set(name, text);
    }
  }

  async init(): Promise<void> {
    // Nothing to prepare
  }

  async load(name: string): Promise<TapeDocument> {
    const text = this.documents.get(name);
    return text === undefined ? emptyDocument(name) : parseTapeDocument(text);
  }

  async save(document: TapeDocument): Promise<void> {
    this.documents.set(document.name, stringifyTapeDocument(document));
  }

  async exists(name: string): Promise<boolean> {
    return this.documents.has(name);
  }

  async delete(name: string): Promise<boolean> {
    return this.documents.delete(name);
  }

  locate(name: string): string {
    return `memory:${this.id}/${name}`;
  }

  /**
   * Raw YAML of a stored tape
   */
  read(name: string): string | undefined {
    return this.documents.get(name);
  }

  write(name: string, text: string): void {
    this.documents.set(name, text);
  }
}
