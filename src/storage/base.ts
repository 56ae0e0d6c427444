import type { TapeDocument } from '../types/index.js';

export interface TapeStore {
  /**
   * Prepare the backing storage (create directories if needed)
   */
  init(): Promise<void>;

  /**
   * Load a tape by name, or an empty document when none is stored
   */
  load(name: string): Promise<TapeDocument>;

  /**
   * Persist a tape, replacing any stored version
   */
  save(document: TapeDocument): Promise<void>;

  /**
   * Check whether a tape is stored
   */
  exists(name: string): Promise<boolean>;

  /**
   * Remove a stored tape
   */
  delete(name: string): Promise<boolean>;

  /**
   * Where the named tape lives. Names that share a location are the same tape.
   */
  locate(name: string): string;
}

export function emptyDocument(name: string): TapeDocument {
  return { name, interactions: [] };
}

/**
 * Turn a tape name into a file-safe stem: `"write only tape"` becomes
 * `write_only_tape`.
 */
export function normalizeTapeName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]+/g, '')
    .replace(/[^\w]+/g, '_')
    .replace(/^_+|_+$/g, '');
}
