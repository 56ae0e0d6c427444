import { Low } from 'lowdb';
import { DataFile } from 'lowdb/node';
import { mkdir, rm, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { TapeDocument } from '../types/index.js';
import { type TapeStore, emptyDocument, normalizeTapeName } from './base.js';
import { parseTapeDocument, stringifyTapeDocument } from './tape-codec.js';
import { PersistenceError, errorMessage } from '../core/errors.js';

export const TAPE_EXTENSION = '.yaml';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One YAML file per tape under a root directory
 */
export class YamlFileTapeStore implements TapeStore {
  private root: string;

  constructor(root: string = './tapes') {
    // Use absolute path so a later chdir does not move the tapes
    this.root = resolve(root);
  }

  getRoot(): string {
    return this.root;
  }

  pathFor(name: string): string {
    const stem = normalizeTapeName(name);
    if (stem === '') {
      throw new PersistenceError(`Tape name "${name}" does not yield a usable file name`, name);
    }
    return join(this.root, `${stem}${TAPE_EXTENSION}`);
  }

  locate(name: string): string {
    return this.pathFor(name);
  }

  async init(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Cannot create tape root ${this.root}: ${errorMessage(error)}`, undefined, this.root, error);
    }
  }

  private open(name: string, path: string): Low<TapeDocument> {
    const adapter = new DataFile<TapeDocument>(path, {
      parse: parseTapeDocument,
      stringify: stringifyTapeDocument,
    });
    return new Low<TapeDocument>(adapter, emptyDocument(name));
  }

  async load(name: string): Promise<TapeDocument> {
    const path = this.pathFor(name);
    const db = this.open(name, path);

    try {
      await db.read();
    } catch (error) {
      throw new PersistenceError(
        `Failed to load tape "${name}" from ${path}: ${errorMessage(error)}`,
        name,
        path,
        error
      );
    }

    return db.data;
  }

  async save(document: TapeDocument): Promise<void> {
    const path = this.pathFor(document.name);
    const db = this.open(document.name, path);
    db.data = document;

    try {
      await mkdir(this.root, { recursive: true });
      await db.write();
    } catch (error) {
      throw new PersistenceError(
        `Failed to save tape "${document.name}" to ${path}: ${errorMessage(error)}`,
        document.name,
        path,
        error
      );
    }
  }

  async exists(name: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(name));
      return info.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw new PersistenceError(`Cannot stat tape "${name}": ${errorMessage(error)}`, name, undefined, error);
    }
  }

  async delete(name: string): Promise<boolean> {
    if (!(await this.exists(name))) {
      return false;
    }
    await rm(this.pathFor(name), { force: true });
    return true;
  }
}
