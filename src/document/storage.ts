/**
 * Snapshot persistence for the working document.
 * Every mutation rewrites the whole file; there is no log replay.
 */
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { StorageError, errorMessage } from '../utils/errors.js';

export interface DocumentStorage {
  /** Human-readable location, used in logs and archive references. */
  readonly location: string;
  /** Stored text, or null when nothing has been saved yet. */
  load(): Promise<string | null>;
  save(content: string): Promise<void>;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * File-backed storage. Writes go to `<path>.tmp` and are renamed into place,
 * so a crash mid-write leaves either the previous or the new snapshot.
 */
export class FileDocumentStorage implements DocumentStorage {
  private constructor(public readonly location: string) {}

  /** Creates the parent directory and clears a leftover temp file. Throws StorageError. */
  static async open(path: string): Promise<FileDocumentStorage> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await rm(`${path}.tmp`, { force: true });
    } catch (err) {
      throw new StorageError(`Cannot prepare document location: ${errorMessage(err)}`, path);
    }
    return new FileDocumentStorage(path);
  }

  async load(): Promise<string | null> {
    try {
      return await readFile(this.location, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new StorageError(`Cannot read document: ${errorMessage(err)}`, this.location);
    }
  }

  async save(content: string): Promise<void> {
    const tmp = `${this.location}.tmp`;
    try {
      await writeFile(tmp, content, 'utf-8');
      await rename(tmp, this.location);
    } catch (err) {
      throw new StorageError(`Cannot write document: ${errorMessage(err)}`, this.location);
    }
  }
}

export class MemoryDocumentStorage implements DocumentStorage {
  readonly location: string;
  /** Every saved snapshot, oldest first. */
  readonly snapshots: string[] = [];

  constructor(initial: string | null = null, location = 'memory://document') {
    this.location = location;
    if (initial !== null) this.snapshots.push(initial);
  }

  async load(): Promise<string | null> {
    return this.snapshots.at(-1) ?? null;
  }

  async save(content: string): Promise<void> {
    this.snapshots.push(content);
  }
}
