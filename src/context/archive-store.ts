/**
 * Append-only store for offloaded conversation history.
 * One JSON file per offload; names are unique per role + round + timestamp,
 * so independent writers never collide.
 */
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { StorageError, errorMessage } from '../utils/errors.js';
import { fail, ok, type Result } from '../utils/result.js';
import { ContextArchiveSchema, type ContextArchive } from './types.js';

export interface ContextArchiveStore {
  /** Persist the archive under `name`; resolves to its location. */
  write(name: string, archive: ContextArchive): Promise<string>;
  load(location: string): Promise<Result<ContextArchive>>;
}

/** `2026-03-04T05:06:07.089Z` → `20260304_050607_089` (UTC) */
export function formatArchiveTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}_${iso.slice(20, 23)}`;
}

export function archiveFileName(roleId: string, round: number, date: Date): string {
  const safeRole = roleId.replace(/[^A-Za-z0-9_-]/g, '_');
  return `${safeRole}_draft${String(round).padStart(2, '0')}_${formatArchiveTimestamp(date)}.json`;
}

function parseArchive(raw: string): Result<ContextArchive> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return fail(`Archive is not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = ContextArchiveSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
    return fail(`Archive has invalid fields: ${fields}`);
  }
  return ok(parsed.data);
}

export class FileArchiveStore implements ContextArchiveStore {
  constructor(private readonly directory: string) {}

  async write(name: string, archive: ContextArchive): Promise<string> {
    const location = join(this.directory, name);
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(location, JSON.stringify(archive, null, 2), { encoding: 'utf-8', flag: 'wx' });
    } catch (err) {
      throw new StorageError(`Cannot write context archive: ${errorMessage(err)}`, location);
    }
    return location;
  }

  async load(location: string): Promise<Result<ContextArchive>> {
    let raw: string;
    try {
      raw = await readFile(location, 'utf-8');
    } catch (err) {
      return fail(`Cannot read archive ${location}: ${errorMessage(err)}`);
    }
    return parseArchive(raw);
  }
}

export class MemoryArchiveStore implements ContextArchiveStore {
  readonly archives = new Map<string, string>();

  async write(name: string, archive: ContextArchive): Promise<string> {
    const location = `memory://archive/${name}`;
    this.archives.set(location, JSON.stringify(archive));
    return location;
  }

  async load(location: string): Promise<Result<ContextArchive>> {
    const raw = this.archives.get(location);
    if (raw === undefined) return fail(`Cannot read archive ${location}: not found`);
    return parseArchive(raw);
  }
}
