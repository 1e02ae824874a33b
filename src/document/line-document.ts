/**
 * LineDocument — the shared working draft as an ordered list of lines.
 *
 * Addressing is 1-indexed with inclusive ranges. Out-of-range line numbers
 * are clamped to the document bounds, never rejected. Line numbers are not
 * stored anywhere; they are always derived from position.
 *
 * Each mutation builds the next line array, persists the full snapshot, and
 * only then swaps it in and appends an edit record. A failed save leaves the
 * in-memory document and the edit log untouched.
 */
import { logger } from '../utils/logger.js';
import { findFirstMatch, locateSection, scanSections, type SectionBounds } from './sections.js';
import type { DocumentStorage } from './storage.js';
import type {
  DeleteResult,
  EditRecord,
  InsertResult,
  NumberedLine,
  PatternMiss,
  RangeRead,
  ReplaceResult,
  SectionLookup,
} from './types.js';

const log = logger.child('document');

const LINE_BREAK = /\r?\n/;

/**
 * Split content into lines. No trailing-newline normalization: `''` is one
 * empty line and `'A\n'` is `['A', '']`.
 */
export function splitLines(content: string): string[] {
  return content.split(LINE_BREAK);
}

export function formatNumberedLine(line: NumberedLine): string {
  return `${String(line.number).padStart(4)}| ${line.text}`;
}

export interface LineDocumentOptions {
  now?: () => Date;
}

export class LineDocument {
  private lines: string[];
  private readonly edits: EditRecord[] = [];
  private readonly now: () => Date;

  constructor(
    private readonly storage: DocumentStorage,
    initialLines: string[] = [],
    options: LineDocumentOptions = {},
  ) {
    this.lines = [...initialLines];
    this.now = options.now ?? (() => new Date());
  }

  /** Load from storage; an empty or missing snapshot is a zero-line document. */
  static async open(storage: DocumentStorage, options: LineDocumentOptions = {}): Promise<LineDocument> {
    const stored = await storage.load();
    const lines = stored ? splitLines(stored) : [];
    log.debug('Opened document', { location: storage.location, lines: lines.length });
    return new LineDocument(storage, lines, options);
  }

  get location(): string {
    return this.storage.location;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  get content(): string {
    return this.lines.join('\n');
  }

  get history(): readonly EditRecord[] {
    return this.edits;
  }

  // ── Reads ──────────────────────────────────────────────────────────────────

  readRange(start: number, end: number): RangeRead {
    const from = Math.max(1, start);
    const to = Math.min(this.lines.length, end);
    const lines: NumberedLine[] = [];
    for (let n = from; n <= to; n++) {
      lines.push({ number: n, text: this.lines[n - 1] ?? '' });
    }
    return { start: from, end: to, lines, text: lines.map(formatNumberedLine).join('\n') };
  }

  readAll(): RangeRead {
    return this.readRange(1, this.lines.length);
  }

  findSection(pattern: string): SectionLookup {
    const bounds = locateSection(this.lines, pattern);
    if (!bounds) return { found: false, pattern };
    return {
      found: true,
      header: bounds.header,
      start: bounds.start,
      end: bounds.end,
      content: this.lines.slice(bounds.start - 1, bounds.end).join('\n'),
    };
  }

  findAllSections(): SectionBounds[] {
    return scanSections(this.lines);
  }

  // ── Mutations ──────────────────────────────────────────────────────────────

  /**
   * Insert after `afterLine`. 0 inserts at the top; -1 or anything past the
   * last line appends; other negatives clamp to the top.
   */
  async insert(afterLine: number, content: string, role = 'unknown'): Promise<InsertResult> {
    const newLines = splitLines(content);
    const index = afterLine === -1 || afterLine >= this.lines.length
      ? this.lines.length
      : Math.max(0, afterLine);

    const next = [...this.lines];
    next.splice(index, 0, ...newLines);

    await this.commit(next, {
      operation: 'insert',
      role,
      afterLine,
      firstInsertedLine: index + 1,
      lineDelta: newLines.length,
      timestamp: this.timestamp(),
    });

    return {
      success: true,
      operation: 'insert',
      insertedCount: newLines.length,
      firstInsertedLine: index + 1,
    };
  }

  async delete(start: number, end: number, role = 'unknown'): Promise<DeleteResult> {
    const { index, count } = this.clampRange(start, end);

    const next = [...this.lines];
    next.splice(index, count);

    await this.commit(next, {
      operation: 'delete',
      role,
      start: index + 1,
      end: index + count,
      lineDelta: -count,
      timestamp: this.timestamp(),
    });

    return { success: true, operation: 'delete', deletedCount: count, start: index + 1, end: index + count };
  }

  /** Delete-then-insert at the same position, persisted and logged as one edit. */
  async replace(start: number, end: number, content: string, role = 'unknown'): Promise<ReplaceResult> {
    const { index, count } = this.clampRange(start, end);
    const newLines = splitLines(content);

    const next = [...this.lines];
    next.splice(index, count, ...newLines);

    await this.commit(next, {
      operation: 'replace',
      role,
      start: index + 1,
      end: index + count,
      lineDelta: newLines.length - count,
      timestamp: this.timestamp(),
    });

    return { success: true, operation: 'replace', oldCount: count, newCount: newLines.length, atLine: index + 1 };
  }

  /** Insert after the first line matching `pattern`; a miss is returned, not thrown. */
  async insertAfterPattern(
    pattern: string,
    content: string,
    role = 'unknown',
  ): Promise<InsertResult | PatternMiss> {
    const index = findFirstMatch(this.lines, pattern);
    if (index < 0) return { success: false, error: `Pattern not found: ${pattern}` };
    return this.insert(index + 1, content, role);
  }

  async clear(role = 'unknown'): Promise<void> {
    await this.commit([], {
      operation: 'clear',
      role,
      lineDelta: -this.lines.length,
      timestamp: this.timestamp(),
    });
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  /**
   * Clamp an inclusive 1-indexed range to a 0-based splice window. The index
   * never passes the end of the document, so an empty window reports
   * `index + 1 .. index` inside (or just after) the document.
   */
  private clampRange(start: number, end: number): { index: number; count: number } {
    const index = Math.min(this.lines.length, Math.max(0, start - 1));
    const stop = Math.min(this.lines.length, end);
    return { index, count: Math.max(0, stop - index) };
  }

  private async commit(next: string[], record: EditRecord): Promise<void> {
    await this.storage.save(next.join('\n'));
    this.lines = next;
    this.edits.push(Object.freeze(record));
    log.debug('Edit applied', { operation: record.operation, role: record.role, lines: next.length });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
