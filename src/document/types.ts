/**
 * Document types
 *
 * All line numbers here are 1-indexed and ranges are inclusive.
 */

export interface NumberedLine {
  number: number;
  text: string;
}

export interface RangeRead {
  /** Clamped start; may exceed `end` when the read is empty */
  start: number;
  /** Clamped end */
  end: number;
  lines: NumberedLine[];
  /** Lines rendered as `"   7| text"` joined by newlines */
  text: string;
}

interface EditRecordBase {
  /** Role that initiated the edit */
  role: string;
  /** Net change in line count */
  lineDelta: number;
  /** ISO-8601 */
  timestamp: string;
}

export type EditRecord = Readonly<
  | (EditRecordBase & { operation: 'insert'; afterLine: number; firstInsertedLine: number })
  | (EditRecordBase & { operation: 'delete'; start: number; end: number })
  | (EditRecordBase & { operation: 'replace'; start: number; end: number })
  | (EditRecordBase & { operation: 'clear' })
>;

export interface InsertResult {
  success: true;
  operation: 'insert';
  insertedCount: number;
  firstInsertedLine: number;
}

export interface DeleteResult {
  success: true;
  operation: 'delete';
  deletedCount: number;
  /** Clamped range actually removed; `end < start` when nothing was */
  start: number;
  end: number;
}

export interface ReplaceResult {
  success: true;
  operation: 'replace';
  oldCount: number;
  newCount: number;
  atLine: number;
}


export interface PatternMiss {
  success: false;
  error: string;
}

export interface SectionMatch {
  found: true;
  header: string;
  start: number;
  end: number;
  content: string;
}

export interface SectionMiss {
  found: false;
  pattern: string;
}

export type SectionLookup = SectionMatch | SectionMiss;
