import { describe, expect, it } from 'vitest';
import { LineDocument } from '../../src/document/line-document.js';
import { MemoryDocumentStorage } from '../../src/document/storage.js';
import { DOCUMENT_TOOLS, TOOL_NAMES } from '../../src/tools/definitions.js';
import { dispatchToolCall, isReadOnlyTool, parseToolCall } from '../../src/tools/dispatcher.js';
import { FailingStorage, call } from '../helpers/fakes.js';

function doc(lines: string[] = ['A', 'B']): LineDocument {
  return new LineDocument(new MemoryDocumentStorage(), lines);
}

describe('DOCUMENT_TOOLS', () => {
  it('defines one tool per command, in order', () => {
    expect(DOCUMENT_TOOLS.map((t) => t.name)).toEqual([...TOOL_NAMES]);
  });

  it('requires snake_case inputs', () => {
    const insert = DOCUMENT_TOOLS.find((t) => t.name === 'insert_lines');
    expect(insert?.input_schema.required).toEqual(['after_line', 'content']);
  });
});

describe('parseToolCall', () => {
  it('maps snake_case input onto a command', () => {
    expect(parseToolCall('replace_lines', { start: 1, end: 2, content: 'x' })).toEqual({
      ok: true,
      value: { kind: 'replace_lines', start: 1, end: 2, content: 'x' },
    });
    expect(parseToolCall('find_section', { section_name: 'SCENE 1' })).toEqual({
      ok: true,
      value: { kind: 'find_section', sectionName: 'SCENE 1' },
    });
  });

  it('rejects unknown tools', () => {
    expect(parseToolCall('fly', {})).toEqual({ ok: false, error: 'Unknown tool: fly' });
  });

  it('rejects line numbers of the wrong type', () => {
    expect(parseToolCall('read_lines', { start: '1', end: 2 })).toEqual({
      ok: false,
      error: 'Invalid input for read_lines: start: Expected number, received string. Got {"start":"1","end":2}',
    });
    expect(parseToolCall('delete_lines', { start: 1, end: 2.5 })).toEqual({
      ok: false,
      error: 'Invalid input for delete_lines: end: Expected integer, received float. Got {"start":1,"end":2.5}',
    });
  });

  it('lists every missing field', () => {
    expect(parseToolCall('insert_lines', undefined)).toEqual({
      ok: false,
      error: 'Invalid input for insert_lines: after_line: Required; content: Required. Got undefined',
    });
  });

  it('truncates long input in error messages', () => {
    const input = { start: 'x', end: 1, content: 'y'.repeat(200) };
    const parsed = parseToolCall('replace_lines', input);
    expect(parsed).toEqual({
      ok: false,
      error: `Invalid input for replace_lines: start: Expected number, received string. Got ${JSON.stringify(input).slice(0, 100)}...`,
    });
  });

  it('defaults a missing completion summary', () => {
    expect(parseToolCall('editing_complete', {})).toEqual({
      ok: true,
      value: { kind: 'editing_complete', summary: 'No summary provided' },
    });
  });
});

describe('dispatchToolCall', () => {
  it('reads the whole document with line numbers', async () => {
    expect(await dispatchToolCall(doc(), call('read_document'), 'writer')).toEqual({
      kind: 'output',
      output: 'Document (2 lines):\n   1| A\n   2| B',
      isError: false,
      mutating: false,
    });
  });

  it('labels a range read with the requested bounds', async () => {
    const outcome = await dispatchToolCall(doc(), call('read_lines', { start: 2, end: 5 }), 'writer');
    expect(outcome).toEqual({ kind: 'output', output: 'Lines 2-5:\n   2| B', isError: false, mutating: false });
  });

  it('applies an insert and reports the result as JSON', async () => {
    const d = doc();
    const outcome = await dispatchToolCall(d, call('insert_lines', { after_line: 0, content: 'Z' }), 'writer');
    expect(outcome).toEqual({
      kind: 'output',
      output: '{"success":true,"operation":"insert","insertedCount":1,"firstInsertedLine":1}',
      isError: false,
      mutating: true,
    });
    expect(d.content).toBe('Z\nA\nB');
    expect(d.history[0]?.role).toBe('writer');
  });

  it('treats misses as ordinary, non-mutating output', async () => {
    const d = doc();
    expect(await dispatchToolCall(d, call('find_section', { section_name: 'SCENE 9' }), 'checker')).toEqual({
      kind: 'output',
      output: '{"found":false,"pattern":"SCENE 9"}',
      isError: false,
      mutating: false,
    });
    expect(
      await dispatchToolCall(d, call('insert_after_pattern', { pattern: 'nope', content: 'x' }), 'designer'),
    ).toEqual({
      kind: 'output',
      output: '{"success":false,"error":"Pattern not found: nope"}',
      isError: false,
      mutating: false,
    });
  });

  it('returns the completion sentinel without touching the document', async () => {
    const d = doc();
    expect(await dispatchToolCall(d, call('editing_complete', { summary: '  Done. ' }), 'writer')).toEqual({
      kind: 'complete',
      summary: 'Done.',
    });
    expect(d.history).toEqual([]);
  });

  it('reports parse failures as errors', async () => {
    expect(await dispatchToolCall(doc(), call('fly'), 'writer')).toEqual({
      kind: 'output',
      output: 'Unknown tool: fly',
      isError: true,
      mutating: false,
    });
  });

  it('turns execution failures into error output', async () => {
    const d = new LineDocument(new FailingStorage('disk full'), ['A']);
    expect(await dispatchToolCall(d, call('delete_lines', { start: 1, end: 1 }), 'checker')).toEqual({
      kind: 'output',
      output: 'Error executing delete_lines: disk full',
      isError: true,
      mutating: false,
    });
  });
});

describe('isReadOnlyTool', () => {
  it('marks only the read tools', () => {
    expect(isReadOnlyTool('read_lines')).toBe(true);
    expect(isReadOnlyTool('find_section')).toBe(true);
    expect(isReadOnlyTool('insert_lines')).toBe(false);
    expect(isReadOnlyTool('bogus')).toBe(false);
  });
});
