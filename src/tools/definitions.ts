/**
 * Document editing tool definitions
 *
 * The fixed set of operations a role can request. `editing_complete` is the
 * sentinel that ends a role's turn; it never touches the document.
 */

import type Anthropic from '@anthropic-ai/sdk';

export const TOOL_NAMES = [
  'read_document',
  'read_lines',
  'insert_lines',
  'delete_lines',
  'replace_lines',
  'find_section',
  'insert_after_pattern',
  'editing_complete',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Tools that only read; these are not counted as edits. */
export const READ_ONLY_TOOLS: ReadonlySet<ToolName> = new Set(['read_document', 'read_lines', 'find_section']);

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

const lineRange = {
  start: { type: 'integer', description: 'Starting line number (1-indexed)' },
  end: { type: 'integer', description: 'Ending line number (1-indexed, inclusive)' },
} as const;

export const DOCUMENT_TOOLS: Anthropic.Tool[] = [
  {
    name: 'read_document',
    description: 'Read the entire working document with line numbers.',
    input_schema: { type: 'object', properties: {}, required: [] },
  },
  {
    name: 'read_lines',
    description: 'Read a range of lines from the document. Lines are 1-indexed.',
    input_schema: { type: 'object', properties: { ...lineRange }, required: ['start', 'end'] },
  },
  {
    name: 'insert_lines',
    description:
      'Insert new lines after a line number. after_line=0 inserts at the beginning; after_line=-1 appends at the end.',
    input_schema: {
      type: 'object',
      properties: {
        after_line: { type: 'integer', description: 'Line to insert after (0 = beginning, -1 = end)' },
        content: { type: 'string', description: 'Content to insert; may span multiple lines' },
      },
      required: ['after_line', 'content'],
    },
  },
  {
    name: 'delete_lines',
    description: 'Delete a range of lines from the document.',
    input_schema: { type: 'object', properties: { ...lineRange }, required: ['start', 'end'] },
  },
  {
    name: 'replace_lines',
    description: 'Replace a range of lines with new content in a single edit.',
    input_schema: {
      type: 'object',
      properties: {
        ...lineRange,
        content: { type: 'string', description: 'Replacement content; may span multiple lines' },
      },
      required: ['start', 'end', 'content'],
    },
  },
  {
    name: 'find_section',
    description:
      "Find a section by its header (e.g. 'SCENE 1', 'STORY OVERVIEW') and return its line range.",
    input_schema: {
      type: 'object',
      properties: {
        section_name: { type: 'string', description: 'Name or pattern to search for in section headers' },
      },
      required: ['section_name'],
    },
  },
  {
    name: 'insert_after_pattern',
    description:
      'Insert content after the first line matching a pattern. Useful for adding [VISUAL] or [AUDIO] tags after a narrative line.',
    input_schema: {
      type: 'object',
      properties: {
        pattern: { type: 'string', description: 'Text pattern to search for' },
        content: { type: 'string', description: 'Content to insert after the matched line' },
      },
      required: ['pattern', 'content'],
    },
  },
  {
    name: 'editing_complete',
    description: 'Signal that you have finished all your edits to the document.',
    input_schema: {
      type: 'object',
      properties: {
        summary: { type: 'string', description: 'Brief summary of the edits made' },
      },
      required: ['summary'],
    },
  },
];
