/**
 * Tool dispatcher
 *
 * Turns a model's tool call into a DocumentCommand, applies it to the
 * LineDocument, and serializes the outcome back to text for the model.
 * Unknown tools, malformed input and execution errors all come back as
 * error outputs so the model can correct itself; nothing here throws.
 */

import { z } from 'zod';
import type { ToolCall } from '../ai/types.js';
import type { LineDocument } from '../document/line-document.js';
import { errorMessage } from '../utils/errors.js';
import { fail, ok, type Result } from '../utils/result.js';
import { isToolName, READ_ONLY_TOOLS, type ToolName } from './definitions.js';

export type DocumentCommand =
  | { kind: 'read_document' }
  | { kind: 'read_lines'; start: number; end: number }
  | { kind: 'insert_lines'; afterLine: number; content: string }
  | { kind: 'delete_lines'; start: number; end: number }
  | { kind: 'replace_lines'; start: number; end: number; content: string }
  | { kind: 'find_section'; sectionName: string }
  | { kind: 'insert_after_pattern'; pattern: string; content: string }
  | { kind: 'editing_complete'; summary: string };

export type DispatchOutcome =
  | { kind: 'output'; output: string; isError: boolean; mutating: boolean }
  | { kind: 'complete'; summary: string };

/** Maximum length of input echoed back in error messages */
const MAX_ERROR_INPUT_LENGTH = 100;

const LineNumber = z.number().int();
const Text = z.string();

const RangeInput = z.object({ start: LineNumber, end: LineNumber });
const InsertInput = z.object({ after_line: LineNumber, content: Text });
const ReplaceInput = RangeInput.extend({ content: Text });
const FindSectionInput = z.object({ section_name: Text.min(1) });
const PatternInput = z.object({ pattern: Text.min(1), content: Text });
const CompleteInput = z.object({ summary: Text.optional() });

function truncateInput(input: unknown): string {
  const str = String(JSON.stringify(input));
  return str.length <= MAX_ERROR_INPUT_LENGTH ? str : str.slice(0, MAX_ERROR_INPUT_LENGTH) + '...';
}

function parseWith<S extends z.ZodTypeAny>(
  name: ToolName,
  schema: S,
  input: unknown,
  toCommand: (data: z.infer<S>) => DocumentCommand,
): Result<DocumentCommand> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(input)'}: ${i.message}`)
      .join('; ');
    return fail(`Invalid input for ${name}: ${issues}. Got ${truncateInput(input)}`);
  }
  return ok(toCommand(parsed.data));
}

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

export function parseToolCall(name: string, input: unknown): Result<DocumentCommand> {
  if (!isToolName(name)) return fail(`Unknown tool: ${name}`);

  switch (name) {
    case 'read_document':
      return ok<DocumentCommand>({ kind: 'read_document' });
    case 'read_lines':
      return parseWith(name, RangeInput, input, (d) => ({ kind: 'read_lines', start: d.start, end: d.end }));
    case 'insert_lines':
      return parseWith(name, InsertInput, input, (d) => ({
        kind: 'insert_lines',
        afterLine: d.after_line,
        content: d.content,
      }));
    case 'delete_lines':
      return parseWith(name, RangeInput, input, (d) => ({ kind: 'delete_lines', start: d.start, end: d.end }));
    case 'replace_lines':
      return parseWith(name, ReplaceInput, input, (d) => ({
        kind: 'replace_lines',
        start: d.start,
        end: d.end,
        content: d.content,
      }));
    case 'find_section':
      return parseWith(name, FindSectionInput, input, (d) => ({
        kind: 'find_section',
        sectionName: d.section_name,
      }));
    case 'insert_after_pattern':
      return parseWith(name, PatternInput, input, (d) => ({
        kind: 'insert_after_pattern',
        pattern: d.pattern,
        content: d.content,
      }));
    case 'editing_complete':
      return parseWith(name, CompleteInput, input, (d) => ({
        kind: 'editing_complete',
        summary: d.summary?.trim() || 'No summary provided',
      }));
    default:
      return assertNever(name);
  }
}

function output(text: string, mutating: boolean, isError = false): DispatchOutcome {
  return { kind: 'output', output: text, isError, mutating };
}

async function applyCommand(
  document: LineDocument,
  command: DocumentCommand,
  role: string,
): Promise<DispatchOutcome> {
  switch (command.kind) {
    case 'read_document':
      return output(`Document (${document.lineCount} lines):\n${document.readAll().text}`, false);
    case 'read_lines':
      return output(
        `Lines ${command.start}-${command.end}:\n${document.readRange(command.start, command.end).text}`,
        false,
      );
    case 'insert_lines':
      return output(JSON.stringify(await document.insert(command.afterLine, command.content, role)), true);
    case 'delete_lines':
      return output(JSON.stringify(await document.delete(command.start, command.end, role)), true);
    case 'replace_lines':
      return output(
        JSON.stringify(await document.replace(command.start, command.end, command.content, role)),
        true,
      );
    case 'find_section':
      return output(JSON.stringify(document.findSection(command.sectionName)), false);
    case 'insert_after_pattern': {
      const result = await document.insertAfterPattern(command.pattern, command.content, role);
      return output(JSON.stringify(result), result.success);
    }
    case 'editing_complete':
      return { kind: 'complete', summary: command.summary };
    default:
      return assertNever(command);
  }
}

/** Apply a parsed command. Execution failures become error outputs. */
export async function executeCommand(
  document: LineDocument,
  command: DocumentCommand,
  role: string,
): Promise<DispatchOutcome> {
  try {
    return await applyCommand(document, command, role);
  } catch (err) {
    return output(`Error executing ${command.kind}: ${errorMessage(err)}`, false, true);
  }
}

export async function dispatchToolCall(
  document: LineDocument,
  call: ToolCall,
  role: string,
): Promise<DispatchOutcome> {
  const parsed = parseToolCall(call.name, call.input);
  if (!parsed.ok) return output(parsed.error, false, true);
  return executeCommand(document, parsed.value, role);
}

export function isReadOnlyTool(name: string): boolean {
  return isToolName(name) && READ_ONLY_TOOLS.has(name);
}
