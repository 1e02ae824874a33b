/**
 * EditorAgent — one role working on the shared document through tool calls.
 *
 * The agent owns its conversation memory. Before each turn it asks the
 * budget tracker whether that memory has outgrown the budget; if so the
 * history is archived, cleared, and replaced by a one-shot reminder that is
 * prepended to the next task.
 *
 * A turn ends when the model calls `editing_complete`, replies without tool
 * calls, or hits the iteration cap. Model failures that survive retries end
 * the turn softly; authentication failures propagate.
 */
import type { EditingModel, ModelTurn, ToolResult } from '../ai/types.js';
import type { ContextBudgetTracker } from '../context/budget-tracker.js';
import type { ContextStats, ConversationMessage } from '../context/types.js';
import type { LineDocument } from '../document/line-document.js';
import { DOCUMENT_TOOLS } from '../tools/definitions.js';
import { dispatchToolCall, isReadOnlyTool } from '../tools/dispatcher.js';
import { ModelAPIError } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';

export interface RoleDefinition {
  /** Stable identifier used in edit records and archive names */
  id: string;
  systemPrompt: string;
}

export interface EditorAgentOptions {
  role: RoleDefinition;
  model: EditingModel;
  tracker: ContextBudgetTracker;
  maxIterations?: number;
}

export interface AgentRunResult {
  success: boolean;
  role: string;
  round: number;
  iterations: number;
  editSummary: string[];
  finalMessage?: string;
  error?: string;
  contextStats: ContextStats;
}

export interface RoleMemory {
  history: ConversationMessage[];
  pendingReminder: string | null;
}

export const EMPTY_DOCUMENT_NOTICE =
  'The document is currently EMPTY. You need to create the initial content.';

const CLOSING_INSTRUCTION = 'Use the editing tools to make your changes. Call editing_complete when done.';

export const DEFAULT_MAX_ITERATIONS = 20;

export function renderDocumentState(document: LineDocument): string {
  if (document.lineCount === 0) return EMPTY_DOCUMENT_NOTICE;
  return `## CURRENT DOCUMENT STATE (${document.lineCount} lines)

${document.readAll().text}

---
END OF DOCUMENT`;
}

export class EditorAgent {
  readonly role: RoleDefinition;
  protected readonly log: Logger;
  private readonly model: EditingModel;
  private readonly tracker: ContextBudgetTracker;
  private readonly maxIterations: number;
  private memory: RoleMemory = { history: [], pendingReminder: null };

  constructor(options: EditorAgentOptions) {
    this.role = options.role;
    this.model = options.model;
    this.tracker = options.tracker;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.log = logger.child(options.role.id);
  }

  get history(): readonly ConversationMessage[] {
    return this.memory.history;
  }

  get pendingReminder(): string | null {
    return this.memory.pendingReminder;
  }

  clearHistory(): void {
    this.memory = { history: [], pendingReminder: null };
  }

  getContextStats(): Promise<ContextStats> {
    return this.tracker.stats(this.memory.history);
  }

  async run(document: LineDocument, task: string, round: number): Promise<AgentRunResult> {
    await this.manageContext(round);

    const userMessage = this.buildUserMessage(document, task);
    this.remember('user', userMessage);

    const stats = await this.getContextStats();
    this.log.info('Starting edit turn', {
      round,
      documentLines: document.lineCount,
      contextTokens: stats.tokenCount,
      percentageUsed: stats.percentageUsed,
    });

    const editSummary: string[] = [];
    let iterations = 0;

    try {
      const session = this.model.startSession({ system: this.role.systemPrompt, tools: DOCUMENT_TOOLS });
      let turn: ModelTurn = await session.sendText(userMessage);

      for (;;) {
        iterations++;

        if (turn.toolCalls.length === 0) {
          const text = turn.text || 'No response';
          this.remember('assistant', text);
          return this.result({ success: true, round, iterations, editSummary, finalMessage: text });
        }

        const results: ToolResult[] = [];
        for (const call of turn.toolCalls) {
          if (!isReadOnlyTool(call.name)) this.log.debug(call.name, { round, input: call.input });
          const outcome = await dispatchToolCall(document, call, this.role.id);

          if (outcome.kind === 'complete') {
            editSummary.push(outcome.summary);
            this.log.info('Editing complete', { round, summary: outcome.summary });
            this.remember('assistant', `[Completed editing] ${outcome.summary}`);
            return this.result({ success: true, round, iterations, editSummary });
          }

          if (outcome.mutating) editSummary.push(call.name);
          if (outcome.isError) this.log.debug('Tool call rejected', { tool: call.name, output: outcome.output });
          results.push({ toolCallId: call.id, content: outcome.output, isError: outcome.isError });
        }

        if (iterations >= this.maxIterations) break;
        turn = await session.sendToolResults(results);
      }
    } catch (err) {
      if (!(err instanceof ModelAPIError) || err.isAuthFailure) throw err;
      this.log.error('Model call failed', { round, status: err.status, error: err.message });
      this.remember('assistant', `[Model error] ${err.message}`);
      return this.result({ success: false, round, iterations, editSummary, error: err.message });
    }

    this.log.warn('Max iterations reached', { round, iterations });
    this.remember('assistant', `[Max iterations reached] Edits: ${editSummary.join(', ')}`);
    return this.result({ success: false, round, iterations, editSummary, error: 'Max iterations reached' });
  }

  private async manageContext(round: number): Promise<void> {
    const { history } = this.memory;
    if (history.length === 0 || !(await this.tracker.shouldOffload(history))) return;

    const offload = await this.tracker.offload(history, this.role.id, round);
    this.memory = { history: [], pendingReminder: offload.reminderText };
    this.log.info('Context archived', { archive: offload.archiveLocation });
  }

  /** Consumes the pending reminder. */
  private buildUserMessage(document: LineDocument, task: string): string {
    const reminder = this.memory.pendingReminder;
    this.memory.pendingReminder = null;
    const prefix = reminder ? `${reminder}\n\n` : '';

    return `${prefix}${task}

${renderDocumentState(document)}

${CLOSING_INSTRUCTION}`;
  }

  private remember(role: ConversationMessage['role'], content: string): void {
    this.memory.history.push({ role, content });
  }

  private async result(fields: Omit<AgentRunResult, 'role' | 'contextStats'>): Promise<AgentRunResult> {
    return { ...fields, role: this.role.id, contextStats: await this.getContextStats() };
  }
}
