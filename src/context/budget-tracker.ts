/**
 * Context Budget Tracker
 *
 * Decides when a role's conversation history has grown past its token
 * budget, and turns that history into an archive plus a short memory
 * reminder. Estimation and summarization degrade to local fallbacks when
 * the model is unavailable; neither ever rejects.
 *
 * The tracker is stateless per role — the history and the pending reminder
 * belong to the agent that owns them.
 */
import type { TextModel, TokenCounter } from '../ai/types.js';
import { logger } from '../utils/logger.js';
import { fail, type Result } from '../utils/result.js';
import { archiveFileName, type ContextArchiveStore } from './archive-store.js';
import { estimateTokensLocally, flattenMessages } from './token-estimator.js';
import type {
  ContextArchive,
  ContextStats,
  ConversationMessage,
  OffloadResult,
} from './types.js';

const log = logger.child('context');

export const MEMORY_REMINDER_MARKER = '[MEMORY REMINDER]';

export interface ContextBudgetOptions {
  maxTokens: number;
  /** Fraction of maxTokens at which to offload, e.g. 0.8 */
  offloadRatio: number;
  archiveStore: ContextArchiveStore;
  tokenCounter?: TokenCounter;
  summarizer?: TextModel;
  summaryMaxTokens?: number;
  now?: () => Date;
}

export function buildSummaryPrompt(messages: readonly ConversationMessage[], roleId: string): string {
  const conversation = messages
    .map((m) => `[${m.role.toUpperCase()}]\n${m.content}`)
    .join('\n\n');

  return `Summarize the work history of the "${roleId}" role in a collaborative script-drafting pipeline.

Cover:
1. Which drafts were worked on
2. Key edits and decisions
3. Feedback received
4. Current state of the script

Keep details the role would need to continue its work.

CONVERSATION HISTORY:
${conversation}

SUMMARY:`;
}

export function buildMemoryReminder(archiveLocation: string, summary: string): string {
  return `${MEMORY_REMINDER_MARKER}
Earlier context has been archived to: ${archiveLocation}

Summary of prior work:
${summary}

The full history is available in the archive above if earlier details are needed.
---
`;
}

export function fallbackSummary(roleId: string, messageCount: number): string {
  return `[Auto-summary failed. Role: ${roleId}. Messages archived: ${messageCount}]`;
}

export class ContextBudgetTracker {
  readonly maxTokens: number;
  readonly threshold: number;
  private readonly archiveStore: ContextArchiveStore;
  private readonly tokenCounter: TokenCounter | undefined;
  private readonly summarizer: TextModel | undefined;
  private readonly summaryMaxTokens: number;
  private readonly now: () => Date;

  constructor(options: ContextBudgetOptions) {
    this.maxTokens = options.maxTokens;
    this.threshold = Math.floor(options.maxTokens * options.offloadRatio);
    this.archiveStore = options.archiveStore;
    this.tokenCounter = options.tokenCounter;
    this.summarizer = options.summarizer;
    this.summaryMaxTokens = options.summaryMaxTokens ?? 2_000;
    this.now = options.now ?? (() => new Date());
  }

  async estimateTokens(messages: readonly ConversationMessage[]): Promise<number> {
    const text = flattenMessages(messages);
    if (!this.tokenCounter) return estimateTokensLocally(text);

    const counted = await this.tokenCounter.countTokens(text);
    if (counted.ok) return counted.value;

    log.warn('Token counting failed, using local estimate', { error: counted.error });
    return estimateTokensLocally(text);
  }

  async shouldOffload(messages: readonly ConversationMessage[]): Promise<boolean> {
    return (await this.estimateTokens(messages)) > this.threshold;
  }

  async stats(messages: readonly ConversationMessage[]): Promise<ContextStats> {
    const tokenCount = await this.estimateTokens(messages);
    return {
      tokenCount,
      maxTokens: this.maxTokens,
      threshold: this.threshold,
      percentageUsed: Math.round((tokenCount / this.maxTokens) * 100 * 100) / 100,
      shouldOffload: tokenCount > this.threshold,
    };
  }

  async summarize(messages: readonly ConversationMessage[], roleId: string): Promise<string> {
    const result: Result<string> = this.summarizer
      ? await this.summarizer.complete(buildSummaryPrompt(messages, roleId), {
          maxTokens: this.summaryMaxTokens,
        })
      : fail('no summarizer configured');

    if (result.ok && result.value.trim()) return result.value.trim();

    log.warn('Summary generation failed, using fallback', {
      role: roleId,
      error: result.ok ? 'empty summary' : result.error,
    });
    return fallbackSummary(roleId, messages.length);
  }

  /**
   * Archive `messages` and build the reminder that replaces them. The caller
   * must clear its history once this resolves and prepend the reminder to its
   * next task exactly once.
   */
  async offload(
    messages: readonly ConversationMessage[],
    roleId: string,
    round: number,
  ): Promise<OffloadResult> {
    const summary = await this.summarize(messages, roleId);
    const createdAt = this.now();

    const archive: ContextArchive = {
      roleId,
      round,
      createdAt: createdAt.toISOString(),
      messageCount: messages.length,
      summary,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
    };

    const archiveLocation = await this.archiveStore.write(
      archiveFileName(roleId, round, createdAt),
      archive,
    );

    log.info('Context offloaded', { role: roleId, round, messages: messages.length, archiveLocation });

    return { archiveLocation, summary, reminderText: buildMemoryReminder(archiveLocation, summary) };
  }

  /** Out-of-band read of an earlier archive. */
  loadArchive(location: string): Promise<Result<ContextArchive>> {
    return this.archiveStore.load(location);
  }
}
