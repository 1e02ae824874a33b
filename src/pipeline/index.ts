/**
 * Pipeline orchestrator — research, then N drafting rounds over the shared
 * working document, then the final copy and the run history.
 *
 * Roles run strictly one after another: writer → designer → composer →
 * checker, then the read-only audience review. The abort signal is checked
 * before every round and every role turn.
 */
import { appendFile, mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { AgentRunResult } from '../agents/editor-agent.js';
import type { RoleAgents } from '../agents/index.js';
import type { ResearchBrief, Researcher } from '../agents/researcher.js';
import { AUDIO_TAG } from '../agents/composer.js';
import { VISUAL_TAG } from '../agents/designer.js';
import type { OutputPaths } from '../config.js';
import type { LineDocument } from '../document/line-document.js';
import type { Notifier } from '../monitoring/telegram.js';
import { PipelineAbortedError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AudienceReviewer } from './audience.js';

const log = logger.child('pipeline');

export const SCENE_MARKER = '## SCENE';

export interface PipelineDeps {
  agents: RoleAgents;
  reviewer: AudienceReviewer;
  researcher: Researcher;
  document: LineDocument;
  paths: OutputPaths;
  totalDrafts: number;
  notifier?: Notifier;
  clock?: () => number;
}

export interface AgentSummary {
  role: string;
  success: boolean;
  iterations: number;
  edits: number;
  error: string | null;
}

export interface DraftResult {
  round: number;
  feedback: string;
  engagementScore: number | null;
  plotHolesFound: boolean | null;
  readyForProduction: boolean | null;
  priority: string | null;
  visualCount: number;
  audioCount: number;
  sceneCount: number;
  durationSeconds: number;
  editCount: number;
  agents: AgentRunResult[];
}

export interface PipelineRun {
  finalStoryPath: string;
  drafts: DraftResult[];
  /** Web searches the researcher ran, in order */
  researchQueries: string[];
}

export interface RunOptions {
  signal?: AbortSignal;
}

export function countOccurrences(text: string, marker: string): number {
  return text.split(marker).length - 1;
}

export function draftFileName(round: number): string {
  return `draft_${String(round).padStart(2, '0')}.md`;
}

export function formatFeedbackComment(feedback: string): string {
  return `\n\n---\n\n<!-- AUDIENCE FEEDBACK\n${feedback}\n-->`;
}

function summarizeAgent(result: AgentRunResult): AgentSummary {
  return {
    role: result.role,
    success: result.success,
    iterations: result.iterations,
    edits: result.editSummary.length,
    error: result.error ?? null,
  };
}

/** The persisted form of a round: metrics only, no feedback text or full agent results. */
export function toHistoryEntry(draft: DraftResult) {
  return {
    round: draft.round,
    engagementScore: draft.engagementScore,
    plotHolesFound: draft.plotHolesFound,
    readyForProduction: draft.readyForProduction,
    priority: draft.priority,
    visualCount: draft.visualCount,
    audioCount: draft.audioCount,
    sceneCount: draft.sceneCount,
    durationSeconds: draft.durationSeconds,
    editCount: draft.editCount,
    agents: draft.agents.map(summarizeAgent),
  };
}

export class EditorPipeline {
  readonly history: DraftResult[] = [];
  private readonly deps: PipelineDeps;
  private readonly clock: () => number;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
  }

  async runAllDrafts(userMessage = '', options: RunOptions = {}): Promise<PipelineRun> {
    const { document, paths, totalDrafts, notifier } = this.deps;
    const { signal } = options;
    log.info('Starting run', { totalDrafts, prompt: userMessage || '(none)' });

    try {
      await mkdir(paths.drafts, { recursive: true });

      this.checkAborted(signal);
      const brief = await this.runResearch(userMessage);

      await document.clear('pipeline');

      let previousFeedback = '';
      for (let round = 1; round <= totalDrafts; round++) {
        this.checkAborted(signal);
        const draft = await this.runDraft(round, previousFeedback, userMessage, brief.text, signal);
        previousFeedback = draft.feedback;
      }

      await writeFile(paths.finalStory, document.content, 'utf-8');
      await this.saveHistory();

      log.info('All drafts complete', { finalStory: paths.finalStory });
      await notifier?.info(`All ${totalDrafts} drafts complete: ${paths.finalStory}`);
      return {
        finalStoryPath: paths.finalStory,
        drafts: [...this.history],
        researchQueries: brief.searches.map((s) => s.query),
      };
    } catch (err) {
      if (err instanceof PipelineAbortedError) {
        await this.saveHistory();
        log.warn('Run aborted', { completedDrafts: err.completedDrafts });
        await notifier?.info(err.message);
        throw err;
      }
      log.error('Run failed', { err });
      await this.saveHistoryAfterFailure();
      await notifier?.error(`Pipeline failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  /** Keeps finished rounds on disk; a failing save is logged so the original error still surfaces. */
  private async saveHistoryAfterFailure(): Promise<void> {
    try {
      await this.saveHistory();
    } catch (saveErr) {
      log.error('Could not save history after failure', { err: saveErr });
    }
  }

  async runResearch(userMessage: string): Promise<ResearchBrief> {
    const brief = await this.deps.researcher.research(userMessage);
    if (brief.text) {
      await writeFile(this.deps.paths.researchBrief, brief.text, 'utf-8');
      log.info('Research saved', { path: this.deps.paths.researchBrief, searches: brief.searches.length });
    }
    return brief;
  }

  async runDraft(
    round: number,
    previousFeedback: string,
    userMessage: string,
    research: string,
    signal?: AbortSignal,
  ): Promise<DraftResult> {
    const { agents, reviewer, document, paths, totalDrafts, notifier } = this.deps;
    const startedAt = this.clock();
    const editsBefore = document.history.length;
    const results: AgentRunResult[] = [];

    log.info(`Draft ${round} of ${totalDrafts}`);

    const turns: Array<() => Promise<AgentRunResult>> = [
      () => round === 1
        ? agents.writer.createInitialDraft(document, userMessage, research, round, totalDrafts)
        : agents.writer.reviseDraft(document, previousFeedback, round, totalDrafts),
      () => agents.designer.addVisuals(document, round),
      () => agents.composer.addAudio(document, round),
      () => agents.checker.checkAndFix(document, round),
    ];

    for (const turn of turns) {
      this.checkAborted(signal);
      const result = await turn();
      if (!result.success) log.warn('Role turn failed', { role: result.role, round, error: result.error });
      results.push(result);
    }

    const content = document.content;
    const draftPath = join(paths.drafts, draftFileName(round));
    await writeFile(draftPath, content, 'utf-8');

    this.checkAborted(signal);
    const audience = await reviewer.review(content, round, previousFeedback);
    await appendFile(draftPath, formatFeedbackComment(audience.feedback), 'utf-8');

    const draft: DraftResult = {
      round,
      feedback: audience.feedback,
      engagementScore: audience.engagementScore,
      plotHolesFound: audience.plotHolesFound,
      readyForProduction: audience.readyForProduction,
      priority: audience.priority,
      visualCount: countOccurrences(content, VISUAL_TAG),
      audioCount: countOccurrences(content, AUDIO_TAG),
      sceneCount: countOccurrences(content, SCENE_MARKER),
      durationSeconds: (this.clock() - startedAt) / 1000,
      editCount: document.history.length - editsBefore,
      agents: results,
    };
    this.history.push(draft);

    log.info(`Draft ${round} complete`, {
      scenes: draft.sceneCount,
      visuals: draft.visualCount,
      audio: draft.audioCount,
      score: draft.engagementScore,
      plotHoles: draft.plotHolesFound,
      draftPath,
    });
    await notifier?.draftComplete({
      round,
      totalDrafts,
      engagementScore: draft.engagementScore,
      plotHolesFound: draft.plotHolesFound,
      sceneCount: draft.sceneCount,
      durationSeconds: draft.durationSeconds,
    });

    return draft;
  }

  async saveHistory(): Promise<string> {
    const path = this.deps.paths.pipelineHistory;
    await writeFile(path, JSON.stringify(this.history.map(toHistoryEntry), null, 2), 'utf-8');
    return path;
  }

  private checkAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) throw new PipelineAbortedError(this.history.length);
  }
}
