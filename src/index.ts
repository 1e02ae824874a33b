#!/usr/bin/env node
/**
 * CLI entry point.
 *   run [prompt] [--drafts N] [--api-key KEY]   draft a script; Ctrl+C stops after the current edit
 *   archive <path>                              print an offloaded context archive
 */
import { createRoleAgents } from './agents/index.js';
import { Researcher } from './agents/researcher.js';
import { createClaudeClient } from './ai/claude.js';
import { parseCliArgs, USAGE } from './cli-args.js';
import { CONTEXT_BUDGET, PATHS, PIPELINE, RESEARCH, env, resolveApiKey } from './config.js';
import { FileArchiveStore } from './context/archive-store.js';
import { ContextBudgetTracker } from './context/budget-tracker.js';
import { LineDocument } from './document/line-document.js';
import { FileDocumentStorage } from './document/storage.js';
import { telegram } from './monitoring/telegram.js';
import { AudienceReviewer } from './pipeline/audience.js';
import { EditorPipeline, type PipelineRun } from './pipeline/index.js';
import { PipelineAbortedError } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function run(prompt: string, drafts: number | null, apiKey: string | null): Promise<void> {
  const client = createClaudeClient(env, resolveApiKey(apiKey));
  const archiveStore = new FileArchiveStore(PATHS.contextArchive);
  const tracker = new ContextBudgetTracker({
    ...CONTEXT_BUDGET,
    archiveStore,
    tokenCounter: client,
    summarizer: client,
  });
  const document = await LineDocument.open(await FileDocumentStorage.open(PATHS.workingDraft));

  const pipeline = new EditorPipeline({
    agents: createRoleAgents({
      model: client,
      tracker,
      maxIterations: PIPELINE.maxEditIterations,
      targetRuntimeMinutes: PIPELINE.targetRuntimeMinutes,
    }),
    reviewer: new AudienceReviewer(client),
    researcher: new Researcher(client, RESEARCH),
    document,
    paths: PATHS,
    totalDrafts: drafts ?? PIPELINE.totalDrafts,
    notifier: telegram,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, stopping after the current step');
    controller.abort();
  });

  const startedAt = Date.now();
  try {
    const result = await pipeline.runAllDrafts(prompt, { signal: controller.signal });
    printSummary(result, (Date.now() - startedAt) / 1000);
  } catch (err) {
    if (err instanceof PipelineAbortedError) {
      logger.warn(`${err.message}; progress kept in ${PATHS.output}`);
      process.exitCode = 130;
      return;
    }
    throw err;
  }
}

function printSummary(result: PipelineRun, totalSeconds: number): void {
  const scores = result.drafts
    .map((d) => d.engagementScore)
    .filter((s): s is number => s !== null);
  const final = result.drafts.at(-1);

  logger.info('Run summary', {
    drafts: result.drafts.length,
    totalSeconds: Math.round(totalSeconds * 10) / 10,
    scores: scores.join(' → ') || 'n/a',
    searches: result.researchQueries.length,
    finalScenes: final?.sceneCount ?? 0,
    finalVisuals: final?.visualCount ?? 0,
    finalAudio: final?.audioCount ?? 0,
    finalStory: result.finalStoryPath,
  });
}

async function showArchive(path: string): Promise<void> {
  const tracker = new ContextBudgetTracker({
    ...CONTEXT_BUDGET,
    archiveStore: new FileArchiveStore(PATHS.contextArchive),
  });
  const loaded = await tracker.loadArchive(path);
  if (!loaded.ok) {
    logger.error(loaded.error);
    process.exitCode = 1;
    return;
  }
  const archive = loaded.value;
  process.stdout.write(
    `Role: ${archive.roleId}\nDraft: ${archive.round}\nCreated: ${archive.createdAt}\n` +
    `Messages: ${archive.messageCount}\n\n${archive.summary}\n`,
  );
}

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  switch (cli.command) {
    case 'run':
      await run(cli.prompt, cli.drafts, cli.apiKey);
      break;
    case 'archive':
      await showArchive(cli.path);
      break;
    case 'invalid':
      logger.error(`${cli.reason}. ${USAGE}`);
      process.exit(1);
  }
}

main().catch((err) => {
  logger.error('Fatal', { err });
  process.exit(1);
});
