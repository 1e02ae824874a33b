import { join } from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigError } from './utils/errors.js';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Models
  // `run --api-key` can supply it instead
  ANTHROPIC_API_KEY:        z.string().min(1).optional(),
  OPENAI_API_KEY:           z.string().min(1).optional(),
  CLAUDE_MODEL:             z.string().min(1).default('claude-sonnet-4-5'),
  OPENAI_FALLBACK_MODEL:    z.string().min(1).default('gpt-4o'),
  CLAUDE_MAX_TOKENS:        z.coerce.number().int().positive().default(8_192),
  SUMMARY_MAX_TOKENS:       z.coerce.number().int().positive().default(2_000),

  // Research
  RESEARCH_MAX_SEARCHES:    z.coerce.number().int().positive().default(6),

  // Context budget
  MAX_CONTEXT_TOKENS:       z.coerce.number().int().positive().default(200_000),
  TOKEN_OFFLOAD_THRESHOLD:  z.coerce.number().gt(0).max(1).default(0.8),

  // Drafting
  TOTAL_DRAFTS:             z.coerce.number().int().positive().default(5),
  TARGET_RUNTIME_MINUTES:   z.coerce.number().int().positive().default(10),
  MAX_EDIT_ITERATIONS:      z.coerce.number().int().positive().default(20),

  // Local storage
  OUTPUT_DIR:               z.string().min(1).default('outputs'),

  // Notifications (optional — silent when unset)
  TELEGRAM_BOT_TOKEN:       z.string().min(1).optional(),
  TELEGRAM_CHAT_ID:         z.string().min(1).optional(),

  // Logging
  LOG_LEVEL:                z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:               z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new ConfigError(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

export type Env = typeof env;

/** A CLI override wins over the environment; having neither is fatal. */
export function resolveApiKey(
  override: string | null | undefined,
  fromEnv: string | null | undefined = env.ANTHROPIC_API_KEY,
): string {
  const key = override || fromEnv;
  if (!key) throw new ConfigError('No Anthropic API key: set ANTHROPIC_API_KEY or pass --api-key');
  return key;
}

// ── Context Budget ────────────────────────────────────────────────────────────

export const CONTEXT_BUDGET = {
  maxTokens:       env.MAX_CONTEXT_TOKENS,
  offloadRatio:    env.TOKEN_OFFLOAD_THRESHOLD,
  summaryMaxTokens: env.SUMMARY_MAX_TOKENS,
} as const;

// ── Pipeline ──────────────────────────────────────────────────────────────────

export const PIPELINE = {
  totalDrafts:          env.TOTAL_DRAFTS,
  targetRuntimeMinutes: env.TARGET_RUNTIME_MINUTES,
  maxEditIterations:    env.MAX_EDIT_ITERATIONS,
} as const;

// ── Research ──────────────────────────────────────────────────────────────────

export const RESEARCH = {
  maxSearches: env.RESEARCH_MAX_SEARCHES,
  /** Server-paused search turns resumed before asking for the brief outright */
  maxTurns:    10,
} as const;

// ── Output Paths ──────────────────────────────────────────────────────────────

export interface OutputPaths {
  output: string;
  drafts: string;
  contextArchive: string;
  workingDraft: string;
  finalStory: string;
  researchBrief: string;
  pipelineHistory: string;
}

export function resolveOutputPaths(outputDir: string): OutputPaths {
  return {
    output:          outputDir,
    drafts:          join(outputDir, 'drafts'),
    contextArchive:  join(outputDir, 'context_archive'),
    workingDraft:    join(outputDir, 'working_draft.md'),
    finalStory:      join(outputDir, 'final_story.md'),
    researchBrief:   join(outputDir, 'research_brief.md'),
    pipelineHistory: join(outputDir, 'pipeline_history.json'),
  };
}

export const PATHS: OutputPaths = resolveOutputPaths(env.OUTPUT_DIR);

// ── Retry Policy ──────────────────────────────────────────────────────────────

export const RETRY_POLICY = {
  maxAttempts:   3,
  baseDelayMs:   2_000,
  backoffFactor: 2,
} as const;
