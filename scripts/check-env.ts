#!/usr/bin/env tsx
/**
 * Pre-flight environment check — validates all env vars via the config.ts Zod schema.
 * Run: npm run check-env
 */
import { env, CONTEXT_BUDGET, PATHS, PIPELINE, RESEARCH } from '../src/config.js';

// config.ts import throws descriptively on invalid vars
console.log('✓ Environment variables are valid');
console.log(`  ANTHROPIC_API_KEY: ${env.ANTHROPIC_API_KEY ? 'set' : 'missing (pass --api-key to run)'}`);
console.log(`  CLAUDE_MODEL:      ${env.CLAUDE_MODEL}`);
console.log(`  OPENAI fallback:   ${env.OPENAI_API_KEY ? env.OPENAI_FALLBACK_MODEL : 'off'}`);
console.log(`  TELEGRAM_BOT:      ${env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID ? 'set' : 'off'}`);
console.log(`  Context budget:    ${CONTEXT_BUDGET.maxTokens} tokens, offload at ${CONTEXT_BUDGET.offloadRatio * 100}%`);
console.log(`  Drafts:            ${PIPELINE.totalDrafts} (max ${PIPELINE.maxEditIterations} tool rounds per role)`);
console.log(`  Research:          up to ${RESEARCH.maxSearches} web searches`);
console.log(`  Output:            ${PATHS.output}`);

if (!env.ANTHROPIC_API_KEY) process.exitCode = 1;
