#!/usr/bin/env tsx
/**
 * Smoke test — checks integrations and the output directory before a first run.
 * Run: npm run smoke-test [-- <api-key>]
 */
import { rm } from 'fs/promises';
import { join } from 'path';
import { createClaudeClient } from '../src/ai/claude.js';
import { env, PATHS, resolveApiKey } from '../src/config.js';
import { LineDocument } from '../src/document/line-document.js';
import { FileDocumentStorage } from '../src/document/storage.js';
import { telegram } from '../src/monitoring/telegram.js';

let allPass = true;

async function check(name: string, fn: () => Promise<void>): Promise<void> {
  process.stdout.write(`  ${name}... `);
  try {
    await fn();
    console.log('✓');
  } catch (err) {
    console.error(`✗ ${err instanceof Error ? err.message : String(err)}`);
    allPass = false;
  }
}

console.log('Running smoke tests...\n');

const client = createClaudeClient(env, resolveApiKey(process.argv[2]));

await check('Anthropic API reachable', async () => {
  const reply = await client.complete('ping', { maxTokens: 5 });
  if (!reply.ok) throw new Error(reply.error);
});

await check('Token counting available', async () => {
  const counted = await client.countTokens('ping');
  if (!counted.ok) throw new Error(counted.error);
});

await check('Web search available', async () => {
  const session = client.startSearchSession({ system: 'Answer briefly.', maxSearches: 1, maxTokens: 300 });
  const turn = await session.sendText('Search the web once for "Fresnel lens" and reply OK.');
  if (turn.searches.length === 0) throw new Error('model ran no search');
});

await check('Output directory writable', async () => {
  const path = join(PATHS.output, '.smoke-test.md');
  const doc = await LineDocument.open(await FileDocumentStorage.open(path));
  await doc.insert(0, '## SMOKE\nok', 'smoke-test');
  const reopened = await LineDocument.open(await FileDocumentStorage.open(path));
  if (reopened.lineCount !== 2) throw new Error(`expected 2 lines, read ${reopened.lineCount}`);
  await rm(path, { force: true });
});

await check('Telegram bot operational', async () => {
  await telegram.info('Smoke test ping');
});

console.log(allPass
  ? '\n✓ All smoke tests passed — ready to run pipeline'
  : '\n✗ Some tests failed — fix issues before running pipeline');

if (!allPass) process.exit(1);
