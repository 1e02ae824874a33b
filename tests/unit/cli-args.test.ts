import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../../src/cli-args.js';

describe('parseCliArgs', () => {
  it('joins the prompt words for run', () => {
    expect(parseCliArgs(['run', 'A', 'sci-fi', 'thriller'])).toEqual({
      command: 'run',
      prompt: 'A sci-fi thriller',
      drafts: null,
      apiKey: null,
    });
  });

  it('reads --drafts in both forms', () => {
    expect(parseCliArgs(['run', '--drafts', '3', 'Heist'])).toEqual({
      command: 'run',
      prompt: 'Heist',
      drafts: 3,
      apiKey: null,
    });
    expect(parseCliArgs(['run', '--drafts=2'])).toEqual({ command: 'run', prompt: '', drafts: 2, apiKey: null });
  });

  it('reads an API key override in both forms', () => {
    expect(parseCliArgs(['run', 'Heist', '--api-key', 'test-secret'])).toEqual({
      command: 'run',
      prompt: 'Heist',
      drafts: null,
      apiKey: 'test-secret',
    });
    expect(parseCliArgs(['run', '--api-key=test-secret', '--drafts', '1'])).toEqual({
      command: 'run',
      prompt: '',
      drafts: 1,
      apiKey: 'test-secret',
    });
  });

  it('rejects an empty API key', () => {
    expect(parseCliArgs(['run', '--api-key'])).toEqual({ command: 'invalid', reason: '--api-key needs a value' });
    expect(parseCliArgs(['run', '--api-key='])).toEqual({ command: 'invalid', reason: '--api-key needs a value' });
  });

  it('rejects a bad draft count', () => {
    expect(parseCliArgs(['run', '--drafts', 'zero'])).toEqual({
      command: 'invalid',
      reason: '--drafts needs a positive integer, got zero',
    });
    expect(parseCliArgs(['run', '--drafts'])).toEqual({
      command: 'invalid',
      reason: '--drafts needs a positive integer, got (nothing)',
    });
  });

  it('needs a path for archive', () => {
    expect(parseCliArgs(['archive', 'outputs/context_archive/a.json'])).toEqual({
      command: 'archive',
      path: 'outputs/context_archive/a.json',
    });
    expect(parseCliArgs(['archive'])).toEqual({ command: 'invalid', reason: 'archive needs a path' });
  });

  it('rejects unknown commands', () => {
    expect(parseCliArgs([])).toEqual({ command: 'invalid', reason: 'Unknown command: (none)' });
    expect(parseCliArgs(['publish'])).toEqual({ command: 'invalid', reason: 'Unknown command: publish' });
  });
});
