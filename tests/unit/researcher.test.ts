import { describe, expect, it } from 'vitest';
import {
  FINAL_BRIEF_REQUEST,
  RESEARCHER_SYSTEM_PROMPT,
  Researcher,
  buildResearchPrompt,
} from '../../src/agents/researcher.js';
import { ModelAPIError } from '../../src/utils/errors.js';
import { ScriptedSearchModel, pausedTurn, searchTurn, searched } from '../helpers/fakes.js';

describe('Researcher', () => {
  it('skips the model for an empty request', async () => {
    const model = new ScriptedSearchModel(searchTurn('unused'));
    expect(await new Researcher(model).research('   ')).toEqual({ text: '', searches: [], turns: 0 });
    expect(model.sessions).toEqual([]);
  });

  it('searches, then returns the trimmed brief with every query', async () => {
    const model = new ScriptedSearchModel(
      searchTurn('\n# Research Brief\nLighthouses.\n', [
        searched('lighthouse keeper daily routine'),
        searched('fresnel lens history'),
      ]),
    );
    const brief = await new Researcher(model, { maxSearches: 4, maxTokens: 3000 }).research('A lighthouse keeper story');

    expect(brief).toEqual({
      text: '# Research Brief\nLighthouses.',
      searches: [
        { query: 'lighthouse keeper daily routine', resultPreview: 'Results for lighthouse keeper daily routine' },
        { query: 'fresnel lens history', resultPreview: 'Results for fresnel lens history' },
      ],
      turns: 1,
    });
    const session = model.sessions[0];
    expect(session?.options).toEqual({ system: RESEARCHER_SYSTEM_PROMPT, maxSearches: 4, maxTokens: 3000 });
    expect(session?.sentTexts).toEqual([buildResearchPrompt('A lighthouse keeper story')]);
  });

  it('resumes paused search turns and collects searches across them', async () => {
    const model = new ScriptedSearchModel(
      pausedTurn(searched('storm season')),
      pausedTurn(searched('keeper logbooks')),
      searchTurn('# Research Brief', [searched('shipwrecks')]),
    );

    const brief = await new Researcher(model).research('Storm at the lighthouse');

    expect(brief.text).toBe('# Research Brief');
    expect(brief.searches.map((s) => s.query)).toEqual(['storm season', 'keeper logbooks', 'shipwrecks']);
    expect(brief.turns).toBe(3);
    expect(model.sessions[0]?.resumes).toBe(2);
  });

  it('asks for the brief outright once the turn limit is reached', async () => {
    const model = new ScriptedSearchModel(
      pausedTurn(searched('one')),
      pausedTurn(searched('two')),
      searchTurn('# Research Brief\nCompiled.'),
    );

    const brief = await new Researcher(model, { maxTurns: 2 }).research('Anything');

    expect(brief).toEqual({
      text: '# Research Brief\nCompiled.',
      searches: [
        { query: 'one', resultPreview: 'Results for one' },
        { query: 'two', resultPreview: 'Results for two' },
      ],
      turns: 3,
    });
    expect(model.sessions[0]?.sentTexts.at(-1)).toBe(FINAL_BRIEF_REQUEST);
    expect(model.sessions[0]?.resumes).toBe(1);
  });

  it('asks for the brief when the search turn ends without text', async () => {
    const model = new ScriptedSearchModel(searchTurn('  ', [searched('only')]), searchTurn('Brief'));

    const brief = await new Researcher(model).research('Anything');

    expect(brief.text).toBe('Brief');
    expect(model.sessions[0]?.sentTexts).toHaveLength(2);
  });

  it('yields an empty brief but keeps finished searches when the model fails', async () => {
    const model = new ScriptedSearchModel(pausedTurn(searched('first')), new ModelAPIError('overloaded', 529));

    expect(await new Researcher(model).research('Anything')).toEqual({
      text: '',
      searches: [{ query: 'first', resultPreview: 'Results for first' }],
      turns: 1,
    });
  });

  it('rethrows errors that are not model failures', async () => {
    const bug = new TypeError('broken');
    const model = new ScriptedSearchModel(bug);
    await expect(new Researcher(model).research('Anything')).rejects.toBe(bug);
  });
});
