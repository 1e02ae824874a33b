import { describe, expect, it } from 'vitest';
import {
  AUDIENCE_SYSTEM_PROMPT,
  AudienceReviewer,
  buildAudiencePrompt,
  extractTag,
  parseAudienceFeedback,
} from '../../src/pipeline/audience.js';
import { FakeTextModel } from '../helpers/fakes.js';

const FEEDBACK = `# Audience Feedback - Draft 2

## Plot Hole Check
Why doesn't the sister just call him?
<plot_holes_found> Yes </plot_holes_found>

## Priority for Next Draft
<priority>
Explain why the phone is dead
</priority>

<engagement_score>7/10</engagement_score>

<READY_FOR_PRODUCTION>false</READY_FOR_PRODUCTION>`;

describe('parseAudienceFeedback', () => {
  it('extracts every tagged metric', () => {
    expect(parseAudienceFeedback(FEEDBACK)).toEqual({
      feedback: FEEDBACK,
      engagementScore: 7,
      plotHolesFound: true,
      readyForProduction: false,
      priority: 'Explain why the phone is dead',
    });
  });

  it('maps missing tags to null', () => {
    expect(parseAudienceFeedback('Loved it.')).toEqual({
      feedback: 'Loved it.',
      engagementScore: null,
      plotHolesFound: null,
      readyForProduction: null,
      priority: null,
    });
  });

  it('reads a score without digits as null', () => {
    expect(parseAudienceFeedback('<engagement_score>n/a</engagement_score>').engagementScore).toBeNull();
  });

  it('accepts 1 as true and anything unrecognized as false', () => {
    expect(parseAudienceFeedback('<ready_for_production>1</ready_for_production>').readyForProduction).toBe(true);
    expect(parseAudienceFeedback('<plot_holes_found>maybe</plot_holes_found>').plotHolesFound).toBe(false);
  });

  it('takes the first occurrence of a tag', () => {
    expect(extractTag('<priority>a</priority> <priority>b</priority>', 'priority')).toBe('a');
  });
});

describe('AudienceReviewer', () => {
  it('asks the model with the audience persona and parses the reply', async () => {
    const model = FakeTextModel.replying('<engagement_score>8</engagement_score>');
    const result = await new AudienceReviewer(model).review('## SCENE 1', 1, '');

    expect(result.engagementScore).toBe(8);
    expect(model.prompts[0]?.options).toEqual({ system: AUDIENCE_SYSTEM_PROMPT });
    expect(model.prompts[0]?.prompt).toBe(buildAudiencePrompt('## SCENE 1', 1, ''));
  });

  it('includes previous feedback from the second draft on', () => {
    const prompt = buildAudiencePrompt('text', 3, 'Too slow.');
    expect(prompt).toContain('### Your Previous Feedback (Draft 2):\nToo slow.\n');
    expect(buildAudiencePrompt('text', 1, '')).not.toContain('Previous Feedback');
  });

  it('returns placeholder feedback when the model fails', async () => {
    const result = await new AudienceReviewer(FakeTextModel.failing('overloaded')).review('x', 1, '');
    expect(result).toEqual({
      feedback: '[Audience feedback unavailable: overloaded]',
      engagementScore: null,
      plotHolesFound: null,
      readyForProduction: null,
      priority: null,
    });
  });
});
