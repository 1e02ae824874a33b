/**
 * Audience reviewer — reads a draft and returns feedback. It never edits.
 *
 * The model is asked to wrap the metrics the pipeline tracks in XML tags;
 * everything else in the reply is free-form and passed on to the writer.
 */
import type { TextModel } from '../ai/types.js';
import { logger } from '../utils/logger.js';

const log = logger.child('audience');

export interface AudienceFeedback {
  feedback: string;
  engagementScore: number | null;
  plotHolesFound: boolean | null;
  readyForProduction: boolean | null;
  priority: string | null;
}

export const AUDIENCE_SYSTEM_PROMPT = `You are a skeptical, attentive audience member reading a short film script.
You give feedback; you never rewrite the script. Look hardest for plot holes: obvious solutions the characters ignore and information they could simply share.`;

export function extractTag(text: string, tag: string): string | null {
  const match = new RegExp(`<${tag}>\\s*([\\s\\S]*?)\\s*</${tag}>`, 'i').exec(text);
  const value = match?.[1];
  return value === undefined ? null : value.trim();
}

function extractBool(text: string, tag: string): boolean | null {
  const value = extractTag(text, tag);
  if (value === null) return null;
  return ['true', 'yes', '1'].includes(value.toLowerCase());
}

/** First integer in the tag, so "7/10" and "7 out of 10" both read as 7. */
function extractInt(text: string, tag: string): number | null {
  const value = extractTag(text, tag);
  const digits = value === null ? undefined : /\d+/.exec(value)?.[0];
  return digits === undefined ? null : Number.parseInt(digits, 10);
}

export function parseAudienceFeedback(feedback: string): AudienceFeedback {
  return {
    feedback,
    engagementScore: extractInt(feedback, 'engagement_score'),
    plotHolesFound: extractBool(feedback, 'plot_holes_found'),
    readyForProduction: extractBool(feedback, 'ready_for_production'),
    priority: extractTag(feedback, 'priority'),
  };
}

export function buildAudiencePrompt(content: string, round: number, previousFeedback: string): string {
  const previous = previousFeedback
    ? `\n### Your Previous Feedback (Draft ${round - 1}):\n${previousFeedback}\nSay whether those concerns were addressed.\n`
    : '';

  return `## AUDIENCE FEEDBACK REQUEST - Draft ${round}

### Script to Review:

${content}
${previous}
Reply in this structure, keeping the XML tags exactly:

# Audience Feedback - Draft ${round}

## Overall Impression
## Plot Hole Check
<plot_holes_found>true or false</plot_holes_found>
## What's Working
## Areas for Improvement
## Priority for Next Draft
<priority>the single most important fix</priority>

<engagement_score>integer 1-10; a major plot hole caps it at 6</engagement_score>

<ready_for_production>true or false</ready_for_production>`;
}

export class AudienceReviewer {
  constructor(private readonly model: TextModel) {}

  async review(content: string, round: number, previousFeedback: string): Promise<AudienceFeedback> {
    const result = await this.model.complete(buildAudiencePrompt(content, round, previousFeedback), {
      system: AUDIENCE_SYSTEM_PROMPT,
    });

    if (!result.ok) {
      log.warn('Audience feedback unavailable', { round, error: result.error });
      return parseAudienceFeedback(`[Audience feedback unavailable: ${result.error}]`);
    }
    return parseAudienceFeedback(result.value);
  }
}
