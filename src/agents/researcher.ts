/**
 * Researcher — runs once before the first draft. The model plans its own
 * queries and searches the web (server-side tool, capped per request), then
 * writes a brief for the writer. Long search turns the server pauses are
 * resumed up to `maxTurns`; after that the brief is requested outright.
 *
 * A model failure yields an empty brief and the pipeline carries on without one.
 */
import type { SearchModel, SearchSession, SearchTurn, WebSearchRecord } from '../ai/types.js';
import { ModelAPIError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('researcher');

export const DEFAULT_MAX_SEARCHES = 6;
export const DEFAULT_MAX_TURNS = 10;

export const RESEARCHER_SYSTEM_PROMPT = `You prepare background material for a screenwriting team.
Use the web_search tool several times, one topic per search, before you write anything:
the subject or setting, genre conventions, authentic technical or cultural details,
similar successful works. Don't repeat a query. Stop searching once you have enough,
then write the brief. Be concise and favour details a writer can use directly.`;

export const FINAL_BRIEF_REQUEST =
  'You have finished searching. Compile what you found into the final Research Brief now, without further searches.';

export function buildResearchPrompt(userMessage: string): string {
  return `Research this short film request:

${userMessage}

When you are done searching, reply with the brief in this format:

# Research Brief

## Topic Understanding
## Key Facts & Context
## Genre/Style Notes
## Authenticity Details
## Potential Story Elements
## Warnings/Sensitivities
## Sources Consulted`;
}

export interface ResearchBrief {
  text: string;
  searches: WebSearchRecord[];
  /** Model requests made, including resumed and final-brief turns */
  turns: number;
}

export interface ResearcherOptions {
  maxSearches?: number;
  maxTurns?: number;
  maxTokens?: number;
}

export class Researcher {
  private readonly maxSearches: number;
  private readonly maxTurns: number;
  private readonly maxTokens: number | undefined;

  constructor(
    private readonly model: SearchModel,
    options: ResearcherOptions = {},
  ) {
    this.maxSearches = options.maxSearches ?? DEFAULT_MAX_SEARCHES;
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.maxTokens = options.maxTokens;
  }

  async research(userMessage: string): Promise<ResearchBrief> {
    const searches: WebSearchRecord[] = [];
    if (!userMessage.trim()) return { text: '', searches, turns: 0 };

    let turns = 0;
    const take = async (next: Promise<SearchTurn>): Promise<SearchTurn> => {
      const turn = await next;
      turns++;
      for (const search of turn.searches) {
        log.info('Searched', { query: search.query, preview: search.resultPreview });
        searches.push(search);
      }
      return turn;
    };

    try {
      const session: SearchSession = this.model.startSearchSession({
        system: RESEARCHER_SYSTEM_PROMPT,
        maxSearches: this.maxSearches,
        ...(this.maxTokens ? { maxTokens: this.maxTokens } : {}),
      });

      let turn = await take(session.sendText(buildResearchPrompt(userMessage)));
      while (turn.paused && turns < this.maxTurns) {
        turn = await take(session.resume());
      }

      let text = turn.paused ? '' : turn.text.trim();
      if (!text) {
        log.info('No brief yet, asking for it outright', { turns });
        turn = await take(session.sendText(FINAL_BRIEF_REQUEST));
        text = turn.text.trim();
      }

      log.info('Research brief ready', { chars: text.length, searches: searches.length, turns });
      return { text, searches, turns };
    } catch (err) {
      if (!(err instanceof ModelAPIError)) throw err;
      log.warn('Research failed, continuing without a brief', { error: err.message, searches: searches.length });
      return { text: '', searches, turns };
    }
  }
}
