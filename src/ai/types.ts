/**
 * Contracts for the generative-model collaborator.
 *
 * Every boundary that reaches the external service returns a Result so the
 * caller decides what a failure means; only the editing session throws, and
 * only with ModelAPIError.
 */
import type Anthropic from '@anthropic-ai/sdk';
import type { Result } from '../utils/result.js';

export interface CompletionOptions {
  system?: string;
  maxTokens?: number;
}

export interface TextModel {
  complete(prompt: string, options?: CompletionOptions): Promise<Result<string>>;
}

export interface TokenCounter {
  countTokens(text: string): Promise<Result<number>>;
}

export interface ToolCall {
  id: string;
  name: string;
  input: unknown;
}

export interface ToolResult {
  toolCallId: string;
  content: string;
  isError: boolean;
}

/** One model reply: any text it produced plus the tools it asked to run. */
export interface ModelTurn {
  text: string;
  toolCalls: ToolCall[];
  stopReason: string | null;
}

export interface EditingSessionOptions {
  system: string;
  tools: Anthropic.Tool[];
}

/** A multi-turn tool-calling conversation. Throws ModelAPIError on failure. */
export interface EditingSession {
  sendText(text: string): Promise<ModelTurn>;
  sendToolResults(results: ToolResult[]): Promise<ModelTurn>;
}

export interface EditingModel {
  startSession(options: EditingSessionOptions): EditingSession;
}

/** One web search the model ran on the server side. */
export interface WebSearchRecord {
  query: string;
  /** First result titles and URLs, or the search error */
  resultPreview: string;
}

export interface SearchTurn {
  /** Text written after the turn's last search result */
  text: string;
  searches: WebSearchRecord[];
  /** The server paused a long search turn; `resume` picks it up */
  paused: boolean;
}

export interface SearchSessionOptions {
  system: string;
  /** Cap on searches per request */
  maxSearches: number;
  maxTokens?: number;
}

/** A conversation with server-side web search. Throws ModelAPIError on failure. */
export interface SearchSession {
  sendText(text: string): Promise<SearchTurn>;
  resume(): Promise<SearchTurn>;
}

export interface SearchModel {
  startSearchSession(options: SearchSessionOptions): SearchSession;
}
