/**
 * Model client — Anthropic Claude primary, GPT-4o fallback for plain text,
 * server-side web search for research.
 * Agents, the tracker and the pipeline only see the interfaces in ./types.ts;
 * never import Anthropic/OpenAI directly elsewhere.
 */
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { z } from 'zod';
import { RETRY_POLICY, type Env } from '../config.js';
import { ModelAPIError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { fail, ok, type Result } from '../utils/result.js';
import { withRetry } from '../utils/retry.js';
import type {
  CompletionOptions,
  EditingModel,
  EditingSession,
  EditingSessionOptions,
  ModelTurn,
  SearchModel,
  SearchSession,
  SearchSessionOptions,
  SearchTurn,
  TextModel,
  TokenCounter,
  ToolCall,
  ToolResult,
  WebSearchRecord,
} from './types.js';

const log = logger.child('claude');

export interface ClaudeClientOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  openaiApiKey?: string | undefined;
  fallbackModel?: string;
}

/** Rate limits, 5xx and dropped connections are worth another attempt. */
export function isRetryableModelError(err: unknown): boolean {
  if (err instanceof Anthropic.APIConnectionError) return true;
  if (err instanceof Anthropic.APIError) {
    const status = err.status ?? 0;
    return status === 429 || status >= 500;
  }
  return false;
}

export function toModelError(err: unknown): ModelAPIError {
  if (err instanceof ModelAPIError) return err;
  if (err instanceof Anthropic.APIError) return new ModelAPIError(err.message, err.status ?? undefined);
  return new ModelAPIError(errorMessage(err));
}

/** Split a reply into its text and tool calls, and the params to echo back. */
function readTurn(message: Anthropic.Message): { turn: ModelTurn; echo: Anthropic.ContentBlockParam[] } {
  const texts: string[] = [];
  const toolCalls: ToolCall[] = [];
  const echo: Anthropic.ContentBlockParam[] = [];

  for (const block of message.content) {
    if (block.type === 'text') {
      if (block.text.trim()) texts.push(block.text);
      echo.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      toolCalls.push({ id: block.id, name: block.name, input: block.input });
      echo.push({ type: 'tool_use', id: block.id, name: block.name, input: block.input });
    }
  }

  return {
    turn: { text: texts.join('\n'), toolCalls, stopReason: message.stop_reason },
    echo,
  };
}

const SearchInput = z.object({ query: z.string() });

const PREVIEW_CHARS = 200;

export function webSearchTool(maxUses: number): Anthropic.WebSearchTool20250305 {
  return { type: 'web_search_20250305', name: 'web_search', max_uses: maxUses };
}

export function previewSearchResults(content: Anthropic.WebSearchToolResultBlock['content']): string {
  if (!Array.isArray(content)) return `Search failed: ${content.error_code}`;
  if (content.length === 0) return 'No results';
  const preview = content.map((r) => `${r.title} (${r.url})`).join('; ');
  return preview.length > PREVIEW_CHARS ? `${preview.slice(0, PREVIEW_CHARS)}...` : preview;
}

/**
 * Read a reply that may interleave searches with text. Cited answers arrive
 * as many text fragments, so they are joined without separators; only text
 * after the last search result counts as the turn's answer.
 */
export function readSearchTurn(
  message: Pick<Anthropic.Message, 'content' | 'stop_reason'>,
  queries: Map<string, string>,
): { turn: SearchTurn; echo: Anthropic.ContentBlockParam[] } {
  const searches: WebSearchRecord[] = [];
  const echo: Anthropic.ContentBlockParam[] = [];
  let texts: string[] = [];

  for (const block of message.content) {
    if (block.type === 'text') {
      texts.push(block.text);
      echo.push({ type: 'text', text: block.text });
    } else if (block.type === 'server_tool_use') {
      const input = SearchInput.safeParse(block.input);
      queries.set(block.id, input.success ? input.data.query : '');
      echo.push({ type: 'server_tool_use', id: block.id, name: block.name, input: block.input });
    } else if (block.type === 'web_search_tool_result') {
      searches.push({
        query: queries.get(block.tool_use_id) ?? '',
        resultPreview: previewSearchResults(block.content),
      });
      texts = [];
      echo.push({ type: 'web_search_tool_result', tool_use_id: block.tool_use_id, content: block.content });
    }
  }

  return {
    turn: { text: texts.join('').trim(), searches, paused: message.stop_reason === 'pause_turn' },
    echo,
  };
}

class ClaudeSearchSession implements SearchSession {
  private readonly messages: Anthropic.MessageParam[] = [];
  /** server_tool_use id → query, kept across paused turns */
  private readonly queries = new Map<string, string>();

  constructor(
    private readonly client: ClaudeClient,
    private readonly options: SearchSessionOptions,
  ) {}

  sendText(text: string): Promise<SearchTurn> {
    this.messages.push({ role: 'user', content: text });
    return this.exchange();
  }

  /** Re-sends the conversation as is; the API continues the paused assistant turn. */
  resume(): Promise<SearchTurn> {
    return this.exchange();
  }

  private async exchange(): Promise<SearchTurn> {
    const reply = await this.client.createMessage({
      system: this.options.system,
      tools: [webSearchTool(this.options.maxSearches)],
      messages: this.messages,
      ...(this.options.maxTokens ? { maxTokens: this.options.maxTokens } : {}),
    });
    const { turn, echo } = readSearchTurn(reply, this.queries);
    this.messages.push({ role: 'assistant', content: echo });
    log.debug('Search turn', {
      searches: turn.searches.length,
      paused: turn.paused,
      serverSearches: reply.usage.server_tool_use?.web_search_requests ?? 0,
    });
    return turn;
  }
}

class ClaudeEditingSession implements EditingSession {
  private readonly messages: Anthropic.MessageParam[] = [];

  constructor(
    private readonly client: ClaudeClient,
    private readonly options: EditingSessionOptions,
  ) {}

  sendText(text: string): Promise<ModelTurn> {
    return this.send({ role: 'user', content: text });
  }

  sendToolResults(results: ToolResult[]): Promise<ModelTurn> {
    const content = results.map((r): Anthropic.ToolResultBlockParam => ({
      type: 'tool_result',
      tool_use_id: r.toolCallId,
      content: r.content,
      ...(r.isError ? { is_error: true } : {}),
    }));
    return this.send({ role: 'user', content });
  }

  private async send(message: Anthropic.MessageParam): Promise<ModelTurn> {
    this.messages.push(message);
    const reply = await this.client.createMessage({
      system: this.options.system,
      tools: this.options.tools,
      messages: this.messages,
    });
    const { turn, echo } = readTurn(reply);
    this.messages.push({ role: 'assistant', content: echo });
    return turn;
  }
}

export class ClaudeClient implements TextModel, TokenCounter, EditingModel, SearchModel {
  private readonly anthropic: Anthropic;
  private readonly openai: OpenAI | null;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly fallbackModel: string;

  constructor(options: ClaudeClientOptions) {
    this.anthropic = new Anthropic({ apiKey: options.apiKey });
    this.openai = options.openaiApiKey ? new OpenAI({ apiKey: options.openaiApiKey }) : null;
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.fallbackModel = options.fallbackModel ?? 'gpt-4o';
  }

  /** Raw Messages API call with retry; failures surface as ModelAPIError. */
  async createMessage(params: {
    system?: string;
    tools?: Anthropic.ToolUnion[];
    messages: Anthropic.MessageParam[];
    maxTokens?: number;
  }): Promise<Anthropic.Message> {
    const startTime = Date.now();
    try {
      const res = await withRetry(
        () => this.anthropic.messages.create({
          model: this.model,
          max_tokens: params.maxTokens ?? this.maxTokens,
          messages: params.messages,
          ...(params.system ? { system: params.system } : {}),
          ...(params.tools ? { tools: params.tools } : {}),
        }),
        { ...RETRY_POLICY, isRetryable: isRetryableModelError, label: 'claude.messages' },
      );
      log.debug('Message complete', {
        stopReason: res.stop_reason,
        inputTokens: res.usage.input_tokens,
        outputTokens: res.usage.output_tokens,
        durationMs: Date.now() - startTime,
      });
      return res;
    } catch (err) {
      throw toModelError(err);
    }
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<Result<string>> {
    const maxTokens = options.maxTokens ?? this.maxTokens;
    try {
      const res = await this.createMessage({
        messages: [{ role: 'user', content: prompt }],
        maxTokens,
        ...(options.system ? { system: options.system } : {}),
      });
      return ok(readTurn(res).turn.text);
    } catch (err) {
      if (err instanceof ModelAPIError && (err.status ?? 0) >= 500 && this.openai) {
        log.warn('Anthropic unavailable — falling back to GPT', { model: this.fallbackModel });
        return this.completeWithOpenAI(prompt, options.system, maxTokens);
      }
      return fail(errorMessage(err));
    }
  }

  async countTokens(text: string): Promise<Result<number>> {
    try {
      const res = await this.anthropic.messages.countTokens({
        model: this.model,
        messages: [{ role: 'user', content: text }],
      });
      return ok(res.input_tokens);
    } catch (err) {
      return fail(errorMessage(err));
    }
  }

  startSession(options: EditingSessionOptions): EditingSession {
    return new ClaudeEditingSession(this, options);
  }

  startSearchSession(options: SearchSessionOptions): SearchSession {
    return new ClaudeSearchSession(this, options);
  }

  private async completeWithOpenAI(
    prompt: string,
    system: string | undefined,
    maxTokens: number,
  ): Promise<Result<string>> {
    if (!this.openai) return fail('OpenAI fallback not configured');
    try {
      const res = await this.openai.chat.completions.create({
        model: this.fallbackModel,
        max_tokens: maxTokens,
        messages: [
          ...(system ? [{ role: 'system' as const, content: system }] : []),
          { role: 'user' as const, content: prompt },
        ],
      });
      return ok(res.choices[0]?.message?.content ?? '');
    } catch (err) {
      return fail(errorMessage(err));
    }
  }
}

export function createClaudeClient(env: Env, apiKey: string): ClaudeClient {
  return new ClaudeClient({
    apiKey,
    model: env.CLAUDE_MODEL,
    maxTokens: env.CLAUDE_MAX_TOKENS,
    openaiApiKey: env.OPENAI_API_KEY,
    fallbackModel: env.OPENAI_FALLBACK_MODEL,
  });
}
