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
} from '../../src/ai/types.js';
import type { DocumentStorage } from '../../src/document/storage.js';
import { fail, ok, type Result } from '../../src/utils/result.js';

let callCounter = 0;

export function call(name: string, input: unknown = {}): ToolCall {
  callCounter++;
  return { id: `call_${callCounter}`, name, input };
}

export function toolTurn(...toolCalls: ToolCall[]): ModelTurn {
  return { text: '', toolCalls, stopReason: 'tool_use' };
}

export function textTurn(text: string): ModelTurn {
  return { text, toolCalls: [], stopReason: 'end_turn' };
}

export function complete(summary: string): ModelTurn {
  return toolTurn(call('editing_complete', { summary }));
}

/** Replays scripted turns; an exhausted script ends with an empty text reply. */
export class ScriptedSession implements EditingSession {
  readonly sentTexts: string[] = [];
  readonly sentResults: ToolResult[][] = [];

  constructor(
    readonly options: EditingSessionOptions,
    private readonly turns: Array<ModelTurn | Error>,
  ) {}

  async sendText(text: string): Promise<ModelTurn> {
    this.sentTexts.push(text);
    return this.next();
  }

  async sendToolResults(results: ToolResult[]): Promise<ModelTurn> {
    this.sentResults.push(results);
    return this.next();
  }

  private next(): ModelTurn {
    const turn = this.turns.shift() ?? textTurn('');
    if (turn instanceof Error) throw turn;
    return turn;
  }
}

/**
 * Hands out one script per session. Scripts are queued per system prompt,
 * so several roles can share one model.
 */
export class ScriptedEditingModel implements EditingModel {
  readonly sessions: ScriptedSession[] = [];
  private readonly scripts = new Map<string, Array<Array<ModelTurn | Error>>>();

  script(systemPrompt: string, ...turns: Array<ModelTurn | Error>): this {
    const queue = this.scripts.get(systemPrompt) ?? [];
    queue.push(turns);
    this.scripts.set(systemPrompt, queue);
    return this;
  }

  startSession(options: EditingSessionOptions): ScriptedSession {
    const turns = this.scripts.get(options.system)?.shift() ?? [];
    const session = new ScriptedSession(options, turns);
    this.sessions.push(session);
    return session;
  }
}

export function searched(query: string, resultPreview = `Results for ${query}`): WebSearchRecord {
  return { query, resultPreview };
}

export function searchTurn(text: string, searches: WebSearchRecord[] = [], paused = false): SearchTurn {
  return { text, searches, paused };
}

export function pausedTurn(...searches: WebSearchRecord[]): SearchTurn {
  return searchTurn('', searches, true);
}

/** Replays scripted search turns; an exhausted script ends with an empty reply. */
export class ScriptedSearchSession implements SearchSession {
  readonly sentTexts: string[] = [];
  resumes = 0;

  constructor(
    readonly options: SearchSessionOptions,
    private readonly turns: Array<SearchTurn | Error>,
  ) {}

  async sendText(text: string): Promise<SearchTurn> {
    this.sentTexts.push(text);
    return this.next();
  }

  async resume(): Promise<SearchTurn> {
    this.resumes++;
    return this.next();
  }

  private next(): SearchTurn {
    const turn = this.turns.shift() ?? searchTurn('');
    if (turn instanceof Error) throw turn;
    return turn;
  }
}

export class ScriptedSearchModel implements SearchModel {
  readonly sessions: ScriptedSearchSession[] = [];
  private readonly turns: Array<SearchTurn | Error>;

  constructor(...turns: Array<SearchTurn | Error>) {
    this.turns = turns;
  }

  startSearchSession(options: SearchSessionOptions): ScriptedSearchSession {
    const session = new ScriptedSearchSession(options, this.turns);
    this.sessions.push(session);
    return session;
  }
}

export class FakeTextModel implements TextModel {
  readonly prompts: Array<{ prompt: string; options: CompletionOptions | undefined }> = [];

  constructor(private readonly replies: Array<Result<string>>) {}

  static replying(...texts: string[]): FakeTextModel {
    return new FakeTextModel(texts.map((t) => ok(t)));
  }

  static failing(error: string): FakeTextModel {
    return new FakeTextModel([fail(error)]);
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<Result<string>> {
    this.prompts.push({ prompt, options });
    return this.replies.shift() ?? fail('no scripted reply');
  }
}

export class FixedTokenCounter implements TokenCounter {
  constructor(private readonly result: Result<number>) {}

  async countTokens(): Promise<Result<number>> {
    return this.result;
  }
}

export class FailingStorage implements DocumentStorage {
  readonly location = 'memory://failing';

  constructor(private readonly message: string) {}

  async load(): Promise<string | null> {
    return null;
  }

  async save(): Promise<void> {
    throw new Error(this.message);
  }
}
