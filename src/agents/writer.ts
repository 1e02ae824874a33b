/**
 * Writer — creates the first draft and revises it from audience feedback.
 */
import type { LineDocument } from '../document/line-document.js';
import { EditorAgent, type AgentRunResult, type EditorAgentOptions, type RoleDefinition } from './editor-agent.js';

export const WRITER_ROLE: RoleDefinition = {
  id: 'writer',
  systemPrompt: `You are the screenwriter for a short film script kept in a shared markdown document.

Make targeted edits. When you change existing text, use replace_lines (or delete_lines then insert_lines) so the old text is removed; never leave the old and new versions side by side.
Keep any [VISUAL] and [AUDIO] lines other roles have added.

Document layout:
# <TITLE>
**Genre:** / **Tone:** / **Estimated Runtime:** / **Draft:** N of M
---
## STORY OVERVIEW (logline, theme, arc, characters)
---
## SCENE N: <Title>
**Location:** / **Time:**
narrative and dialogue as **NAME:** "line"
---
## PRODUCTION NOTES

Call editing_complete with a short summary when done.`,
};

export interface WriterOptions extends Omit<EditorAgentOptions, 'role'> {
  targetRuntimeMinutes: number;
}

const SURPRISE_REQUEST = 'Create an original story. Pick the genre and concept yourself.';

export class WriterAgent extends EditorAgent {
  private readonly targetRuntimeMinutes: number;

  constructor({ targetRuntimeMinutes, ...options }: WriterOptions) {
    super({ ...options, role: WRITER_ROLE });
    this.targetRuntimeMinutes = targetRuntimeMinutes;
  }

  createInitialDraft(
    document: LineDocument,
    userPrompt: string,
    research: string,
    round: number,
    totalDrafts: number,
  ): Promise<AgentRunResult> {
    const brief = research ? `\nResearch Brief:\n${research}\n` : '';
    const task = `Create the FIRST DRAFT of a ~${this.targetRuntimeMinutes} minute short film.

User Request: ${userPrompt || SURPRISE_REQUEST}
${brief}
Draft ${round} of ${totalDrafts}.

1. Start with a STORY OVERVIEW section.
2. Write 4-8 scenes with narrative and dialogue.
3. Do not add [VISUAL] or [AUDIO] lines yourself.
4. End with PRODUCTION NOTES including runtime estimates.`;

    return this.run(document, task, round);
  }

  reviseDraft(document: LineDocument, feedback: string, round: number, totalDrafts: number): Promise<AgentRunResult> {
    const task = `Revise the draft based on this audience feedback:

${feedback}

This is Draft ${round} of ${totalDrafts}.

1. Address the most important issues first.
2. Leave sections that work alone.
3. Keep existing [VISUAL] and [AUDIO] lines.
4. Update the Draft number in the metadata.`;

    return this.run(document, task, round);
  }
}
