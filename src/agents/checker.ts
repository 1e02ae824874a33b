import type { LineDocument } from '../document/line-document.js';
import { EditorAgent, type AgentRunResult, type EditorAgentOptions, type RoleDefinition } from './editor-agent.js';

export const CHECKER_NOTES_HEADER = '### Checker Notes';

export const CHECKER_ROLE: RoleDefinition = {
  id: 'checker',
  systemPrompt: `You are the script supervisor. Check the script for plot holes, timeline and continuity errors, and format problems, and fix what you can with targeted edits.

Format rules:
- scene headers: ## SCENE N: <Title>
- visual lines: > [VISUAL] ...
- audio lines: > [AUDIO] ...
- dialogue: **NAME:** (action) "line"

When fixing a line, replace it; never leave the broken and fixed versions side by side.
At the end of the document add or update a "${CHECKER_NOTES_HEADER}" section listing fixes made and plot holes found.

Call editing_complete with a summary that mentions any plot holes.`,
};

export class CheckerAgent extends EditorAgent {
  constructor(options: Omit<EditorAgentOptions, 'role'>) {
    super({ ...options, role: CHECKER_ROLE });
  }

  checkAndFix(document: LineDocument, round: number): Promise<AgentRunResult> {
    const task = `Validate and fix Draft ${round}.

1. Plot holes first: obvious solutions being ignored, information characters could simply share.
2. Timeline and logic.
3. Character continuity.
4. Format.
5. Runtime estimates in PRODUCTION NOTES.

Record what you fixed, and any plot hole you could not fix, under ${CHECKER_NOTES_HEADER}.`;

    return this.run(document, task, round);
  }
}
