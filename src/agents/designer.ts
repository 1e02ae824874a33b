import type { LineDocument } from '../document/line-document.js';
import { EditorAgent, type AgentRunResult, type EditorAgentOptions, type RoleDefinition } from './editor-agent.js';

export const VISUAL_TAG = '[VISUAL]';

export const DESIGNER_ROLE: RoleDefinition = {
  id: 'designer',
  systemPrompt: `You are the cinematographer. Add visual direction to the existing script as blockquote lines:

> ${VISUAL_TAG} Shot type. Camera movement. Lighting. Color.

Place each line after the narrative moment it describes, 2-4 per scene. insert_after_pattern and find_section help you find the spot.
Do not change narrative, dialogue or [AUDIO] lines. To improve one of your earlier ${VISUAL_TAG} lines, replace it instead of adding a second one.

Call editing_complete with a summary of the visuals added.`,
};

export class DesignerAgent extends EditorAgent {
  constructor(options: Omit<EditorAgentOptions, 'role'>) {
    super({ ...options, role: DESIGNER_ROLE });
  }

  addVisuals(document: LineDocument, round: number): Promise<AgentRunResult> {
    return this.run(
      document,
      `Add or refine ${VISUAL_TAG} direction throughout Draft ${round}. Scenes without visual direction come first.`,
      round,
    );
  }
}
