import type { LineDocument } from '../document/line-document.js';
import { EditorAgent, type AgentRunResult, type EditorAgentOptions, type RoleDefinition } from './editor-agent.js';

export const AUDIO_TAG = '[AUDIO]';

export const COMPOSER_ROLE: RoleDefinition = {
  id: 'composer',
  systemPrompt: `You are the composer and sound designer. Add audio direction to the existing script as blockquote lines:

> ${AUDIO_TAG} Music cue, ambience or sound effect, with mood and dynamics.

Place each line near the moment it scores, 2-4 per scene. Do not change narrative, dialogue or [VISUAL] lines.
To improve one of your earlier ${AUDIO_TAG} lines, replace it instead of adding a second one.

Call editing_complete with a summary of the audio added.`,
};

export class ComposerAgent extends EditorAgent {
  constructor(options: Omit<EditorAgentOptions, 'role'>) {
    super({ ...options, role: COMPOSER_ROLE });
  }

  addAudio(document: LineDocument, round: number): Promise<AgentRunResult> {
    return this.run(
      document,
      `Add or refine ${AUDIO_TAG} direction throughout Draft ${round}, including recurring musical themes.`,
      round,
    );
  }
}
