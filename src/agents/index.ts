import type { EditingModel } from '../ai/types.js';
import type { ContextBudgetTracker } from '../context/budget-tracker.js';
import { CheckerAgent } from './checker.js';
import { ComposerAgent } from './composer.js';
import { DesignerAgent } from './designer.js';
import { WriterAgent } from './writer.js';

export interface RoleAgents {
  writer: WriterAgent;
  designer: DesignerAgent;
  composer: ComposerAgent;
  checker: CheckerAgent;
}

export interface RoleAgentOptions {
  model: EditingModel;
  tracker: ContextBudgetTracker;
  maxIterations: number;
  targetRuntimeMinutes: number;
}

/** All editing roles share one model client and one budget tracker. */
export function createRoleAgents({ targetRuntimeMinutes, ...shared }: RoleAgentOptions): RoleAgents {
  return {
    writer: new WriterAgent({ ...shared, targetRuntimeMinutes }),
    designer: new DesignerAgent(shared),
    composer: new ComposerAgent(shared),
    checker: new CheckerAgent(shared),
  };
}
