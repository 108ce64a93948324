import {
  RouterAgent,
  type AgentDependencies,
  type BaseAgent,
  type DelegationMode,
} from '@contentflow/core';
import { ORCHESTRATOR_INSTRUCTION } from './stages/prompts';

export const ORCHESTRATOR_NAME = 'OrchestratorAgent';

export interface OrchestratorOptions {
  mode?: DelegationMode;
  maxSteps?: number;
  skipSummarization?: boolean;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Router over the content stages
 */
export function createOrchestrator(
  dependencies: AgentDependencies,
  stages: BaseAgent[],
  options: OrchestratorOptions = {}
): RouterAgent {
  return new RouterAgent(
    { ...dependencies, logger: dependencies.logger?.child(ORCHESTRATOR_NAME) },
    {
      name: ORCHESTRATOR_NAME,
      description: 'Routes requests to the content creation stages',
      instruction: ORCHESTRATOR_INSTRUCTION,
      ...options,
    },
    stages
  );
}
