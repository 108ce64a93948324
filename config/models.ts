import { UnknownAgentError } from '@contentflow/core';
import { config } from './env';

/**
 * Sampling settings of one agent
 */
export interface AgentModelSettings {
  temperature: number;
  maxTokens: number;
}

/**
 * Per-agent model settings
 */
export const modelConfigs: Record<string, AgentModelSettings> = {
  // Routing wants stable, low-variance tool choices
  OrchestratorAgent: { temperature: 0.1, maxTokens: 1000 },
  IdeateAgent: { temperature: 0.9, maxTokens: config.model.maxTokens },
  OutlineAgent: { temperature: 0.5, maxTokens: config.model.maxTokens },
  DraftAgent: { temperature: config.model.temperature, maxTokens: config.model.maxTokens },
  PersonaFeedbackAgent: { temperature: 0.5, maxTokens: config.model.maxTokens },
  SEOAgent: { temperature: 0.3, maxTokens: config.model.maxTokens },
};

/**
 * Model settings of an agent
 */
export function getModelConfig(agentName: string): AgentModelSettings {
  const settings = modelConfigs[agentName];
  if (!settings) {
    throw new UnknownAgentError(agentName);
  }
  return settings;
}
