import { LlmAgent, type AgentDependencies, type AgentConfig } from '@contentflow/core';
import {
  DRAFT_INSTRUCTION,
  IDEATE_INSTRUCTION,
  OUTLINE_INSTRUCTION,
  PERSONA_FEEDBACK_INSTRUCTION,
  SEO_INSTRUCTION,
} from './prompts';

/**
 * Artifact keys in pipeline order
 */
export const ARTIFACT_KEYS = [
  'generated_ideas',
  'content_outline',
  'content_draft',
  'expert_feedback',
  'seo_optimized_content',
] as const;

export type ArtifactKey = (typeof ARTIFACT_KEYS)[number];

export interface StageDefinition extends AgentConfig {
  outputKey: ArtifactKey;
}

/**
 * The content stages, in pipeline order
 */
export const STAGES: readonly StageDefinition[] = [
  {
    name: 'IdeateAgent',
    description: 'Generates creative ideas from a topic or rough concept',
    instruction: IDEATE_INSTRUCTION,
    outputKey: 'generated_ideas',
  },
  {
    name: 'OutlineAgent',
    description: 'Creates a structured outline from an idea or the generated ideas',
    instruction: OUTLINE_INSTRUCTION,
    outputKey: 'content_outline',
  },
  {
    name: 'DraftAgent',
    description: 'Writes a full draft from the outline, or revises the existing draft',
    instruction: DRAFT_INSTRUCTION,
    outputKey: 'content_draft',
  },
  {
    name: 'PersonaFeedbackAgent',
    description: 'Reviews content as a domain expert and holds expert conversations',
    instruction: PERSONA_FEEDBACK_INSTRUCTION,
    outputKey: 'expert_feedback',
  },
  {
    name: 'SEOAgent',
    description: 'Optimizes the draft for search engines while keeping it readable',
    instruction: SEO_INSTRUCTION,
    outputKey: 'seo_optimized_content',
  },
];

/**
 * Per-stage overrides applied on top of the stage definitions
 */
export type StageOverrides = Partial<Record<string, Pick<AgentConfig, 'temperature' | 'maxTokens'>>>;

/**
 * Build one LlmAgent per stage, in pipeline order
 */
export function createStageAgents(
  dependencies: AgentDependencies,
  overrides: StageOverrides = {}
): LlmAgent[] {
  return STAGES.map(
    (stage) =>
      new LlmAgent(
        { ...dependencies, logger: dependencies.logger?.child(stage.name) },
        { ...stage, ...overrides[stage.name] }
      )
  );
}
