import type { SessionState } from '@contentflow/core';

export type WorkflowStep =
  | 'starting'
  | 'ideas_generated'
  | 'outline_ready'
  | 'draft_completed'
  | 'feedback_received'
  | 'completed';

export interface WorkflowStatus {
  ideasGenerated: boolean;
  outlineCreated: boolean;
  draftWritten: boolean;
  feedbackReceived: boolean;
  seoOptimized: boolean;
  currentStep: WorkflowStep;
  /** Artifact keys present, in store order */
  availableData: string[];
}

/**
 * Latest step first; the first present artifact decides the step
 */
const STEP_PRECEDENCE: ReadonlyArray<readonly [string, WorkflowStep]> = [
  ['seo_optimized_content', 'completed'],
  ['expert_feedback', 'feedback_received'],
  ['content_draft', 'draft_completed'],
  ['content_outline', 'outline_ready'],
  ['generated_ideas', 'ideas_generated'],
];

function has(state: SessionState, key: string): boolean {
  return Object.hasOwn(state, key);
}

export function determineCurrentStep(state: SessionState): WorkflowStep {
  const match = STEP_PRECEDENCE.find(([key]) => has(state, key));
  return match ? match[1] : 'starting';
}

/**
 * Project the artifact store onto pipeline progress
 */
export function getWorkflowStatus(state: SessionState): WorkflowStatus {
  return {
    ideasGenerated: has(state, 'generated_ideas'),
    outlineCreated: has(state, 'content_outline'),
    draftWritten: has(state, 'content_draft'),
    feedbackReceived: has(state, 'expert_feedback'),
    seoOptimized: has(state, 'seo_optimized_content'),
    currentStep: determineCurrentStep(state),
    availableData: Object.keys(state),
  };
}
