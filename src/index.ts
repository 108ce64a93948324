/**
 * contentflow
 *
 * Multi-agent content creation pipeline
 * - OrchestratorAgent routes each request to a stage
 * - Stages: ideas → outline → draft → feedback → SEO, each writing one artifact
 * - Every turn is tracked into a TurnReport
 */

export * from './agents/index';
export * from './tracking/index';
export { getWorkflowStatus, determineCurrentStep, type WorkflowStatus, type WorkflowStep } from './workflow/status';
export {
  SessionManager,
  DEFAULT_TEST_MESSAGE,
  TEST_USER_ID,
  type SessionManagerDependencies,
} from './session/SessionManager';
export { createPipeline, type ContentPipeline, type PipelineOptions } from './pipeline/createPipeline';
