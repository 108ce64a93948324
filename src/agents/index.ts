export {
  ARTIFACT_KEYS,
  STAGES,
  createStageAgents,
  type ArtifactKey,
  type StageDefinition,
  type StageOverrides,
} from './stages/index';
export { ORCHESTRATOR_NAME, createOrchestrator, type OrchestratorOptions } from './orchestrator';
