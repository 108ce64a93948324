export {
  ExecutionTracker,
  FALLBACK_RESPONSE,
  emptyReport,
  errorResponse,
  findMostActiveAgent,
  trackExecution,
  type ExecutionTrackerOptions,
} from './ExecutionTracker';
export { NO_STATS_MESSAGE, formatLlmCallStats, formatTimestamp, formatTurnFooter } from './format';
export type {
  AgentCallRecord,
  AgentCallStats,
  EventFlowEntry,
  ExecutionFlowEntry,
  LlmCallRecord,
  TransferFlowEntry,
  TurnReport,
  TurnSummary,
} from './types';
