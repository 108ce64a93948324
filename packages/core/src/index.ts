/**
 * @contentflow/core
 *
 * Agent runtime for the content pipeline: execution events, LLM and router
 * agents, the turn runner and the in-memory session service. Model access
 * goes through the Vercel AI SDK.
 */

// Agents
export { BaseAgent, type AgentDependencies } from './agents/BaseAgent';
export { LlmAgent, renderState } from './agents/LlmAgent';
export {
  RouterAgent,
  UnknownAgentError,
  TRANSFER_TOOL_NAME,
  type DelegationMode,
  type RouterConfig,
} from './agents/RouterAgent';
export type {
  AgentConfig,
  ChatModel,
  GenerateOptions,
  GenerateResult,
  InvocationContext,
  Message,
  ModelConfig,
  ModelToolCall,
  PipelineEvents,
} from './agents/types';

// Events
export {
  createEvent,
  getFunctionCalls,
  getFunctionResponses,
  isFinalResponse,
  newInvocationId,
  partsContent,
  textContent,
  type CreateEventParams,
} from './events/event';
export { extractEventText, unwrapFunctionResponse } from './events/extract';
export type {
  EventActions,
  EventContent,
  EventPart,
  ExecutionEvent,
  FunctionCallPart,
  FunctionResponsePart,
  TextPart,
} from './events/types';

// Runner
export { Runner, type RunnerDependencies, type RunParams } from './runner/Runner';

// Sessions
export {
  InMemorySessionService,
  type CreateSessionParams,
  type SessionServiceOptions,
} from './sessions/InMemorySessionService';
export { SessionAlreadyExistsError, SessionNotFoundError } from './sessions/errors';
export type { Session, SessionKey, SessionState } from './sessions/types';

// Core - Model
export { ModelAdapter } from './core/model/ModelAdapter';
export {
  ModelFactory,
  ProviderNotAvailableError,
  InvalidModelConfigError,
  type ProviderType,
} from './core/model/ModelFactory';

// Utils
export { EventBus } from './utils/event-bus';
export {
  Logger,
  createJsonLogger,
  createLogger,
  isLogLevel,
  setDefaultLogLevel,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './utils/logger';

// Config
export { loadEnvFile, moduleDir } from './config/env';
export {
  modelConfigSchema,
  pipelineConfigSchema,
  parseConfig,
  validatePipelineConfig,
  type ModelConfigType,
  type PipelineConfig,
  type PipelineConfigInput,
} from './config/schema';
