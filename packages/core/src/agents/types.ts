import type { FinishReason, ModelMessage, Tool } from 'ai';
import type { ExecutionEvent } from '../events/types';
import type { Session } from '../sessions/types';
import type { Logger } from '../utils/logger';

/**
 * Message in a session's conversation history
 */
export interface Message {
  role: 'user' | 'assistant';
  content: string;
  timestamp: Date;
  /** Agent that produced an assistant message */
  author?: string;
}

/**
 * Model configuration
 */
export interface ModelConfig {
  /** Model provider */
  provider: 'google' | 'openai' | 'anthropic';
  /** Model name/identifier */
  name: string;
  /** Custom base URL for API */
  baseURL?: string;
  /** API key (defaults to environment variable) */
  apiKey?: string;
  /** Sampling temperature */
  temperature?: number;
  /** Maximum output tokens */
  maxTokens?: number;
}

/**
 * Options for model generation
 */
export interface GenerateOptions {
  /** Messages to send */
  messages: ModelMessage[];
  /** System prompt */
  systemPrompt?: string;
  /** Tools the model may call; none of them is executed by the model layer */
  tools?: Record<string, Tool>;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Temperature for randomness */
  temperature?: number;
}

/**
 * A tool call requested by the model
 */
export interface ModelToolCall {
  toolCallId: string;
  toolName: string;
  args: Record<string, unknown>;
}

/**
 * Result from model generation
 */
export interface GenerateResult {
  /** Generated text content */
  text: string;
  /** Tool calls made by the model */
  toolCalls?: ModelToolCall[];
  /** Token usage information */
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason?: FinishReason;
}

/**
 * Anything that can answer a generation request.
 * ModelAdapter is the production implementation.
 */
export interface ChatModel {
  generate(options: GenerateOptions): Promise<GenerateResult>;
}

/**
 * Agent configuration
 */
export interface AgentConfig {
  /** Unique agent name, also the event author */
  name: string;
  /** One-line description shown to the router */
  description: string;
  /** System instruction */
  instruction: string;
  /** Session state key the agent's final text is written to */
  outputKey?: string;
  /** Sampling temperature override */
  temperature?: number;
  /** Output token limit override */
  maxTokens?: number;
}

/**
 * Per-invocation context handed down the agent tree
 */
export interface InvocationContext {
  invocationId: string;
  /**
   * Session as of the start of the turn. History excludes the current
   * message; the runner applies each event's state delta to `state`.
   */
  session: Session;
  /** The request for the agent being run */
  userMessage: string;
  /** Branch of the agent being run; undefined for the root agent */
  branch?: string;
  /** Clock used for event timestamps */
  now: () => number;
  logger?: Logger;
}

/**
 * Events published on the EventBus
 */
export interface PipelineEvents {
  'session:created': { userId: string; sessionId: string };
  'session:deleted': { userId: string; sessionId: string };
  'turn:start': { invocationId: string; userId: string; sessionId: string; message: string };
  'agent:event': { event: ExecutionEvent };
  'turn:complete': {
    invocationId: string;
    userId: string;
    sessionId: string;
    response: string | null;
  };
  'turn:error': { invocationId: string; userId: string; sessionId: string; error: Error };
}
