/**
 * Execution event types
 *
 * Every step an agent takes during a turn is recorded as an immutable
 * ExecutionEvent. The runner yields them in order; consumers such as the
 * execution tracker only read them.
 */

/**
 * Plain text produced by a model or typed by the user
 */
export interface TextPart {
  kind: 'text';
  text: string;
}

/**
 * A model's request to invoke a tool (or a delegated stage)
 */
export interface FunctionCallPart {
  kind: 'function-call';
  id: string;
  name: string;
  args: Record<string, unknown>;
}

/**
 * The value a tool call returned
 */
export interface FunctionResponsePart {
  kind: 'function-response';
  id: string;
  name: string;
  response: unknown;
}

export type EventPart = TextPart | FunctionCallPart | FunctionResponsePart;

export interface EventContent {
  role: 'user' | 'model';
  parts: EventPart[];
}

/**
 * Side effects attached to an event
 */
export interface EventActions {
  /** Artifact writes applied to the session state when the event is appended */
  stateDelta: Record<string, unknown>;
  /** Hand the rest of the turn to another agent */
  transferToAgent?: string;
  /** The function response is returned to the user as-is */
  skipSummarization?: boolean;
}

export interface ExecutionEvent {
  readonly id: string;
  readonly invocationId: string;
  /** Name of the producing agent, or "user" */
  readonly author: string;
  /** Dotted path of nested agent execution, e.g. "OrchestratorAgent.DraftAgent" */
  readonly branch?: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly content?: EventContent;
  readonly actions: EventActions;
  /** Streaming fragment, never appended to the session */
  readonly partial?: boolean;
  /** Terminal event of the turn */
  readonly final: boolean;
}
