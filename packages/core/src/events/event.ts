import { v4 as uuidv4 } from 'uuid';
import type {
  EventActions,
  EventContent,
  EventPart,
  ExecutionEvent,
  FunctionCallPart,
  FunctionResponsePart,
} from './types';

/**
 * Parameters accepted by createEvent
 */
export interface CreateEventParams {
  invocationId: string;
  author: string;
  branch?: string;
  timestamp?: number;
  content?: EventContent;
  actions?: Partial<EventActions>;
  partial?: boolean;
  /** Overrides the derived terminal flag */
  final?: boolean;
}

/**
 * Generate a new invocation id for a user turn
 */
export function newInvocationId(): string {
  return `e-${uuidv4()}`;
}

/**
 * Function-call parts of an event
 */
export function getFunctionCalls(event: Pick<ExecutionEvent, 'content'>): FunctionCallPart[] {
  return (event.content?.parts ?? []).filter(
    (part): part is FunctionCallPart => part.kind === 'function-call'
  );
}

/**
 * Function-response parts of an event
 */
export function getFunctionResponses(
  event: Pick<ExecutionEvent, 'content'>
): FunctionResponsePart[] {
  return (event.content?.parts ?? []).filter(
    (part): part is FunctionResponsePart => part.kind === 'function-response'
  );
}

/**
 * Whether an event ends the turn.
 *
 * Skip-summarization responses are always terminal. Otherwise an event is
 * terminal when it is complete and neither asks for nor returns a call.
 */
export function isFinalResponse(
  event: Pick<ExecutionEvent, 'content' | 'actions' | 'partial'>
): boolean {
  if (event.actions.skipSummarization) {
    return true;
  }
  return (
    getFunctionCalls(event).length === 0 &&
    getFunctionResponses(event).length === 0 &&
    !event.partial
  );
}

/**
 * Build an immutable execution event
 */
export function createEvent(params: CreateEventParams): ExecutionEvent {
  const actions: EventActions = {
    stateDelta: {},
    ...params.actions,
  };

  const event = {
    id: uuidv4(),
    invocationId: params.invocationId,
    author: params.author,
    branch: params.branch,
    timestamp: params.timestamp ?? Date.now(),
    content: params.content,
    actions,
    partial: params.partial,
  };

  return Object.freeze({
    ...event,
    final: params.final ?? isFinalResponse(event),
  });
}

/**
 * Content holding a single text part
 */
export function textContent(text: string, role: EventContent['role'] = 'model'): EventContent {
  return { role, parts: [{ kind: 'text', text }] };
}

/**
 * Content holding the given parts
 */
export function partsContent(parts: EventPart[], role: EventContent['role'] = 'model'): EventContent {
  return { role, parts };
}
