import {
  createEvent,
  partsContent,
  textContent,
  type ChatModel,
  type EventPart,
  type ExecutionEvent,
  type GenerateOptions,
  type GenerateResult,
} from '@contentflow/core';

/**
 * ChatModel that answers each request through a callback
 */
export class FakeModel implements ChatModel {
  readonly calls: GenerateOptions[] = [];
  private respond: (options: GenerateOptions, callIndex: number) => GenerateResult;

  constructor(respond: (options: GenerateOptions, callIndex: number) => GenerateResult) {
    this.respond = respond;
  }

  async generate(options: GenerateOptions): Promise<GenerateResult> {
    this.calls.push(options);
    return this.respond(options, this.calls.length - 1);
  }
}

interface EventOptions {
  final?: boolean;
  timestamp?: number;
  branch?: string;
  transferToAgent?: string;
}

export function textEvent(author: string, text: string, options: EventOptions = {}): ExecutionEvent {
  return createEvent({
    invocationId: 'e-test',
    author,
    branch: options.branch,
    timestamp: options.timestamp,
    content: textContent(text),
    actions: { transferToAgent: options.transferToAgent },
    final: options.final ?? false,
  });
}

export function partsEvent(author: string, parts: EventPart[], options: EventOptions = {}): ExecutionEvent {
  return createEvent({
    invocationId: 'e-test',
    author,
    branch: options.branch,
    timestamp: options.timestamp,
    content: partsContent(parts),
    actions: { transferToAgent: options.transferToAgent },
    final: options.final,
  });
}

export async function* streamOf(events: ExecutionEvent[]): AsyncGenerator<ExecutionEvent> {
  for (const event of events) {
    yield event;
  }
}

/**
 * Stream that yields the given events and then fails
 */
export async function* failingStream(
  events: ExecutionEvent[],
  message: string
): AsyncGenerator<ExecutionEvent> {
  yield* events;
  throw new Error(message);
}
