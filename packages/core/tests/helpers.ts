import type { ChatModel, GenerateOptions, GenerateResult } from '../src/agents/types.js';
import type { ExecutionEvent } from '../src/events/types.js';

export type ScriptStep = GenerateResult | ((options: GenerateOptions) => GenerateResult);

/**
 * ChatModel that replays scripted results in order and records every request
 */
export class ScriptedModel implements ChatModel {
  readonly calls: GenerateOptions[] = [];
  private steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  async generate(options: GenerateOptions): Promise<GenerateResult> {
    this.calls.push(options);
    const step = this.steps.shift();
    if (!step) {
      throw new Error('ScriptedModel: no scripted result left');
    }
    return typeof step === 'function' ? step(options) : step;
  }
}

export async function collect(events: AsyncIterable<ExecutionEvent>): Promise<ExecutionEvent[]> {
  const collected: ExecutionEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

/**
 * Clock that advances one millisecond per reading
 */
export function tickingClock(start = 1_000): () => number {
  let current = start;
  return () => current++;
}
