import { createEvent, textContent } from '../events/event';
import type { ExecutionEvent } from '../events/types';
import type { SessionState } from '../sessions/types';
import { BaseAgent } from './BaseAgent';
import type { InvocationContext } from './types';

function renderArtifact(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value, null, 2);
}

/**
 * Render the artifact store for a system prompt
 */
export function renderState(state: SessionState): string {
  const keys = Object.keys(state);
  if (keys.length === 0) {
    return 'No artifacts have been produced yet.';
  }
  return keys.map((key) => `## ${key}\n${renderArtifact(state[key])}`).join('\n\n');
}

/**
 * Single-call LLM agent
 *
 * Answers from its instruction plus the current artifacts and yields one
 * text event. A non-empty answer is written to the agent's output key.
 */
export class LlmAgent extends BaseAgent {
  async *runAsync(ctx: InvocationContext): AsyncGenerator<ExecutionEvent, void, undefined> {
    this.logger?.debug(`${this.name} generating`, { branch: ctx.branch });

    const result = await this.model.generate({
      messages: this.buildMessages(ctx),
      systemPrompt: this.buildSystemPrompt(ctx.session.state),
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    });

    const stateDelta: Record<string, unknown> = {};
    if (this.outputKey && result.text) {
      stateDelta[this.outputKey] = result.text;
    }

    yield createEvent({
      invocationId: ctx.invocationId,
      author: this.name,
      branch: ctx.branch,
      timestamp: ctx.now(),
      content: textContent(result.text),
      actions: { stateDelta },
    });
  }

  protected buildSystemPrompt(state: SessionState): string {
    return `${this.config.instruction}\n\n# Current artifacts\n\n${renderState(state)}`;
  }
}
