import { tool, type ModelMessage, type Tool } from 'ai';
import { z } from 'zod';
import { createEvent, partsContent, textContent } from '../events/event';
import { extractEventText } from '../events/extract';
import type { EventPart, ExecutionEvent, FunctionCallPart } from '../events/types';
import { BaseAgent, type AgentDependencies } from './BaseAgent';
import { renderState } from './LlmAgent';
import type { AgentConfig, InvocationContext, ModelToolCall } from './types';

export const TRANSFER_TOOL_NAME = 'transfer_to_agent';

/**
 * How the router hands a request to a sub-agent
 *
 * - `tool`: each sub-agent is a tool; its output returns to the router as a
 *   function response.
 * - `transfer`: the router transfers the turn; the sub-agent answers the
 *   user directly.
 */
export type DelegationMode = 'tool' | 'transfer';

export interface RouterConfig extends AgentConfig {
  mode?: DelegationMode;
  /** Router model calls allowed per turn */
  maxSteps?: number;
  /** Return a sub-agent's output as the final response (tool mode) */
  skipSummarization?: boolean;
}

/**
 * Error thrown when the router names an agent it does not know
 */
export class UnknownAgentError extends Error {
  readonly agentName: string;

  constructor(agentName: string) {
    super(`Unknown agent: ${agentName}`);
    this.name = 'UnknownAgentError';
    this.agentName = agentName;
  }
}

function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

function toCallPart(call: ModelToolCall): FunctionCallPart {
  return { kind: 'function-call', id: call.toolCallId, name: call.toolName, args: call.args };
}

/**
 * LLM agent that routes each request to one of its sub-agents
 */
export class RouterAgent extends BaseAgent {
  private readonly subAgents: BaseAgent[];
  private readonly mode: DelegationMode;
  private readonly maxSteps: number;
  private readonly skipSummarization: boolean;

  constructor(dependencies: AgentDependencies, config: RouterConfig, subAgents: BaseAgent[]) {
    super(dependencies, config);
    this.subAgents = subAgents;
    this.mode = config.mode ?? 'tool';
    this.maxSteps = config.maxSteps ?? 5;
    this.skipSummarization = config.skipSummarization ?? true;
  }

  findAgent(name: string): BaseAgent {
    const agent = this.subAgents.find((candidate) => candidate.name === name);
    if (!agent) {
      throw new UnknownAgentError(name);
    }
    return agent;
  }

  async *runAsync(ctx: InvocationContext): AsyncGenerator<ExecutionEvent, void, undefined> {
    const messages = this.buildMessages(ctx);
    const tools = this.mode === 'tool' ? this.buildAgentTools() : this.buildTransferTool();

    for (let step = 0; step < this.maxSteps; step++) {
      const result = await this.model.generate({
        messages,
        systemPrompt: this.buildSystemPrompt(ctx),
        tools,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
      });
      const calls = result.toolCalls ?? [];

      if (calls.length === 0) {
        yield this.event(ctx, { content: textContent(result.text) });
        return;
      }

      const parts: EventPart[] = result.text ? [{ kind: 'text', text: result.text }] : [];
      yield this.event(ctx, { content: partsContent([...parts, ...calls.map(toCallPart)]) });

      if (this.mode === 'transfer') {
        yield* this.transfer(ctx, calls[0]);
        return;
      }

      messages.push({
        role: 'assistant',
        content: calls.map((call) => ({
          type: 'tool-call',
          toolCallId: call.toolCallId,
          toolName: call.toolName,
          input: call.args,
        })),
      });

      for (const [index, call] of calls.entries()) {
        const agent = this.findAgent(call.toolName);
        const request = stringArg(call.args, 'request') ?? ctx.userMessage;
        let output = '';

        for await (const event of agent.runAsync({
          ...ctx,
          branch: this.childBranch(ctx, agent),
          userMessage: request,
        })) {
          const text = extractEventText(event.content?.parts);
          if (text) {
            output = text;
          }
          // Sub-agent events never end the router's turn
          yield Object.freeze({ ...event, final: false });
        }

        const isLast = index === calls.length - 1;
        yield this.event(ctx, {
          content: partsContent(
            [{ kind: 'function-response', id: call.toolCallId, name: call.toolName, response: { result: output } }],
            'user'
          ),
          skipSummarization: this.skipSummarization && isLast,
        });

        messages.push(this.toolResultMessage(call, output));
      }

      if (this.skipSummarization) {
        return;
      }
    }

    this.logger?.warn(`${this.name} reached the step limit without a final answer`, {
      maxSteps: this.maxSteps,
    });
  }

  /**
   * Hand the rest of the turn to the agent named in a transfer call
   */
  private async *transfer(
    ctx: InvocationContext,
    call: ModelToolCall
  ): AsyncGenerator<ExecutionEvent, void, undefined> {
    const agentName = stringArg(call.args, 'agentName') ?? '';
    const agent = this.findAgent(agentName);

    yield this.event(ctx, {
      content: partsContent(
        [{ kind: 'function-response', id: call.toolCallId, name: call.toolName, response: { result: `Transferred to ${agent.name}` } }],
        'user'
      ),
      transferToAgent: agent.name,
    });

    yield* agent.runAsync(ctx);
  }

  private event(
    ctx: InvocationContext,
    params: {
      content: ExecutionEvent['content'];
      transferToAgent?: string;
      skipSummarization?: boolean;
    }
  ): ExecutionEvent {
    return createEvent({
      invocationId: ctx.invocationId,
      author: this.name,
      branch: ctx.branch,
      timestamp: ctx.now(),
      content: params.content,
      actions: {
        transferToAgent: params.transferToAgent,
        skipSummarization: params.skipSummarization || undefined,
      },
    });
  }

  private toolResultMessage(call: ModelToolCall, output: string): ModelMessage {
    return {
      role: 'tool',
      content: [
        {
          type: 'tool-result',
          toolCallId: call.toolCallId,
          toolName: call.toolName,
          output: { type: 'text', value: output },
        },
      ],
    };
  }

  private buildAgentTools(): Record<string, Tool> {
    const tools: Record<string, Tool> = {};
    for (const agent of this.subAgents) {
      tools[agent.name] = tool({
        description: agent.description,
        inputSchema: z.object({
          request: z.string().describe('What the agent should do, with any context it needs'),
        }),
      });
    }
    return tools;
  }

  private buildTransferTool(): Record<string, Tool> {
    return {
      [TRANSFER_TOOL_NAME]: tool({
        description: 'Transfer the conversation to another agent',
        inputSchema: z.object({
          agentName: z.string().describe(`One of: ${this.subAgents.map((agent) => agent.name).join(', ')}`),
        }),
      }),
    };
  }

  protected buildSystemPrompt(ctx: InvocationContext): string {
    const roster = this.subAgents
      .map((agent) => `- ${agent.name}: ${agent.description}`)
      .join('\n');
    return [
      this.config.instruction,
      `# Available agents\n\n${roster}`,
      `# Current artifacts\n\n${renderState(ctx.session.state)}`,
    ].join('\n\n');
  }
}
