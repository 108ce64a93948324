import type { ModelMessage } from 'ai';
import type { ExecutionEvent } from '../events/types';
import type { Logger } from '../utils/logger';
import type { AgentConfig, ChatModel, InvocationContext, Message } from './types';

/**
 * Base agent dependencies - injected via constructor
 */
export interface AgentDependencies {
  model: ChatModel;
  logger?: Logger;
}

/**
 * Abstract base class for all agents
 *
 * An agent run is an async generator of execution events. The caller owns
 * the events: it appends them to the session and decides when to stop.
 */
export abstract class BaseAgent {
  protected readonly model: ChatModel;
  protected readonly logger?: Logger;
  protected readonly config: AgentConfig;

  constructor(dependencies: AgentDependencies, config: AgentConfig) {
    this.model = dependencies.model;
    this.logger = dependencies.logger;
    this.config = config;
  }

  get name(): string {
    return this.config.name;
  }

  get description(): string {
    return this.config.description;
  }

  /**
   * Session state key this agent writes its output to
   */
  get outputKey(): string | undefined {
    return this.config.outputKey;
  }

  /**
   * Run the agent for one request
   */
  abstract runAsync(ctx: InvocationContext): AsyncGenerator<ExecutionEvent, void, undefined>;

  /**
   * Conversation history followed by the current request
   */
  protected buildMessages(ctx: InvocationContext): ModelMessage[] {
    return [
      ...this.toModelMessages(ctx.session.messages),
      { role: 'user', content: ctx.userMessage },
    ];
  }

  protected toModelMessages(messages: Message[]): ModelMessage[] {
    return messages.map((msg): ModelMessage =>
      msg.role === 'user'
        ? { role: 'user', content: msg.content }
        : { role: 'assistant', content: msg.content }
    );
  }

  /**
   * Branch of an agent run from inside this one
   */
  protected childBranch(ctx: InvocationContext, child: BaseAgent): string {
    return `${ctx.branch ?? this.name}.${child.name}`;
  }
}
