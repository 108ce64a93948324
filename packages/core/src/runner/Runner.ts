import type { BaseAgent } from '../agents/BaseAgent';
import type { InvocationContext } from '../agents/types';
import { createEvent, newInvocationId, textContent } from '../events/event';
import { extractEventText } from '../events/extract';
import type { ExecutionEvent } from '../events/types';
import { SessionNotFoundError } from '../sessions/errors';
import type { InMemorySessionService } from '../sessions/InMemorySessionService';
import type { EventBus } from '../utils/event-bus';
import type { Logger } from '../utils/logger';

/**
 * Runner dependencies - injected via constructor
 */
export interface RunnerDependencies {
  appName: string;
  agent: BaseAgent;
  sessionService: InMemorySessionService;
  eventBus?: EventBus;
  logger?: Logger;
  /** Clock for event timestamps */
  now?: () => number;
}

export interface RunParams {
  userId: string;
  sessionId: string;
  newMessage: string;
}

/**
 * Executes one user turn against the root agent
 *
 * Every non-partial event is appended to the session before it is yielded,
 * so state deltas are visible to later steps of the same turn. Consumers
 * may stop iterating at any point.
 */
export class Runner {
  readonly appName: string;
  private readonly agent: BaseAgent;
  private readonly sessionService: InMemorySessionService;
  private readonly eventBus?: EventBus;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(dependencies: RunnerDependencies) {
    this.appName = dependencies.appName;
    this.agent = dependencies.agent;
    this.sessionService = dependencies.sessionService;
    this.eventBus = dependencies.eventBus;
    this.logger = dependencies.logger;
    this.now = dependencies.now ?? Date.now;
  }

  async *runAsync(params: RunParams): AsyncGenerator<ExecutionEvent, void, undefined> {
    const { userId, sessionId, newMessage } = params;
    const key = { appName: this.appName, userId, sessionId };

    const session = this.sessionService.getSession(key);
    if (!session) {
      throw new SessionNotFoundError(userId, sessionId);
    }

    const invocationId = newInvocationId();
    const ctx: InvocationContext = {
      invocationId,
      session,
      userMessage: newMessage,
      now: this.now,
      logger: this.logger,
    };

    this.eventBus?.emit('turn:start', { invocationId, userId, sessionId, message: newMessage });
    this.logger?.debug('Turn started', { invocationId, sessionId, agent: this.agent.name });

    const timestamp = this.now();
    this.sessionService.appendEvent(
      key,
      createEvent({ invocationId, author: 'user', timestamp, content: textContent(newMessage, 'user') })
    );
    this.sessionService.appendMessage(key, {
      role: 'user',
      content: newMessage,
      timestamp: new Date(timestamp),
    });

    let response: string | null = null;
    let failed = false;

    try {
      for await (const event of this.agent.runAsync(ctx)) {
        if (!event.partial) {
          this.sessionService.appendEvent(key, event);
          Object.assign(ctx.session.state, event.actions.stateDelta);
        }

        if (event.final && response === null) {
          const text = extractEventText(event.content?.parts).trim();
          if (text) {
            response = text;
            this.sessionService.appendMessage(key, {
              role: 'assistant',
              content: text,
              timestamp: new Date(event.timestamp),
              author: event.author,
            });
          }
        }

        this.eventBus?.emit('agent:event', { event });
        yield event;
      }
    } catch (error) {
      failed = true;
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger?.error('Turn failed', err);
      this.eventBus?.emit('turn:error', { invocationId, userId, sessionId, error: err });
      throw err;
    } finally {
      if (!failed) {
        this.eventBus?.emit('turn:complete', { invocationId, userId, sessionId, response });
      }
    }
  }
}
