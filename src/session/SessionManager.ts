import { v4 as uuidv4 } from 'uuid';
import type {
  EventBus,
  InMemorySessionService,
  Logger,
  Runner,
  SessionKey,
  SessionState,
} from '@contentflow/core';
import { ExecutionTracker } from '../tracking/ExecutionTracker';
import { formatLlmCallStats } from '../tracking/format';
import type { TurnReport } from '../tracking/types';
import { getWorkflowStatus, type WorkflowStatus } from '../workflow/status';

/**
 * Session manager dependencies - injected via constructor
 */
export interface SessionManagerDependencies {
  runner: Runner;
  sessionService: InMemorySessionService;
  logger: Logger;
  eventBus?: EventBus;
}

export const TEST_USER_ID = 'test_user_tracking';
export const DEFAULT_TEST_MESSAGE = 'Generate 3 creative blog post ideas';

/**
 * Owns the sessions of the content pipeline and runs turns against them
 *
 * Reads and writes of session state degrade to logged no-ops; only
 * getSessionData propagates errors.
 */
export class SessionManager {
  private runner: Runner;
  private sessionService: InMemorySessionService;
  private logger: Logger;
  private eventBus?: EventBus;
  private tracker: ExecutionTracker;

  constructor(dependencies: SessionManagerDependencies) {
    this.runner = dependencies.runner;
    this.sessionService = dependencies.sessionService;
    this.logger = dependencies.logger;
    this.eventBus = dependencies.eventBus;
    this.tracker = new ExecutionTracker({ logger: this.logger.child('tracker') });
  }

  get appName(): string {
    return this.runner.appName;
  }

  /**
   * Create a session; a UUID is generated when no id is given
   */
  async createSession(userId: string, sessionId?: string, initialState?: SessionState): Promise<string> {
    const session = this.sessionService.createSession({
      appName: this.appName,
      userId,
      sessionId: sessionId ?? uuidv4(),
      state: initialState,
    });

    this.logger.debug('Session created', { userId, sessionId: session.id });
    this.eventBus?.emit('session:created', { userId, sessionId: session.id });
    return session.id;
  }

  /**
   * Current artifact state, or an empty mapping when the session is unknown
   */
  async getSessionState(userId: string, sessionId: string): Promise<SessionState> {
    try {
      return this.sessionService.getSession(this.key(userId, sessionId))?.state ?? {};
    } catch (error) {
      this.logger.error('Error getting session state', error);
      return {};
    }
  }

  /**
   * Merge keys into the artifact state; unknown sessions are left alone
   */
  async updateSessionState(userId: string, sessionId: string, stateUpdate: SessionState): Promise<void> {
    const key = this.key(userId, sessionId);
    try {
      if (!this.sessionService.getSession(key)) {
        return;
      }
      this.sessionService.updateState(key, stateUpdate);
    } catch (error) {
      this.logger.error('Error updating session state', error);
    }
  }

  async getSessionData(userId: string, sessionId: string): Promise<SessionState> {
    return this.sessionService.getSession(this.key(userId, sessionId))?.state ?? {};
  }

  async clearSession(userId: string, sessionId: string): Promise<void> {
    try {
      if (this.sessionService.deleteSession(this.key(userId, sessionId))) {
        this.logger.success('Session deleted', { userId, sessionId });
        this.eventBus?.emit('session:deleted', { userId, sessionId });
      }
    } catch (error) {
      this.logger.error('Error clearing session', error);
    }
  }

  /**
   * Run one turn through the orchestrator and aggregate its events
   */
  async runAgentWithTracking(userId: string, sessionId: string, userMessage: string): Promise<TurnReport> {
    return this.tracker.track(this.runner.runAsync({ userId, sessionId, newMessage: userMessage }));
  }

  /**
   * Run one turn and return only the response text
   */
  async runAgent(userId: string, sessionId: string, userMessage: string): Promise<string> {
    const report = await this.runAgentWithTracking(userId, sessionId, userMessage);
    return report.response;
  }

  formatLlmCallStats(report?: TurnReport): string {
    return formatLlmCallStats(report);
  }

  async getWorkflowStatus(userId: string, sessionId: string): Promise<WorkflowStatus> {
    return getWorkflowStatus(await this.getSessionState(userId, sessionId));
  }

  /**
   * Run one tracked turn in a throw-away session and log its statistics
   */
  async testLlmTracking(message: string = DEFAULT_TEST_MESSAGE): Promise<TurnReport> {
    const sessionId = await this.createSession(TEST_USER_ID);

    try {
      const report = await this.runAgentWithTracking(TEST_USER_ID, sessionId, message);
      this.logger.info(`LLM tracking test results:\n${this.formatLlmCallStats(report)}`);
      return report;
    } finally {
      await this.clearSession(TEST_USER_ID, sessionId);
    }
  }

  private key(userId: string, sessionId: string): SessionKey {
    return { appName: this.appName, userId, sessionId };
  }
}
