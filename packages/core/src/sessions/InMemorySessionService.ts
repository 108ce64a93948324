import { v4 as uuidv4 } from 'uuid';
import type { Message } from '../agents/types';
import type { ExecutionEvent } from '../events/types';
import { SessionAlreadyExistsError, SessionNotFoundError } from './errors';
import type { Session, SessionKey, SessionState } from './types';

/**
 * Session service options
 */
export interface SessionServiceOptions {
  /** Maximum number of messages to keep in each session's history */
  maxMessages?: number;
  /** Clock for lastUpdateTime */
  now?: () => number;
}

export interface CreateSessionParams {
  appName: string;
  userId: string;
  sessionId?: string;
  state?: SessionState;
}

function storageKey({ appName, userId, sessionId }: SessionKey): string {
  return `${appName}\u0000${userId}\u0000${sessionId}`;
}

function snapshot(session: Session): Session {
  return {
    ...session,
    state: { ...session.state },
    messages: [...session.messages],
    events: [...session.events],
  };
}

/**
 * Process-local session store
 *
 * Holds each session's artifact state, appended events and a sliding window
 * of conversation history. Nothing survives a restart. Readers always get a
 * copy; writes go through the methods below.
 */
export class InMemorySessionService {
  private sessions = new Map<string, Session>();
  private maxMessages: number;
  private now: () => number;

  constructor(options: SessionServiceOptions = {}) {
    this.maxMessages = options.maxMessages ?? 50;
    this.now = options.now ?? Date.now;
  }

  createSession(params: CreateSessionParams): Session {
    const sessionId = params.sessionId ?? uuidv4();
    const key = storageKey({ appName: params.appName, userId: params.userId, sessionId });
    if (this.sessions.has(key)) {
      throw new SessionAlreadyExistsError(sessionId);
    }

    const session: Session = {
      id: sessionId,
      appName: params.appName,
      userId: params.userId,
      state: { ...params.state },
      messages: [],
      events: [],
      lastUpdateTime: this.now(),
    };
    this.sessions.set(key, session);
    return snapshot(session);
  }

  getSession(key: SessionKey): Session | undefined {
    const session = this.sessions.get(storageKey(key));
    return session ? snapshot(session) : undefined;
  }

  /**
   * Record an event and apply its state delta. Partial events are ignored.
   */
  appendEvent(key: SessionKey, event: ExecutionEvent): void {
    if (event.partial) {
      return;
    }
    const session = this.require(key);
    Object.assign(session.state, event.actions.stateDelta);
    session.events.push(event);
    session.lastUpdateTime = this.now();
  }

  /**
   * Merge keys into the artifact state
   */
  updateState(key: SessionKey, delta: SessionState): void {
    const session = this.require(key);
    Object.assign(session.state, delta);
    session.lastUpdateTime = this.now();
  }

  appendMessage(key: SessionKey, message: Message): void {
    const session = this.require(key);
    session.messages.push(message);
    session.lastUpdateTime = this.now();

    while (session.messages.length > this.maxMessages) {
      session.messages.shift();
    }
  }

  deleteSession(key: SessionKey): boolean {
    return this.sessions.delete(storageKey(key));
  }

  /**
   * Sessions of one user in an app
   */
  listSessions(appName: string, userId: string): Session[] {
    return Array.from(this.sessions.values())
      .filter((session) => session.appName === appName && session.userId === userId)
      .map(snapshot);
  }

  private require(key: SessionKey): Session {
    const session = this.sessions.get(storageKey(key));
    if (!session) {
      throw new SessionNotFoundError(key.userId, key.sessionId);
    }
    return session;
  }
}
