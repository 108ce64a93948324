import type { Message } from '../agents/types';
import type { ExecutionEvent } from '../events/types';

/**
 * Artifact store: stage outputs keyed by artifact name
 */
export type SessionState = Record<string, unknown>;

export interface SessionKey {
  appName: string;
  userId: string;
  sessionId: string;
}

export interface Session {
  id: string;
  appName: string;
  userId: string;
  state: SessionState;
  /** Routing context: user messages and final responses, oldest first */
  messages: Message[];
  /** Non-partial events appended during the session's turns */
  events: ExecutionEvent[];
  /** Epoch milliseconds of the last write */
  lastUpdateTime: number;
}
