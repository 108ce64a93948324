/**
 * Error thrown when a session does not exist
 */
export class SessionNotFoundError extends Error {
  readonly userId: string;
  readonly sessionId: string;

  constructor(userId: string, sessionId: string) {
    super(`Session not found: ${sessionId} (user: ${userId})`);
    this.name = 'SessionNotFoundError';
    this.userId = userId;
    this.sessionId = sessionId;
  }
}

/**
 * Error thrown when creating a session under an id already in use
 */
export class SessionAlreadyExistsError extends Error {
  constructor(sessionId: string) {
    super(`Session already exists: ${sessionId}`);
    this.name = 'SessionAlreadyExistsError';
  }
}
