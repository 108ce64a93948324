import { describe, it, expect, beforeEach } from 'vitest';
import { InMemorySessionService } from '../../src/sessions/InMemorySessionService.js';
import { SessionAlreadyExistsError, SessionNotFoundError } from '../../src/sessions/errors.js';
import { createEvent, textContent } from '../../src/events/event.js';

const key = { appName: 'contentflow', userId: 'user-1', sessionId: 'session-1' };

describe('InMemorySessionService', () => {
  let service: InMemorySessionService;

  beforeEach(() => {
    service = new InMemorySessionService({ maxMessages: 3, now: () => 500 });
  });

  describe('session lifecycle', () => {
    it('should create a session with the given id and state', () => {
      const session = service.createSession({
        appName: 'contentflow',
        userId: 'user-1',
        sessionId: 'session-1',
        state: { generated_ideas: 'Idea A' },
      });

      expect(session.id).toBe('session-1');
      expect(session.state).toEqual({ generated_ideas: 'Idea A' });
      expect(session.lastUpdateTime).toBe(500);
    });

    it('should generate a session id when none is given', () => {
      const a = service.createSession({ appName: 'contentflow', userId: 'user-1' });
      const b = service.createSession({ appName: 'contentflow', userId: 'user-1' });

      expect(a.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(a.id).not.toBe(b.id);
    });

    it('should reject a duplicate session id', () => {
      service.createSession({ appName: 'contentflow', userId: 'user-1', sessionId: 'session-1' });
      expect(() =>
        service.createSession({ appName: 'contentflow', userId: 'user-1', sessionId: 'session-1' })
      ).toThrow(SessionAlreadyExistsError);
    });

    it('should return undefined for an unknown session', () => {
      expect(service.getSession(key)).toBeUndefined();
    });

    it('should delete a session', () => {
      service.createSession({ appName: 'contentflow', userId: 'user-1', sessionId: 'session-1' });

      expect(service.deleteSession(key)).toBe(true);
      expect(service.getSession(key)).toBeUndefined();
      expect(service.deleteSession(key)).toBe(false);
    });

    it('should list sessions of one user', () => {
      service.createSession({ appName: 'contentflow', userId: 'user-1', sessionId: 'a' });
      service.createSession({ appName: 'contentflow', userId: 'user-1', sessionId: 'b' });
      service.createSession({ appName: 'contentflow', userId: 'user-2', sessionId: 'c' });

      expect(service.listSessions('contentflow', 'user-1').map((session) => session.id)).toEqual([
        'a',
        'b',
      ]);
    });
  });

  describe('state', () => {
    beforeEach(() => {
      service.createSession({ appName: 'contentflow', userId: 'user-1', sessionId: 'session-1' });
    });

    it('should hand out copies of the state', () => {
      const session = service.getSession(key);
      expect(session).toBeDefined();
      if (session) {
        session.state.generated_ideas = 'mutated';
      }
      expect(service.getSession(key)?.state).toEqual({});
    });

    it('should apply the state delta of appended events', () => {
      service.appendEvent(
        key,
        createEvent({
          invocationId: 'e-1',
          author: 'IdeateAgent',
          content: textContent('Idea A'),
          actions: { stateDelta: { generated_ideas: 'Idea A' } },
        })
      );

      const session = service.getSession(key);
      expect(session?.state).toEqual({ generated_ideas: 'Idea A' });
      expect(session?.events).toHaveLength(1);
    });

    it('should ignore partial events', () => {
      service.appendEvent(
        key,
        createEvent({
          invocationId: 'e-1',
          author: 'IdeateAgent',
          partial: true,
          actions: { stateDelta: { generated_ideas: 'Ide' } },
        })
      );

      expect(service.getSession(key)?.state).toEqual({});
      expect(service.getSession(key)?.events).toHaveLength(0);
    });

    it('should overwrite keys on update', () => {
      service.updateState(key, { content_draft: 'v1' });
      service.updateState(key, { content_draft: 'v2', content_outline: 'outline' });

      expect(service.getSession(key)?.state).toEqual({ content_draft: 'v2', content_outline: 'outline' });
    });

    it('should throw for writes to an unknown session', () => {
      const missing = { ...key, sessionId: 'missing' };
      expect(() => service.updateState(missing, { a: 1 })).toThrow(SessionNotFoundError);
    });
  });

  describe('sliding window', () => {
    it('should keep the most recent messages', () => {
      service.createSession({ appName: 'contentflow', userId: 'user-1', sessionId: 'session-1' });

      for (let i = 0; i < 5; i++) {
        service.appendMessage(key, { role: 'user', content: `Message ${i}`, timestamp: new Date() });
      }

      const messages = service.getSession(key)?.messages ?? [];
      expect(messages.map((message) => message.content)).toEqual(['Message 2', 'Message 3', 'Message 4']);
    });
  });
});
