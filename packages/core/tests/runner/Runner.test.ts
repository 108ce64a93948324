import { describe, it, expect, beforeEach } from 'vitest';
import { Runner } from '../../src/runner/Runner.js';
import { LlmAgent } from '../../src/agents/LlmAgent.js';
import { RouterAgent, UnknownAgentError, type RouterConfig } from '../../src/agents/RouterAgent.js';
import { InMemorySessionService } from '../../src/sessions/InMemorySessionService.js';
import { SessionNotFoundError } from '../../src/sessions/errors.js';
import { EventBus } from '../../src/utils/event-bus.js';
import type { PipelineEvents } from '../../src/agents/types.js';
import { ScriptedModel, collect, tickingClock, type ScriptStep } from '../helpers.js';

const key = { appName: 'contentflow', userId: 'user-1', sessionId: 'session-1' };

interface Fixture {
  runner: Runner;
  sessions: InMemorySessionService;
  bus: EventBus;
  routerModel: ScriptedModel;
  ideateModel: ScriptedModel;
  draftModel: ScriptedModel;
}

function setup(
  routerSteps: ScriptStep[],
  stageSteps: { ideate?: ScriptStep[]; draft?: ScriptStep[] } = {},
  routerConfig: Partial<RouterConfig> = {}
): Fixture {
  const routerModel = new ScriptedModel(routerSteps);
  const ideateModel = new ScriptedModel(stageSteps.ideate ?? []);
  const draftModel = new ScriptedModel(stageSteps.draft ?? []);

  const ideate = new LlmAgent(
    { model: ideateModel },
    {
      name: 'IdeateAgent',
      description: 'Generates ideas',
      instruction: 'Generate ideas.',
      outputKey: 'generated_ideas',
    }
  );
  const draft = new LlmAgent(
    { model: draftModel },
    {
      name: 'DraftAgent',
      description: 'Writes drafts',
      instruction: 'Write a draft.',
      outputKey: 'content_draft',
    }
  );
  const router = new RouterAgent(
    { model: routerModel },
    {
      name: 'OrchestratorAgent',
      description: 'Routes requests',
      instruction: 'Route the request.',
      ...routerConfig,
    },
    [ideate, draft]
  );

  const sessions = new InMemorySessionService();
  sessions.createSession({ appName: key.appName, userId: key.userId, sessionId: key.sessionId });
  const bus = new EventBus();
  const runner = new Runner({
    appName: 'contentflow',
    agent: router,
    sessionService: sessions,
    eventBus: bus,
    now: tickingClock(),
  });

  return { runner, sessions, bus, routerModel, ideateModel, draftModel };
}

function ideateCall(request: string): ScriptStep {
  return {
    text: '',
    toolCalls: [{ toolCallId: 'call-1', toolName: 'IdeateAgent', args: { request } }],
  };
}

describe('Runner', () => {
  describe('direct replies', () => {
    it('should yield a single final event when the router answers itself', async () => {
      const { runner, sessions } = setup([{ text: 'Hello! What should we write about?' }]);

      const events = await collect(
        runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'hi' })
      );

      expect(events).toHaveLength(1);
      expect(events[0].author).toBe('OrchestratorAgent');
      expect(events[0].branch).toBeUndefined();
      expect(events[0].final).toBe(true);

      const messages = sessions.getSession(key)?.messages ?? [];
      expect(messages.map((message) => [message.role, message.content])).toEqual([
        ['user', 'hi'],
        ['assistant', 'Hello! What should we write about?'],
      ]);
    });

    it('should throw for an unknown session', async () => {
      const { runner } = setup([]);

      await expect(
        collect(runner.runAsync({ userId: 'user-1', sessionId: 'missing', newMessage: 'hi' }))
      ).rejects.toThrow(SessionNotFoundError);
    });
  });

  describe('tool delegation', () => {
    let fixture: Fixture;

    beforeEach(() => {
      fixture = setup([ideateCall('ideas about tea')], { ideate: [{ text: 'Idea A' }] });
    });

    it('should emit call, stage and response events in order', async () => {
      const events = await collect(
        fixture.runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'tea ideas' })
      );

      expect(events.map((event) => [event.author, event.branch, event.final])).toEqual([
        ['OrchestratorAgent', undefined, false],
        ['IdeateAgent', 'OrchestratorAgent.IdeateAgent', false],
        ['OrchestratorAgent', undefined, true],
      ]);
      expect(events[0].content?.parts).toEqual([
        { kind: 'function-call', id: 'call-1', name: 'IdeateAgent', args: { request: 'ideas about tea' } },
      ]);
      expect(events[2].content?.parts).toEqual([
        { kind: 'function-response', id: 'call-1', name: 'IdeateAgent', response: { result: 'Idea A' } },
      ]);
      expect(events[2].actions.skipSummarization).toBe(true);
      expect(new Set(events.map((event) => event.invocationId)).size).toBe(1);
    });

    it('should write the stage output under its artifact key', async () => {
      await collect(
        fixture.runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'tea ideas' })
      );

      expect(fixture.sessions.getSession(key)?.state).toEqual({ generated_ideas: 'Idea A' });
    });

    it('should pass the delegated request to the stage', async () => {
      await collect(
        fixture.runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'tea ideas' })
      );

      const [request] = fixture.ideateModel.calls;
      expect(request.messages).toEqual([{ role: 'user', content: 'ideas about tea' }]);
      expect(request.systemPrompt).toBe(
        'Generate ideas.\n\n# Current artifacts\n\nNo artifacts have been produced yet.'
      );
    });

    it('should expose every stage as a router tool', async () => {
      await collect(
        fixture.runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'tea ideas' })
      );

      expect(Object.keys(fixture.routerModel.calls[0].tools ?? {})).toEqual(['IdeateAgent', 'DraftAgent']);
    });

    it('should publish turn lifecycle events on the bus', async () => {
      const seen: string[] = [];
      let completed: PipelineEvents['turn:complete'] | undefined;
      fixture.bus.on('turn:start', () => {
        seen.push('start');
      });
      fixture.bus.on('agent:event', ({ event }) => {
        seen.push(event.author);
      });
      fixture.bus.on('turn:complete', (data) => {
        seen.push('complete');
        completed = data;
      });

      await collect(
        fixture.runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'tea ideas' })
      );

      expect(seen).toEqual(['start', 'OrchestratorAgent', 'IdeateAgent', 'OrchestratorAgent', 'complete']);
      expect(completed?.response).toBe('Idea A');
    });

    it('should complete the turn when the consumer stops at the final event', async () => {
      let completed = false;
      fixture.bus.on('turn:complete', () => {
        completed = true;
      });

      for await (const event of fixture.runner.runAsync({
        userId: 'user-1',
        sessionId: 'session-1',
        newMessage: 'tea ideas',
      })) {
        if (event.final) {
          break;
        }
      }

      expect(completed).toBe(true);
    });
  });

  describe('summarization', () => {
    it('should call the router again when summarization is enabled', async () => {
      const { runner, routerModel } = setup(
        [ideateCall('ideas'), { text: 'Here are your ideas: Idea A' }],
        { ideate: [{ text: 'Idea A' }] },
        { skipSummarization: false }
      );

      const events = await collect(
        runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'tea ideas' })
      );

      expect(events).toHaveLength(4);
      expect(events[2].final).toBe(false);
      expect(events[3].final).toBe(true);
      expect(routerModel.calls).toHaveLength(2);
      expect(routerModel.calls[1].messages.map((message) => message.role)).toEqual([
        'user',
        'assistant',
        'tool',
      ]);
    });

    it('should stop after the step limit', async () => {
      const { runner, routerModel } = setup(
        [ideateCall('one'), ideateCall('two')],
        { ideate: [{ text: 'Idea A' }, { text: 'Idea B' }] },
        { skipSummarization: false, maxSteps: 2 }
      );

      const events = await collect(
        runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'tea ideas' })
      );

      expect(routerModel.calls).toHaveLength(2);
      expect(events.some((event) => event.final)).toBe(false);
    });
  });

  describe('transfer delegation', () => {
    it('should transfer the turn to the named stage', async () => {
      const { runner, sessions } = setup(
        [
          {
            text: '',
            toolCalls: [
              { toolCallId: 'call-1', toolName: 'transfer_to_agent', args: { agentName: 'DraftAgent' } },
            ],
          },
        ],
        { draft: [{ text: 'Draft body' }] },
        { mode: 'transfer' }
      );

      const events = await collect(
        runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'write the draft' })
      );

      expect(events.map((event) => [event.author, event.final])).toEqual([
        ['OrchestratorAgent', false],
        ['OrchestratorAgent', false],
        ['DraftAgent', true],
      ]);
      expect(events[1].actions.transferToAgent).toBe('DraftAgent');
      expect(sessions.getSession(key)?.state).toEqual({ content_draft: 'Draft body' });
    });
  });

  describe('failures', () => {
    it('should reject calls to unknown agents and publish the error', async () => {
      const { runner, bus } = setup([
        { text: '', toolCalls: [{ toolCallId: 'call-1', toolName: 'PoetAgent', args: {} }] },
      ]);
      const errors: Error[] = [];
      bus.on('turn:error', ({ error }) => {
        errors.push(error);
      });

      await expect(
        collect(runner.runAsync({ userId: 'user-1', sessionId: 'session-1', newMessage: 'a poem' }))
      ).rejects.toThrow(UnknownAgentError);
      expect(errors.map((error) => error.message)).toEqual(['Unknown agent: PoetAgent']);
    });
  });
});
