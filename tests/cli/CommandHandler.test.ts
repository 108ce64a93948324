import { describe, it, expect, beforeEach } from 'vitest';
import { createLogger, type GenerateOptions } from '@contentflow/core';
import { CommandHandler, QUICK_ACTIONS, isShellCommand } from '../../src/cli/CommandHandler.js';
import { createPipeline, type ContentPipeline } from '../../src/pipeline/createPipeline.js';
import { FakeModel } from '../helpers.js';

const ANSI = /\u001b\[[0-9;]*m/g;

function ideaModel(): FakeModel {
  return new FakeModel((options: GenerateOptions, callIndex) => {
    if (!options.tools) {
      return { text: 'Idea A' };
    }
    return {
      text: '',
      toolCalls: [{ toolCallId: `call-${callIndex}`, toolName: 'IdeateAgent', args: { request: 'ideas' } }],
    };
  });
}

describe('CommandHandler', () => {
  let pipeline: ContentPipeline;
  let handler: CommandHandler;
  let lines: string[];

  beforeEach(async () => {
    pipeline = await createPipeline({
      config: { appName: 'contentflow-test', model: { provider: 'google', name: 'test-model' } },
      model: ideaModel(),
      logger: createLogger('test', { handler: () => undefined }),
    });
    lines = [];
    handler = new CommandHandler(pipeline.sessionManager, {
      userId: 'cli-test',
      print: (line) => lines.push(line.replace(ANSI, '')),
    });
  });

  it('should recognise shell commands', () => {
    expect(isShellCommand('status')).toBe(true);
    expect(isShellCommand('exit')).toBe(false);
  });

  it('should reject unknown commands', async () => {
    expect(await handler.handleCommand('publish', [])).toEqual({
      success: false,
      message: "Unknown command: publish. Type 'help' for available commands.",
    });
  });

  it('should reject an empty chat message', async () => {
    expect(await handler.handleChat('   ')).toEqual({ success: false, message: 'Please enter a message.' });
    expect(handler.getSessionId()).toBeNull();
  });

  it('should print the response with a footer', async () => {
    const result = await handler.handleChat('Ideas about tea');

    expect(result.success).toBe(true);
    expect(handler.getSessionId()).not.toBeNull();
    expect(handler.getLastReport()?.response).toBe('Idea A');
    expect(lines).toContain('Idea A');
    expect(lines).toContain('📊 2 LLM calls across 2 agents\n🤖 IdeateAgent (1 call), OrchestratorAgent (1 call)\n🔄 OrchestratorAgent → IdeateAgent → OrchestratorAgent');
  });

  it('should fail the chat when the turn failed', async () => {
    const failing = await createPipeline({
      config: { appName: 'contentflow-test', model: { provider: 'google', name: 'test-model' } },
      model: new FakeModel(() => {
        throw new Error('model offline');
      }),
      logger: createLogger('test', { handler: () => undefined }),
    });
    const failingHandler = new CommandHandler(failing.sessionManager, { print: (line) => lines.push(line) });

    const result = await failingHandler.handleChat('Ideas about tea');

    expect(result.success).toBe(false);
    expect(result.message).toBe('model offline');
    expect(failingHandler.getLastReport()?.response).toBe('An error occurred: model offline. Please try again.');
  });

  it('should print detailed statistics on request', async () => {
    await handler.handleChat('Ideas about tea', { showStats: true });
    expect(lines.some((line) => line.startsWith('='.repeat(60) + '\n🤖 LLM CALL STATISTICS'))).toBe(true);
  });

  it('should report the workflow step', async () => {
    await handler.handleChat('Ideas about tea');

    const result = await handler.handleCommand('status', []);

    expect(result.message).toBe('Current step: ideas_generated');
    expect(lines).toContain('  ✓ Ideas generated');
    expect(lines).toContain('  ○ Outline created');
  });

  it('should list session artifacts', async () => {
    await handler.handleChat('Ideas about tea');

    const result = await handler.handleCommand('state', []);

    expect(result.message).toBe('1 artifacts');
    expect(lines).toContain('  generated_ideas');
    expect(lines).toContain('    Idea A');
  });

  it('should print the no-statistics message before any turn', async () => {
    await handler.handleCommand('stats', []);
    expect(lines).toEqual(['No LLM call statistics available.']);
  });

  describe('quick', () => {
    it('should list the actions without an argument', async () => {
      const result = await handler.handleCommand('quick', []);

      expect(result).toEqual({ success: true, message: 'Quick actions listed' });
      expect(lines).toContain(`  1. ${QUICK_ACTIONS[0]}`);
    });

    it('should fail on an action number out of range', async () => {
      const result = await handler.handleCommand('quick', ['9']);
      expect(result).toEqual({ success: false, message: 'Usage: quick <1-5>' });
    });

    it('should send the chosen action', async () => {
      const result = await handler.handleCommand('quick', ['2']);

      expect(result.success).toBe(true);
      expect(lines).toContain(`> ${QUICK_ACTIONS[1]}`);
    });
  });

  describe('sessions', () => {
    it('should replace the session on new', async () => {
      await handler.handleChat('Ideas about tea');
      const previous = handler.getSessionId();

      await handler.handleCommand('new', []);

      expect(handler.getSessionId()).not.toBe(previous);
      expect(handler.getLastReport()).toBeNull();
      expect(pipeline.sessionService.listSessions('contentflow-test', 'cli-test')).toHaveLength(2);
    });

    it('should delete the session on clear', async () => {
      await handler.handleChat('Ideas about tea');

      await handler.handleCommand('clear', []);

      expect(handler.getSessionId()).toBeNull();
      expect(pipeline.sessionService.listSessions('contentflow-test', 'cli-test')).toEqual([]);
    });
  });

  it('should list the orchestrator and the five stages', async () => {
    const result = await handler.handleCommand('agents', []);

    expect(result.message).toBe('5 stages');
    expect(lines).toContain('  OrchestratorAgent routes each request to a stage');
  });
});
