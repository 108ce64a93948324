import { generateText, type LanguageModel, type ModelMessage } from 'ai';
import type { ChatModel, GenerateOptions, GenerateResult, ModelToolCall } from '../../agents/types';

function toArgs(input: unknown): Record<string, unknown> {
  if (typeof input === 'object' && input !== null && !Array.isArray(input)) {
    return Object.fromEntries(Object.entries(input));
  }
  return {};
}

/**
 * Model adapter that wraps Vercel AI SDK
 *
 * Runs a single generation step. Tool calls are returned to the caller
 * rather than executed, so the agent runtime can record each delegation
 * as its own execution event.
 */
export class ModelAdapter implements ChatModel {
  private model: LanguageModel;
  private defaults: { temperature?: number; maxTokens?: number };

  constructor(model: LanguageModel, defaults: { temperature?: number; maxTokens?: number } = {}) {
    this.model = model;
    this.defaults = defaults;
  }

  /**
   * Generate text completion
   */
  async generate(options: GenerateOptions): Promise<GenerateResult> {
    const { messages, systemPrompt, tools, maxTokens, temperature } = options;

    const result = await generateText({
      model: this.model,
      messages: this.prepareMessages(messages, systemPrompt),
      tools,
      maxOutputTokens: maxTokens ?? this.defaults.maxTokens,
      temperature: temperature ?? this.defaults.temperature,
    });

    const toolCalls: ModelToolCall[] = result.toolCalls.map((call) => ({
      toolCallId: call.toolCallId,
      toolName: call.toolName,
      args: toArgs(call.input),
    }));

    return {
      text: result.text,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      usage: {
        promptTokens: result.usage.inputTokens ?? 0,
        completionTokens: result.usage.outputTokens ?? 0,
        totalTokens: result.usage.totalTokens ?? 0,
      },
      finishReason: result.finishReason,
    };
  }

  /**
   * Prepare messages with system prompt
   */
  private prepareMessages(messages: ModelMessage[], systemPrompt?: string): ModelMessage[] {
    if (systemPrompt) {
      return [{ role: 'system', content: systemPrompt }, ...messages];
    }
    return messages;
  }
}
