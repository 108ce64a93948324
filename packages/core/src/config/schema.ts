import { z } from 'zod';

/**
 * Model provider configuration schema
 */
export const modelConfigSchema = z.object({
  /** Model provider */
  provider: z.enum(['google', 'openai', 'anthropic']),
  /** Model name */
  name: z.string().min(1),
  /** Custom base URL */
  baseURL: z.string().url().optional(),
  /** API key (optional, defaults to env var) */
  apiKey: z.string().optional(),
  /** Sampling temperature */
  temperature: z.number().min(0).max(2).optional(),
  /** Maximum output tokens */
  maxTokens: z.number().int().positive().optional(),
});

/**
 * Pipeline configuration schema
 */
export const pipelineConfigSchema = z.object({
  /** Application name sessions are scoped to */
  appName: z.string().min(1).default('contentflow'),
  /** Model used by the router and every stage */
  model: modelConfigSchema,
  /** How the router hands a request to a stage */
  delegationMode: z.enum(['tool', 'transfer']).default('tool'),
  /** Router model calls allowed per turn */
  maxSteps: z.number().int().min(1).max(20).default(5),
  /** Return a stage's output to the user without a router summary */
  skipSummarization: z.boolean().default(true),
  /** Conversation messages kept per session */
  maxMessages: z.number().int().min(1).default(50),
  /** Enable debug logging */
  debug: z.boolean().default(false),
});

/**
 * Validated pipeline configuration
 */
export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

/**
 * Pipeline configuration as accepted before defaults are applied
 */
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

export type ModelConfigType = z.infer<typeof modelConfigSchema>;

/**
 * Validate and parse configuration
 */
export function parseConfig(config: unknown): PipelineConfig {
  return pipelineConfigSchema.parse(config);
}

/**
 * Validate configuration without throwing
 */
export function validatePipelineConfig(
  config: unknown
): { success: true; data: PipelineConfig } | { success: false; error: z.ZodError } {
  const result = pipelineConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
