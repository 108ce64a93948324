import {
  isLogLevel,
  loadEnvFile,
  moduleDir,
  validatePipelineConfig,
  type DelegationMode,
  type LogLevel,
  type PipelineConfigInput,
  type ProviderType,
} from '@contentflow/core';

loadEnvFile(moduleDir(import.meta.url));

const PROVIDERS: readonly ProviderType[] = ['google', 'openai', 'anthropic'];

const DEFAULT_MODELS: Record<ProviderType, string> = {
  google: 'gemini-2.5-flash',
  openai: 'gpt-4.1-mini',
  anthropic: 'claude-sonnet-4-20250514',
};

function parseProvider(value: string | undefined): ProviderType {
  return PROVIDERS.find((provider) => provider === value) ?? 'google';
}

function parseDelegationMode(value: string | undefined): DelegationMode {
  return value === 'transfer' ? 'transfer' : 'tool';
}

function parseLogLevel(value: string | undefined, debug: boolean): LogLevel {
  if (value && isLogLevel(value)) {
    return value;
  }
  return debug ? 'debug' : 'info';
}

export type LogFormat = 'text' | 'json';

function parseLogFormat(value: string | undefined): LogFormat {
  return value === 'json' ? 'json' : 'text';
}

const provider = parseProvider(process.env.MODEL_PROVIDER);
const debug = process.env.DEBUG_MODE === 'true';

/**
 * Environment configuration
 * Every value is read from the environment, with defaults.
 */
export const config = {
  appName: process.env.APP_NAME || 'content_creation',

  google: {
    apiKey: process.env.GOOGLE_API_KEY || '',
  },
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
  },
  anthropic: {
    apiKey: process.env.ANTHROPIC_API_KEY || '',
  },

  // Model shared by the router and the stages
  model: {
    provider,
    name: process.env.DEFAULT_MODEL || DEFAULT_MODELS[provider],
    temperature: parseFloat(process.env.TEMPERATURE || '0.7'),
    maxTokens: parseInt(process.env.MAX_TOKENS || '2000', 10),
  },

  pipeline: {
    delegationMode: parseDelegationMode(process.env.DELEGATION_MODE),
    maxSteps: parseInt(process.env.MAX_STEPS || '5', 10),
    skipSummarization: process.env.SKIP_SUMMARIZATION !== 'false',
    maxMessages: parseInt(process.env.MAX_MESSAGES || '50', 10),
  },

  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL, debug),
    format: parseLogFormat(process.env.LOG_FORMAT),
  },

  debug,
};

export type Config = typeof config;

/**
 * API key of the selected provider
 */
export function providerApiKey(cfg: Config = config): string {
  return cfg[cfg.model.provider].apiKey;
}

const API_KEY_VARIABLES: Record<ProviderType, string> = {
  google: 'GOOGLE_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

/**
 * Pipeline settings in the shape the runtime validates
 */
export function pipelineInput(cfg: Config = config): PipelineConfigInput {
  return {
    appName: cfg.appName,
    model: {
      provider: cfg.model.provider,
      name: cfg.model.name,
      apiKey: providerApiKey(cfg) || undefined,
      baseURL: cfg.model.provider === 'openai' ? cfg.openai.baseUrl : undefined,
      temperature: cfg.model.temperature,
      maxTokens: cfg.model.maxTokens,
    },
    delegationMode: cfg.pipeline.delegationMode,
    maxSteps: cfg.pipeline.maxSteps,
    skipSummarization: cfg.pipeline.skipSummarization,
    maxMessages: cfg.pipeline.maxMessages,
    debug: cfg.debug,
  };
}

/**
 * Check that the selected provider's key is set and every value is in range
 */
export function validateConfig(cfg: Config = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!providerApiKey(cfg)) {
    errors.push(`${API_KEY_VARIABLES[cfg.model.provider]} is required for provider "${cfg.model.provider}"`);
  }

  const parsed = validatePipelineConfig(pipelineInput(cfg));
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
