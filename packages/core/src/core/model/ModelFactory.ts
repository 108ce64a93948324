import type { LanguageModel } from 'ai';
import type { ModelConfig } from '../../agents/types';
import { ModelAdapter } from './ModelAdapter';

export type ProviderType = ModelConfig['provider'];

/**
 * Error thrown when a model provider is not available
 */
export class ProviderNotAvailableError extends Error {
  constructor(provider: string) {
    super(
      `Model provider "${provider}" is not available. ` +
        `Please install the corresponding package: @ai-sdk/${provider}`
    );
    this.name = 'ProviderNotAvailableError';
  }
}

/**
 * Error thrown when model configuration is invalid
 */
export class InvalidModelConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidModelConfigError';
  }
}

function isModuleNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.message.includes('Cannot find module') ||
      error.message.includes('Cannot find package') ||
      error.message.includes('ERR_MODULE_NOT_FOUND'))
  );
}

/**
 * Import a provider package, mapping a missing package to ProviderNotAvailableError
 */
async function loadProvider<T>(provider: ProviderType, load: () => Promise<T>): Promise<T> {
  try {
    return await load();
  } catch (error) {
    if (isModuleNotFound(error)) {
      throw new ProviderNotAvailableError(provider);
    }
    throw error;
  }
}

/**
 * Model factory that creates ModelAdapter instances based on configuration
 *
 * Provider packages are imported on first use, so only the selected
 * provider has to be installed.
 */
export class ModelFactory {
  /**
   * Create a ModelAdapter from configuration
   */
  static async create(config: ModelConfig): Promise<ModelAdapter> {
    const model = await this.createLanguageModel(config);
    return new ModelAdapter(model, {
      temperature: config.temperature,
      maxTokens: config.maxTokens,
    });
  }

  /**
   * Create a LanguageModel from configuration
   */
  static async createLanguageModel(config: ModelConfig): Promise<LanguageModel> {
    const { provider, name, baseURL, apiKey } = config;

    if (!name) {
      throw new InvalidModelConfigError('Model name is required');
    }

    switch (provider) {
      case 'google': {
        const { createGoogleGenerativeAI } = await loadProvider(provider, () => import('@ai-sdk/google'));
        return createGoogleGenerativeAI({
          baseURL,
          apiKey: apiKey ?? process.env.GOOGLE_API_KEY,
        })(name);
      }

      case 'openai': {
        const { createOpenAI } = await loadProvider(provider, () => import('@ai-sdk/openai'));
        return createOpenAI({
          baseURL: baseURL ?? process.env.OPENAI_BASE_URL,
          apiKey: apiKey ?? process.env.OPENAI_API_KEY,
        })(name);
      }

      case 'anthropic': {
        const { createAnthropic } = await loadProvider(provider, () => import('@ai-sdk/anthropic'));
        return createAnthropic({
          baseURL,
          apiKey: apiKey ?? process.env.ANTHROPIC_API_KEY,
        })(name);
      }

      default:
        throw new InvalidModelConfigError(`Unknown provider: ${String(provider)}`);
    }
  }

  /**
   * Check if a provider package can be loaded
   */
  static async isProviderAvailable(provider: ProviderType): Promise<boolean> {
    try {
      switch (provider) {
        case 'google':
          await loadProvider(provider, () => import('@ai-sdk/google'));
          break;
        case 'openai':
          await loadProvider(provider, () => import('@ai-sdk/openai'));
          break;
        case 'anthropic':
          await loadProvider(provider, () => import('@ai-sdk/anthropic'));
          break;
      }
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Get list of available providers
   */
  static async getAvailableProviders(): Promise<ProviderType[]> {
    const providers: ProviderType[] = ['google', 'openai', 'anthropic'];
    const available: ProviderType[] = [];

    for (const provider of providers) {
      if (await this.isProviderAvailable(provider)) {
        available.push(provider);
      }
    }

    return available;
  }
}
