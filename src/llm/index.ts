/**
 * LLM Provider Module
 *
 * Unified interface for the supported LLM backends:
 * - AnthropicProvider: Cloud-based Claude API (default)
 * - OllamaProvider: External Ollama server
 *
 * The pipeline itself only sees a ContentGenerator; ProviderContentGenerator
 * bridges the two.
 */

import { AnthropicProvider } from './anthropic-provider.js';
import { OllamaProvider } from './ollama-provider.js';
import { PipelineError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ContentGenerator, CreateProviderOptions, LLMProvider } from './types.js';

const logger = createLogger('LLM');

export const GENERATOR_SYSTEM_PROMPT =
  'You are a senior software architect and engineer working inside a multi-stage project generator. ' +
  'Follow the requested output format exactly: every delimiter you are asked to use must start its own line, ' +
  'and nothing outside the delimited blocks will be kept.';

/**
 * Create an LLM provider based on the given options
 *
 * @example
 * // Use Claude API (default)
 * const provider = await createLLMProvider({ model: 'claude-sonnet-4-20250514' });
 *
 * @example
 * // Use Ollama
 * const provider = await createLLMProvider({
 *   provider: 'ollama',
 *   ollamaHost: 'http://localhost:11434',
 *   model: 'qwen2.5-coder:14b'
 * });
 */
export async function createLLMProvider(options: CreateProviderOptions = {}): Promise<LLMProvider> {
  let provider: LLMProvider;

  if (options.provider === 'ollama') {
    provider = new OllamaProvider({
      host: options.ollamaHost,
      model: options.model,
    });
  } else {
    provider = new AnthropicProvider({
      apiKey: options.apiKey,
      model: options.model,
      timeoutMs: options.timeoutMs,
    });
  }

  await provider.initialize();
  return provider;
}

export interface ProviderContentGeneratorOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Adapts a chat provider to the single-call ContentGenerator contract:
 * one user message in, the text of the reply out.
 */
export class ProviderContentGenerator implements ContentGenerator {
  private provider: LLMProvider;
  private options: ProviderContentGeneratorOptions;

  constructor(provider: LLMProvider, options: ProviderContentGeneratorOptions = {}) {
    this.provider = provider;
    this.options = options;
  }

  async generate(prompt: string): Promise<string> {
    const model = this.provider.getModelInfo().name;
    logger.debug(`Sending ${prompt.length} chars to ${model}`);

    try {
      const response = await this.provider.chat([{ role: 'user', content: prompt }], {
        systemPrompt: this.options.systemPrompt ?? GENERATOR_SYSTEM_PROMPT,
        maxTokens: this.options.maxTokens ?? 8192,
        temperature: this.options.temperature,
      });

      logger.debug(
        `Received ${response.content.length} chars (${response.usage.inputTokens} in / ${response.usage.outputTokens} out tokens)`
      );
      if (response.stopReason === 'max_tokens') {
        logger.warn('Response hit the token limit; the last block may be cut short');
      }

      return response.content;
    } catch (error) {
      throw new PipelineError(`Generation with ${model} failed: ${errorMessage(error)}`, 'TRANSPORT_ERROR', {
        cause: error,
      });
    }
  }

  /**
   * Release the underlying provider.
   */
  async close(): Promise<void> {
    await this.provider.shutdown();
  }
}

/**
 * Build a ready-to-use generator from provider options.
 */
export async function createContentGenerator(
  options: CreateProviderOptions & ProviderContentGeneratorOptions = {}
): Promise<ProviderContentGenerator> {
  const provider = await createLLMProvider(options);
  return new ProviderContentGenerator(provider, {
    systemPrompt: options.systemPrompt,
    maxTokens: options.maxTokens,
    temperature: options.temperature,
  });
}

// Re-export types and providers
export * from './types.js';
export { AnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic-provider.js';
export { OllamaProvider, DEFAULT_OLLAMA_HOST, DEFAULT_OLLAMA_MODEL } from './ollama-provider.js';
