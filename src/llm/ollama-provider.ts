/**
 * Ollama Provider
 *
 * LLM provider that connects to an external Ollama server.
 * For users who prefer running models locally.
 */

import { createLogger } from '../logger.js';
import { hasErrorCode } from '../errors.js';
import type { LLMProvider, LLMMessage, LLMResponse, LLMProviderOptions, ModelInfo } from './types.js';

// Ollama client types (dynamic import)
type OllamaClient = import('ollama').Ollama;

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'qwen2.5-coder:14b';

/**
 * Options for the OllamaProvider
 */
export interface OllamaProviderOptions {
  /** Ollama server URL (default: http://localhost:11434) */
  host?: string;
  /** Model name to use */
  model?: string;
}

const logger = createLogger('Ollama');

/**
 * OllamaProvider - Connect to external Ollama server
 */
export class OllamaProvider implements LLMProvider {
  private client: OllamaClient | null = null;
  private modelName: string;
  private host: string;

  constructor(options: OllamaProviderOptions = {}) {
    this.host = options.host || DEFAULT_OLLAMA_HOST;
    this.modelName = options.model || DEFAULT_OLLAMA_MODEL;
  }

  /**
   * Initialize the provider - connect to Ollama and verify model availability
   */
  async initialize(): Promise<void> {
    logger.info(`🔌 Connecting to Ollama at ${this.host}...`);

    try {
      const { Ollama } = await import('ollama');
      this.client = new Ollama({ host: this.host });

      const models = await this.client.list();
      const hasModel = models.models.some(
        (m) => m.name === this.modelName || m.name.startsWith(this.modelName + ':')
      );

      if (!hasModel) {
        const availableModels = models.models.map((m) => m.name).join('\n     - ');
        throw new Error(
          `Model '${this.modelName}' not found in Ollama.\n\n` +
            `   Available models:\n     - ${availableModels || '(none)'}\n\n` +
            `   Pull it with: ollama pull ${this.modelName}`
        );
      }

      logger.info(`✅ Connected! Using model: ${this.modelName}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (hasErrorCode(error, 'ECONNREFUSED') || message.includes('ECONNREFUSED') || message.includes('fetch failed')) {
        throw new Error(
          `Cannot connect to Ollama at ${this.host}\n\n` +
            `  Ensure Ollama is running:\n` +
            `    $ ollama serve`,
          { cause: error }
        );
      }

      throw error;
    }
  }

  /**
   * Send a chat completion request
   */
  async chat(messages: LLMMessage[], options: LLMProviderOptions): Promise<LLMResponse> {
    if (!this.client) {
      throw new Error('Provider not initialized. Call initialize() first.');
    }

    const ollamaMessages: LLMMessage[] = options.systemPrompt
      ? [{ role: 'system', content: options.systemPrompt }, ...messages]
      : messages;

    const response = await this.client.chat({
      model: this.modelName,
      messages: ollamaMessages,
      options: {
        num_predict: options.maxTokens,
        temperature: options.temperature ?? 0.7,
      },
    });

    return {
      content: response.message.content || '',
      stopReason: response.done_reason === 'length' ? 'max_tokens' : 'end_turn',
      usage: {
        inputTokens: response.prompt_eval_count || 0,
        outputTokens: response.eval_count || 0,
      },
    };
  }

  /**
   * Clean up resources
   */
  async shutdown(): Promise<void> {
    // Ollama client doesn't require cleanup
    this.client = null;
  }

  getModelInfo(): ModelInfo {
    return {
      name: this.modelName,
      contextLength: 32768, // Default, actual varies by model
      isLocal: true,
    };
  }
}

export default OllamaProvider;
