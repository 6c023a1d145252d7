/**
 * Anthropic Provider
 *
 * LLM provider that connects to the Anthropic API (Claude).
 * This is the default cloud provider.
 */

import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../logger.js';
import type { LLMProvider, LLMMessage, LLMResponse, LLMProviderOptions, ModelInfo } from './types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

/**
 * Options for the AnthropicProvider
 */
export interface AnthropicProviderOptions {
  /** Anthropic API key */
  apiKey?: string;
  /** Model name to use (default: claude-sonnet-4-20250514) */
  model?: string;
  /** Request timeout in milliseconds (default: 10 minutes) */
  timeoutMs?: number;
}

const logger = createLogger('Anthropic');

/**
 * AnthropicProvider - Connect to Anthropic's Claude API
 */
export class AnthropicProvider implements LLMProvider {
  private client: Anthropic | null = null;
  private modelName: string;
  private apiKey?: string;
  private timeoutMs: number;

  constructor(options: AnthropicProviderOptions = {}) {
    this.apiKey = options.apiKey;
    this.modelName = options.model || DEFAULT_ANTHROPIC_MODEL;
    this.timeoutMs = options.timeoutMs ?? 10 * 60 * 1000;
  }

  /**
   * Initialize the provider - create client and verify API key
   */
  async initialize(): Promise<void> {
    const key = this.apiKey || process.env.ANTHROPIC_API_KEY;

    if (!key) {
      throw new Error(
        'Anthropic API key not found.\n\n' +
          'Set it via:\n' +
          '  1. Environment variable: ANTHROPIC_API_KEY=your-key\n' +
          '  2. Or switch to a local model: IDEASMITH_PROVIDER=ollama'
      );
    }

    this.client = new Anthropic({ apiKey: key, timeout: this.timeoutMs });
    logger.info(`☁️  Using Anthropic API with model: ${this.modelName}`);
  }

  /**
   * Send a chat completion request
   */
  async chat(messages: LLMMessage[], options: LLMProviderOptions): Promise<LLMResponse> {
    if (!this.client) {
      throw new Error('Provider not initialized. Call initialize() first.');
    }

    try {
      const response = await this.client.messages.create({
        model: this.modelName,
        max_tokens: options.maxTokens,
        system: this.systemPrompt(messages, options.systemPrompt),
        messages: this.convertMessages(messages),
        temperature: options.temperature,
      });

      return this.parseResponse(response);
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        if (error.status === 401) {
          throw new Error('Invalid Anthropic API key. Please check your ANTHROPIC_API_KEY.', { cause: error });
        }
        if (error.status === 429) {
          throw new Error('Rate limited by Anthropic API. Please wait and try again.', { cause: error });
        }
      }

      throw error;
    }
  }

  /**
   * Clean up resources
   */
  async shutdown(): Promise<void> {
    this.client = null;
  }

  getModelInfo(): ModelInfo {
    return {
      name: this.modelName,
      contextLength: 200000,
      isLocal: false,
    };
  }

  /**
   * Anthropic takes system text as a parameter, not as a message.
   */
  private systemPrompt(messages: LLMMessage[], systemPrompt?: string): string | undefined {
    const parts = [systemPrompt, ...messages.filter((msg) => msg.role === 'system').map((msg) => msg.content)];
    const text = parts.filter((part): part is string => Boolean(part)).join('\n\n');
    return text || undefined;
  }

  /**
   * Convert messages to Anthropic format
   */
  private convertMessages(messages: LLMMessage[]): Anthropic.MessageParam[] {
    const result: Anthropic.MessageParam[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        continue;
      }
      result.push({ role: msg.role, content: msg.content });
    }

    return result;
  }

  /**
   * Parse Anthropic response to our format
   */
  private parseResponse(response: Anthropic.Message): LLMResponse {
    let textContent = '';

    for (const block of response.content) {
      if (block.type === 'text') {
        textContent += block.text;
      }
    }

    let stopReason: LLMResponse['stopReason'] = 'end_turn';
    if (response.stop_reason === 'max_tokens') {
      stopReason = 'max_tokens';
    } else if (response.stop_reason === 'stop_sequence') {
      stopReason = 'stop_sequence';
    }

    return {
      content: textContent,
      stopReason,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}

export default AnthropicProvider;
