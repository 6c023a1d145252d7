/**
 * Shared types for LLM providers.
 */

export type LLMProviderKind = 'anthropic' | 'ollama';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMProviderOptions {
  /** System prompt sent alongside the conversation */
  systemPrompt?: string;
  maxTokens: number;
  temperature?: number;
}

export interface LLMResponse {
  content: string;
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence';
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ModelInfo {
  name: string;
  contextLength: number;
  isLocal: boolean;
}

/**
 * A chat-completion backend.
 */
export interface LLMProvider {
  initialize(): Promise<void>;
  chat(messages: LLMMessage[], options: LLMProviderOptions): Promise<LLMResponse>;
  shutdown(): Promise<void>;
  getModelInfo(): ModelInfo;
}

export interface CreateProviderOptions {
  /** Backend to use (default: anthropic) */
  provider?: LLMProviderKind;
  /** Anthropic API key (falls back to ANTHROPIC_API_KEY) */
  apiKey?: string;
  /** Model name; each provider has its own default */
  model?: string;
  /** Ollama server URL */
  ollamaHost?: string;
  /** Anthropic request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * The one capability the pipeline needs from a model: text in, text out.
 * Stages receive it at construction time, so tests can pass a fake.
 */
export interface ContentGenerator {
  generate(prompt: string): Promise<string>;
}
