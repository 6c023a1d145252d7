/**
 * Tests for the LLM providers and the content generator adapter
 *
 * Both SDKs are mocked; nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { create, anthropicConstructor, ollamaList, ollamaChat, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(readonly status: number, message: string) {
      super(message);
    }
  }
  return {
    create: vi.fn(),
    anthropicConstructor: vi.fn(),
    ollamaList: vi.fn(),
    ollamaChat: vi.fn(),
    MockAPIError,
  };
});

vi.mock('@anthropic-ai/sdk', () => ({
  default: Object.assign(
    vi.fn().mockImplementation((options: unknown) => {
      anthropicConstructor(options);
      return { messages: { create } };
    }),
    { APIError: MockAPIError }
  ),
}));

vi.mock('ollama', () => ({
  Ollama: vi.fn().mockImplementation(() => ({ list: ollamaList, chat: ollamaChat })),
}));

import {
  AnthropicProvider,
  DEFAULT_ANTHROPIC_MODEL,
  GENERATOR_SYSTEM_PROMPT,
  OllamaProvider,
  ProviderContentGenerator,
  createContentGenerator,
  type LLMProvider,
} from '../src/llm/index.js';
import { PipelineError } from '../src/errors.js';

function textMessage(text: string) {
  return {
    content: [{ type: 'text', text }],
    stop_reason: 'end_turn',
    usage: { input_tokens: 10, output_tokens: 2 },
  };
}

describe('LLM providers', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.mocked(console.log).mockRestore();
    vi.unstubAllEnvs();
    create.mockReset();
    anthropicConstructor.mockReset();
    ollamaList.mockReset();
    ollamaChat.mockReset();
  });

  describe('AnthropicProvider', () => {
    it('should require an API key', async () => {
      vi.stubEnv('ANTHROPIC_API_KEY', '');

      await expect(new AnthropicProvider().initialize()).rejects.toThrow('Anthropic API key not found');
    });

    it('should send system text as a parameter and join text blocks', async () => {
      create.mockResolvedValueOnce({
        content: [
          { type: 'text', text: 'Hello' },
          { type: 'text', text: ' world' },
        ],
        stop_reason: 'max_tokens',
        usage: { input_tokens: 10, output_tokens: 2 },
      });
      const provider = new AnthropicProvider({ apiKey: 'test-secret' });
      await provider.initialize();

      const response = await provider.chat(
        [
          { role: 'system', content: 'extra' },
          { role: 'user', content: 'hi' },
        ],
        { systemPrompt: 'sys', maxTokens: 100 }
      );

      expect(response).toEqual({
        content: 'Hello world',
        stopReason: 'max_tokens',
        usage: { inputTokens: 10, outputTokens: 2 },
      });
      expect(create).toHaveBeenCalledWith(
        expect.objectContaining({
          model: DEFAULT_ANTHROPIC_MODEL,
          max_tokens: 100,
          system: 'sys\n\nextra',
          messages: [{ role: 'user', content: 'hi' }],
        })
      );
      expect(anthropicConstructor).toHaveBeenCalledWith({ apiKey: 'test-secret', timeout: 600000 });
    });

    it('should explain authentication failures', async () => {
      create.mockRejectedValueOnce(new MockAPIError(401, 'unauthorized'));
      const provider = new AnthropicProvider({ apiKey: 'test-secret' });
      await provider.initialize();

      await expect(provider.chat([{ role: 'user', content: 'hi' }], { maxTokens: 10 })).rejects.toThrow(
        'Invalid Anthropic API key'
      );
    });

    it('should refuse to chat before initialize', async () => {
      await expect(new AnthropicProvider().chat([], { maxTokens: 10 })).rejects.toThrow('Provider not initialized');
    });
  });

  describe('OllamaProvider', () => {
    it('should fail when the model is not pulled', async () => {
      ollamaList.mockResolvedValueOnce({ models: [{ name: 'llama3:8b' }] });

      await expect(new OllamaProvider().initialize()).rejects.toThrow("Model 'qwen2.5-coder:14b' not found in Ollama");
    });

    it('should explain a refused connection', async () => {
      ollamaList.mockRejectedValueOnce(new Error('fetch failed'));

      await expect(new OllamaProvider({ host: 'http://gpu-box:11434' }).initialize()).rejects.toThrow(
        'Cannot connect to Ollama at http://gpu-box:11434'
      );
    });

    it('should prepend the system prompt and map the stop reason', async () => {
      ollamaList.mockResolvedValueOnce({ models: [{ name: 'llama3:8b' }] });
      ollamaChat.mockResolvedValueOnce({
        message: { role: 'assistant', content: 'done' },
        done_reason: 'length',
        prompt_eval_count: 5,
        eval_count: 7,
      });
      const provider = new OllamaProvider({ model: 'llama3' });
      await provider.initialize();

      const response = await provider.chat([{ role: 'user', content: 'hi' }], { systemPrompt: 'sys', maxTokens: 50 });

      expect(response).toEqual({ content: 'done', stopReason: 'max_tokens', usage: { inputTokens: 5, outputTokens: 7 } });
      expect(ollamaChat).toHaveBeenCalledWith({
        model: 'llama3',
        messages: [
          { role: 'system', content: 'sys' },
          { role: 'user', content: 'hi' },
        ],
        options: { num_predict: 50, temperature: 0.7 },
      });
    });
  });

  describe('ProviderContentGenerator', () => {
    function fakeProvider(chat: LLMProvider['chat']): LLMProvider {
      return {
        initialize: vi.fn().mockResolvedValue(undefined),
        chat,
        shutdown: vi.fn().mockResolvedValue(undefined),
        getModelInfo: () => ({ name: 'test-model', contextLength: 1000, isLocal: true }),
      };
    }

    it('should send one user message with the generator system prompt', async () => {
      const chat = vi.fn().mockResolvedValue({
        content: '<<<KEY_FEATURE: Search>>>',
        stopReason: 'end_turn',
        usage: { inputTokens: 1, outputTokens: 1 },
      });
      const generator = new ProviderContentGenerator(fakeProvider(chat));

      await expect(generator.generate('list features')).resolves.toBe('<<<KEY_FEATURE: Search>>>');
      expect(chat).toHaveBeenCalledWith([{ role: 'user', content: 'list features' }], {
        systemPrompt: GENERATOR_SYSTEM_PROMPT,
        maxTokens: 8192,
        temperature: undefined,
      });
    });

    it('should wrap provider failures as TRANSPORT_ERROR', async () => {
      const generator = new ProviderContentGenerator(fakeProvider(vi.fn().mockRejectedValue(new Error('boom'))));

      let caught: unknown;
      try {
        await generator.generate('x');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(PipelineError);
      expect(caught).toMatchObject({ code: 'TRANSPORT_ERROR', message: 'Generation with test-model failed: boom' });
    });

    it('should be wired from provider options by createContentGenerator', async () => {
      create.mockResolvedValueOnce(textMessage('reply'));

      const generator = await createContentGenerator({ apiKey: 'test-secret', model: 'claude-test', maxTokens: 256 });

      await expect(generator.generate('prompt')).resolves.toBe('reply');
      expect(create).toHaveBeenCalledWith(expect.objectContaining({ model: 'claude-test', max_tokens: 256 }));
      await generator.close();
    });

    it('should pass the temperature and request timeout through', async () => {
      create.mockResolvedValueOnce(textMessage('reply'));

      const generator = await createContentGenerator({ apiKey: 'test-secret', temperature: 0.2, timeoutMs: 30000 });
      await generator.generate('prompt');

      expect(anthropicConstructor).toHaveBeenCalledWith({ apiKey: 'test-secret', timeout: 30000 });
      expect(create).toHaveBeenCalledWith(expect.objectContaining({ temperature: 0.2 }));
    });
  });
});
