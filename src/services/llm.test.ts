import { afterEach, describe, it, expect, vi } from 'vitest';
import { LLMService, parseJsonText } from './llm.js';
import { ConfigError, GenerationError } from '../types/errors.js';

const { generateText } = vi.hoisted(() => ({ generateText: vi.fn() }));

vi.mock('ai', () => ({ generateText }));
vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: () => (modelId: string) => ({ provider: 'openai', modelId }),
}));

function service(maxRetries = 1) {
  return new LLMService({
    provider: 'openai',
    model: 'gpt-4o',
    apiKey: 'test-secret',
    maxRetries,
    retryDelayMs: 0,
  });
}

function completion(text: string) {
  return { text, usage: { inputTokens: 10, outputTokens: 5 } };
}

describe('LLMService', () => {
  afterEach(() => {
    generateText.mockReset();
  });

  it('returns the model text from a deterministic call', async () => {
    generateText.mockResolvedValueOnce(completion('{"columns": []}'));

    const text = await service().generate('pick columns');

    expect(text).toBe('{"columns": []}');
    expect(generateText).toHaveBeenCalledTimes(1);
    expect(generateText.mock.calls[0][0]).toMatchObject({
      prompt: 'pick columns',
      temperature: 0,
      maxRetries: 0,
      model: { provider: 'openai', modelId: 'gpt-4o' },
    });
  });

  it('retries a failed call', async () => {
    generateText
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(completion('{"sort_by": []}'));

    expect(await service().generate('sort')).toBe('{"sort_by": []}');
    expect(generateText).toHaveBeenCalledTimes(2);
  });

  it('raises GenerationError once every attempt has failed', async () => {
    generateText.mockRejectedValue(new Error('socket hang up'));

    const error = await service(2).generate('sort').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ message: 'LLM API failed after 3 attempts: Error: socket hang up' });
    expect(generateText).toHaveBeenCalledTimes(3);
  });

  it('makes a single attempt when retries are disabled', async () => {
    generateText.mockRejectedValue(new Error('timeout'));

    await expect(service(0).generate('sort')).rejects.toBeInstanceOf(GenerationError);
    expect(generateText).toHaveBeenCalledTimes(1);
  });

  it('requires an API key for the configured provider', async () => {
    const keyless = new LLMService({ provider: 'anthropic', model: 'claude-sonnet-4-0' });

    await expect(keyless.generate('pick columns')).rejects.toThrow(
      new ConfigError('ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic')
    );
    expect(generateText).not.toHaveBeenCalled();
  });
});

describe('parseJsonText', () => {
  it('parses plain JSON', () => {
    expect(parseJsonText('{"columns": ["a"]}')).toEqual({ columns: ['a'] });
  });

  it('strips a surrounding code fence', () => {
    expect(parseJsonText('```json\n{"sort_by": null}\n```')).toEqual({ sort_by: null });
    expect(parseJsonText('```\n{"sort_by": []}\n```')).toEqual({ sort_by: [] });
  });

  it('throws on prose', () => {
    expect(() => parseJsonText('Here are the columns you asked for')).toThrow(SyntaxError);
  });
});
