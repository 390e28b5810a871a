/**
 * LLM integration layer using AI SDK for provider-agnostic support.
 *
 * The pipeline only sees the GenerationService interface: a rendered prompt
 * goes in, the model's JSON text comes out. Tests swap in a deterministic
 * double.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { GenerationError, ConfigError } from '../types/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface GenerationService {
  /**
   * Send a fully rendered prompt and return the raw response text, which is
   * expected to be a single JSON object.
   */
  generate(prompt: string): Promise<string>;
}

export interface LLMConfig {
  provider: 'openai' | 'anthropic';
  model: string;
  apiKey?: string;
  maxTokens?: number;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /** Retries after a failed attempt; 0 disables retrying. */
  maxRetries?: number;
  /** Base for exponential backoff between attempts. */
  retryDelayMs?: number;
}

const SYSTEM_PROMPT =
  'Respond with a single JSON object only. Do not add explanations, comments or Markdown.';

/**
 * Service for interacting with LLM APIs via AI SDK.
 */
export class LLMService implements GenerationService {
  private model: LanguageModel | null = null;
  private modelPromise: Promise<LanguageModel> | null = null;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly log: Logger;

  constructor(private readonly config: LLMConfig, log: Logger = rootLogger) {
    this.maxTokens = config.maxTokens ?? 2048;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.maxRetries = config.maxRetries ?? 1;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.log = log.child({ component: 'llm' });
  }

  /**
   * Lazy initialization of LLM model
   */
  private async initializeModel(): Promise<LanguageModel> {
    if (this.model) {
      return this.model;
    }

    if (!this.modelPromise) {
      this.modelPromise = this.loadModel();
    }
    return this.modelPromise;
  }

  /**
   * Load the model based on provider configuration
   */
  private async loadModel(): Promise<LanguageModel> {
    const { provider, model: modelId, apiKey } = this.config;
    if (!apiKey) {
      const envKey = provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY';
      throw new ConfigError(`${envKey} is required when LLM_PROVIDER is ${provider}`);
    }

    this.log.info(`Initializing LLM: ${provider}/${modelId}`);

    switch (provider) {
      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        this.model = createOpenAI({ apiKey })(modelId);
        return this.model;
      }

      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        this.model = createAnthropic({ apiKey })(modelId);
        return this.model;
      }
    }
  }

  /**
   * Call the model at temperature 0 and return its text.
   *
   * Transport failures are retried up to maxRetries times with exponential
   * backoff; each attempt is bounded by timeoutMs. The content is never
   * inspected here, so a malformed answer is not retried.
   *
   * @throws GenerationError if every attempt fails
   */
  async generate(prompt: string): Promise<string> {
    const model = await this.initializeModel();
    const attempts = this.maxRetries + 1;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const result = await generateText({
          model,
          system: SYSTEM_PROMPT,
          prompt,
          temperature: 0,
          maxOutputTokens: this.maxTokens,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(this.timeoutMs),
        });

        this.log.info(
          `LLM API call successful - ` +
            `Input: ${result.usage.inputTokens}, ` +
            `Output: ${result.usage.outputTokens}`
        );
        return result.text;
      } catch (error) {
        this.log.warn(`LLM API call failed (attempt ${attempt + 1}/${attempts}): ${error}`);

        if (attempt < attempts - 1) {
          const waitTime = this.retryDelayMs * Math.pow(2, attempt);
          this.log.info(`Retrying in ${waitTime}ms...`);
          await new Promise((resolve) => setTimeout(resolve, waitTime));
        } else {
          throw new GenerationError(`LLM API failed after ${attempts} attempts: ${error}`);
        }
      }
    }

    // TypeScript requires this, but we'll never reach it due to the throw above
    throw new GenerationError('Unexpected error in generate');
  }
}

/**
 * Parse a model response as JSON, tolerating a surrounding Markdown code
 * fence.
 *
 * @throws SyntaxError if the text is not JSON
 */
export function parseJsonText(text: string): unknown {
  const cleaned = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');
  return JSON.parse(cleaned);
}
