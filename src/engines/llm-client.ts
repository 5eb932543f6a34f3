/**
 * Anthropic client used by the generation collaborator.
 *
 * The SDK is imported lazily so a deployment without an API key never loads it.
 * Retries are opt-in: `maxRetries` defaults to 0 and a failed call surfaces
 * immediately so the caller can take the deterministic fallback path.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { logger } from '../utils/logger.js';

export const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';

const DEFAULT_MAX_TOKENS = 4096;

export interface LLMClientConfig {
  apiKey: string | null;
  model?: string | null | undefined;
  maxRetries?: number | undefined;
}

export interface LLMRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  timeoutMs: number;
  maxTokens?: number | undefined;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export enum GenerationErrorCode {
  NO_API_KEY = 'NO_API_KEY',
  API_ERROR = 'API_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  TIMEOUT = 'TIMEOUT',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly code: GenerationErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}

const RETRY_CONFIG = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
} as const;

/**
 * Exponential backoff with jitter, capped at maxDelayMs
 */
export function calculateBackoffDelay(attempt: number): number {
  const exponentialDelay = RETRY_CONFIG.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, RETRY_CONFIG.maxDelayMs);
  const jitter = cappedDelay * RETRY_CONFIG.jitterFactor * (Math.random() - 0.5);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function hasStatus(error: unknown): error is { status: number; message?: unknown } {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'APIConnectionTimeoutError' || /timed? ?out/i.test(error.message));
}

/**
 * 408, 429 and 5xx are transient
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

export class LLMClient {
  private readonly apiKey: string | null;
  private readonly model: string;
  private readonly maxRetries: number;
  private client: Anthropic | null = null;

  constructor(config: LLMClientConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxRetries = config.maxRetries ?? 0;

    if (this.apiKey) {
      logger.info('LLM client initialized with API key', { model: this.model, maxRetries: this.maxRetries });
    } else {
      logger.debug('LLM client initialized without API key');
    }
  }

  isAvailable(): boolean {
    return this.apiKey !== null;
  }

  getModel(): string {
    return this.model;
  }

  private async getClient(): Promise<Anthropic> {
    if (!this.apiKey) {
      throw new GenerationError(
        'No API key available. Set ANTHROPIC_API_KEY or add anthropicApiKey to the config file.',
        GenerationErrorCode.NO_API_KEY
      );
    }

    if (!this.client) {
      try {
        const { default: AnthropicSdk } = await import('@anthropic-ai/sdk');
        // The client retries nothing by itself; retry policy lives in generate()
        this.client = new AnthropicSdk({ apiKey: this.apiKey, maxRetries: 0 });
        logger.debug('Anthropic client initialized');
      } catch (error) {
        throw new GenerationError(
          'Failed to initialize Anthropic SDK. Is @anthropic-ai/sdk installed?',
          GenerationErrorCode.CONFIGURATION_ERROR,
          error
        );
      }
    }

    return this.client;
  }

  /**
   * Generate text, retrying transient failures up to maxRetries times.
   *
   * @throws {GenerationError} when every attempt fails
   */
  async generate(request: LLMRequest): Promise<LLMResponse> {
    if (request.userPrompt.trim().length === 0) {
      throw new GenerationError('Prompt cannot be empty', GenerationErrorCode.CONFIGURATION_ERROR);
    }

    const startTime = Date.now();
    logger.debug('Starting LLM generation', {
      model: this.model,
      promptLength: request.userPrompt.length,
      timeoutMs: request.timeoutMs,
    });

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attemptGeneration(request, startTime);
      } catch (error: unknown) {
        const retryable = hasStatus(error) && isRetryableStatus(error.status);
        if (!retryable || attempt >= this.maxRetries) {
          throw this.wrapError(error, Date.now() - startTime);
        }

        const delayMs = calculateBackoffDelay(attempt);
        logger.warn('LLM generation failed, retrying', error, {
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delayMs,
        });
        await sleep(delayMs);
      }
    }
  }

  private async attemptGeneration(request: LLMRequest, startTime: number): Promise<LLMResponse> {
    const client = await this.getClient();

    const response = await client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: request.temperature,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }],
      },
      { timeout: request.timeoutMs }
    );

    const content = this.extractContent(response);

    logger.info('LLM generation completed', {
      model: this.model,
      elapsedMs: Date.now() - startTime,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      contentLength: content.length,
    });

    return {
      content,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  private wrapError(error: unknown, elapsedMs: number): GenerationError {
    if (error instanceof GenerationError) {
      return error;
    }

    if (isTimeout(error)) {
      logger.warn('LLM generation timed out', error, { elapsedMs });
      return new GenerationError('Generation timed out', GenerationErrorCode.TIMEOUT, error);
    }

    if (hasStatus(error)) {
      if (error.status === 429) {
        logger.warn('Rate limit exceeded', error, { elapsedMs });
        return new GenerationError('Rate limit exceeded. Please try again later.', GenerationErrorCode.RATE_LIMIT, error);
      }
      logger.warn('API error during generation', error, { status: error.status, elapsedMs });
      const message = typeof error.message === 'string' && error.message ? error.message : 'Unknown error';
      return new GenerationError(`API error: ${message}`, GenerationErrorCode.API_ERROR, error);
    }

    logger.warn('Unknown error during generation', error, { elapsedMs });
    return new GenerationError('Failed to generate response', GenerationErrorCode.API_ERROR, error);
  }

  private extractContent(response: Anthropic.Messages.Message): string {
    const textBlock = response.content.find(
      (block): block is Anthropic.Messages.TextBlock => block.type === 'text'
    );
    if (!textBlock?.text) {
      throw new GenerationError('Invalid API response: no text content found', GenerationErrorCode.INVALID_RESPONSE);
    }
    return textBlock.text;
  }
}
