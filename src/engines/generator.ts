/**
 * Generation collaborator.
 *
 * The conversation core depends only on the `Generator` interface. The
 * Anthropic-backed implementation and the deterministic fallback satisfy the
 * same contract, and `generateWithFallback` is the single call site that turns
 * a failure or timeout into empty text for the payload guard to backfill.
 */

import { logger } from '../utils/logger.js';
import { GenerationError, GenerationErrorCode, LLMClient } from './llm-client.js';

export interface GenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  timeoutMs: number;
}

export interface Generator {
  readonly name: string;
  /** False when the generator is not configured at all, as opposed to failing */
  isAvailable(): boolean;
  generate(request: GenerationRequest): Promise<string>;
}

export interface GenerationOutcome {
  text: string;
  fellBack: boolean;
  reason: string | null;
}

export class AnthropicGenerator implements Generator {
  readonly name = 'anthropic';

  constructor(private readonly client: LLMClient) {}

  isAvailable(): boolean {
    return this.client.isAvailable();
  }

  async generate(request: GenerationRequest): Promise<string> {
    const response = await this.client.generate(request);
    return response.content;
  }
}

/**
 * Produces no text, so every payload comes from the guard's templates
 */
export class FallbackGenerator implements Generator {
  readonly name = 'fallback';

  isAvailable(): boolean {
    return false;
  }

  async generate(_request: GenerationRequest): Promise<string> {
    return '';
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new GenerationError(`Generation timed out after ${timeoutMs}ms`, GenerationErrorCode.TIMEOUT)),
      timeoutMs
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Call the generator and never throw. Unavailable, failing, timed out or
 * empty generation all resolve to empty text with the reason recorded.
 */
export async function generateWithFallback(
  generator: Generator,
  request: GenerationRequest
): Promise<GenerationOutcome> {
  if (!generator.isAvailable()) {
    return { text: '', fellBack: true, reason: 'unavailable' };
  }

  try {
    const text = await withTimeout(generator.generate(request), request.timeoutMs);
    if (text.trim().length === 0) {
      return { text: '', fellBack: true, reason: 'empty' };
    }
    return { text, fellBack: false, reason: null };
  } catch (error) {
    const reason = error instanceof GenerationError ? error.code : 'error';
    logger.warn('Generation failed, using deterministic fallback', error, { generator: generator.name, reason });
    return { text: '', fellBack: true, reason };
  }
}
