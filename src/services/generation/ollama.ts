/**
 * Ollama answer generator
 *
 * Posts prompts to a locally running Ollama instance (/api/generate,
 * non-streaming). No API key required.
 *
 *   ollama serve
 *   ollama pull llama3.1
 *
 * @module services/generation/ollama
 */

import { z } from 'zod';
import { BackoffConfig, RetriesExhaustedError, withRetry } from '../../utils/backoff.js';
import {
  buildAnswerPrompt,
  GenerationError,
  GenerationRequest,
  GenerationResult,
  Generator,
} from './generator.js';

export interface OllamaGeneratorConfig {
  baseUrl: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  requestTimeoutMs: number;
  retry?: Partial<BackoffConfig>;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

export const DEFAULT_OLLAMA_CONFIG = {
  baseUrl: 'http://localhost:11434',
  model: 'llama3.1',
  temperature: 0.1,
  maxOutputTokens: 1024,
  requestTimeoutMs: 120_000,
} as const satisfies OllamaGeneratorConfig;

const GenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

function isRetryable(error: unknown): boolean {
  return error instanceof GenerationError && error.retryable;
}

export class OllamaGenerator implements Generator {
  private readonly config: OllamaGeneratorConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: Partial<OllamaGeneratorConfig> = {}) {
    this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  get identity(): string {
    return `ollama:${this.config.model}`;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const prompt = buildAnswerPrompt(request);
    const start = Date.now();

    let text: string;
    try {
      text = await withRetry(() => this.callGenerate(prompt, request.signal), isRetryable, {
        label: 'OllamaGenerator',
        ...this.config.retry,
      });
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        throw new GenerationError(error.message, 'RETRIES_EXHAUSTED', null, { cause: error.lastError });
      }
      throw error;
    }

    return { text, model: this.config.model, processingTimeMs: Date.now() - start };
  }

  private async callGenerate(prompt: string, signal?: AbortSignal): Promise<string> {
    const url = `${this.config.baseUrl}/api/generate`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let rawResponse: Response;
    try {
      rawResponse = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          prompt,
          stream: false,
          options: {
            temperature: this.config.temperature,
            num_predict: this.config.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });
    } catch (error) {
      // Caller cancellation is final; our own timeout counts as a network failure
      if (signal?.aborted) throw error;
      throw new GenerationError(
        `Ollama request failed: ${error instanceof Error ? error.message : String(error)}`,
        'NETWORK_ERROR',
        null,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch((error: unknown) => {
        console.error('[OllamaGenerator] Could not read error body:', String(error));
        return '';
      });
      throw new GenerationError(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
        'HTTP_ERROR',
        rawResponse.status
      );
    }

    let body: unknown;
    try {
      body = await rawResponse.json();
    } catch (error) {
      throw new GenerationError('Ollama returned a body that is not JSON', 'INVALID_RESPONSE', null, {
        cause: error,
      });
    }
    const parsed = GenerateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GenerationError(
        `Ollama returned an unexpected body: ${parsed.error.errors.map((e) => e.message).join('; ')}`,
        'INVALID_RESPONSE'
      );
    }
    return parsed.data.response.trim();
  }
}
