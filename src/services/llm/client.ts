/**
 * Ollama Language Model Client
 *
 * Connects to a locally running Ollama instance; no API key required.
 * Used for both LLM calls of a chat turn (reformulation and answer).
 *
 * Start Ollama and pull a chat model before use:
 *   ollama serve
 *   ollama pull llama3.2
 *
 * @module services/llm/client
 */

import { z } from 'zod';
import { type OllamaConfig, type OllamaConfigOverrides, loadOllamaConfig } from './config.js';
import { CircuitBreaker, CircuitBreakerOpenError, isServerError } from './circuit-breaker.js';
import { postOllamaJson } from './http.js';
import type { LanguageModelProvider } from './provider.js';
import { withRetry } from '../../utils/backoff.js';

export { CircuitBreakerOpenError };

// ---- Shared circuit breaker ----
let _sharedCircuitBreaker: CircuitBreaker | null = null;

/**
 * One breaker per process for every client of the Ollama server.
 */
export function getSharedCircuitBreaker(config: {
  failureThreshold: number;
  recoveryTimeMs: number;
}): CircuitBreaker {
  if (!_sharedCircuitBreaker) {
    _sharedCircuitBreaker = new CircuitBreaker(config);
  }
  return _sharedCircuitBreaker;
}

/** Reset shared state (for testing) */
export function resetSharedCircuitBreaker(): void {
  _sharedCircuitBreaker = null;
}

const OllamaGenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string().default(''),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

export class OllamaLanguageModel implements LanguageModelProvider {
  readonly name: string;
  private readonly config: OllamaConfig;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(configOverrides?: OllamaConfigOverrides) {
    this.config = loadOllamaConfig(configOverrides);
    this.name = `ollama:${this.config.chatModel}`;
    this.circuitBreaker = getSharedCircuitBreaker(this.config.circuitBreaker);
  }

  /**
   * Single non-streaming completion via /api/generate
   */
  async generate(prompt: string): Promise<string> {
    const startTime = Date.now();

    const data = await this.circuitBreaker.execute(() =>
      withRetry(
        () =>
          postOllamaJson(
            this.config.baseUrl,
            '/api/generate',
            {
              model: this.config.chatModel,
              prompt,
              stream: false,
              options: {
                temperature: this.config.temperature,
                num_predict: this.config.maxOutputTokens,
              },
            },
            OllamaGenerateResponseSchema,
            this.config.requestTimeoutMs
          ),
        isServerError,
        { ...this.config.retry, label: 'OllamaClient' }
      )
    );

    console.error(
      `[OllamaClient] generate model=${this.config.chatModel} prompt_tokens=${data.prompt_eval_count ?? 0} output_tokens=${data.eval_count ?? 0} ms=${Date.now() - startTime}`
    );
    return data.response;
  }

  getStatus(): {
    model: string;
    baseUrl: string;
    circuitBreaker: ReturnType<CircuitBreaker['getStatus']>;
  } {
    return {
      model: this.config.chatModel,
      baseUrl: this.config.baseUrl,
      circuitBreaker: this.circuitBreaker.getStatus(),
    };
  }
}
