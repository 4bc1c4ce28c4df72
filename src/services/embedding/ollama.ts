/**
 * OllamaEmbeddingClient - embeddings from a local Ollama server via /api/embed
 *
 * Texts are sent in batches of `embedBatchSize`. nomic-embed-text models get
 * their task prefixes (search_document / search_query) so documents and
 * queries land in the intended halves of the embedding space.
 *
 * @module services/embedding/ollama
 */

import { z } from 'zod';
import { type OllamaConfig, type OllamaConfigOverrides, loadOllamaConfig } from '../llm/config.js';
import { getSharedCircuitBreaker } from '../llm/client.js';
import { type CircuitBreaker, isServerError } from '../llm/circuit-breaker.js';
import { postOllamaJson } from '../llm/http.js';
import { withRetry } from '../../utils/backoff.js';
import { EmbeddingError, type EmbeddingProvider, assertEmbeddingBatch } from './provider.js';

const OllamaEmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

function usesNomicPrefixes(model: string): boolean {
  return model.toLowerCase().includes('nomic');
}

export class OllamaEmbeddingClient implements EmbeddingProvider {
  readonly name: string;
  private readonly config: OllamaConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private _dimensions: number | undefined;

  constructor(configOverrides?: OllamaConfigOverrides) {
    this.config = loadOllamaConfig(configOverrides);
    this.name = `ollama:${this.config.embedModel}`;
    this.circuitBreaker = getSharedCircuitBreaker(this.config.circuitBreaker);
  }

  /** Known after the first successful call */
  get dimensions(): number | undefined {
    return this._dimensions;
  }

  async embedDocuments(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }
    const prefix = usesNomicPrefixes(this.config.embedModel) ? 'search_document: ' : '';
    const batchSize = this.config.embedBatchSize;
    const vectors: Float32Array[] = [];

    for (let start = 0; start < texts.length; start += batchSize) {
      const batch = texts.slice(start, start + batchSize).map((t) => prefix + t);
      const embedded = await this.embedBatch(batch);
      vectors.push(...embedded);
      if (texts.length > batchSize) {
        console.error(
          `[OllamaEmbedding] Embedded ${Math.min(start + batchSize, texts.length)}/${texts.length}`
        );
      }
    }

    this._dimensions = assertEmbeddingBatch(vectors, texts.length, this._dimensions ?? null);
    return vectors;
  }

  async embedQuery(text: string): Promise<Float32Array> {
    const prefix = usesNomicPrefixes(this.config.embedModel) ? 'search_query: ' : '';
    const [vector] = await this.embedBatch([prefix + text]);
    this._dimensions = assertEmbeddingBatch([vector], 1, this._dimensions ?? null);
    return vector;
  }

  private async embedBatch(input: string[]): Promise<Float32Array[]> {
    let data: z.infer<typeof OllamaEmbedResponseSchema>;
    try {
      data = await this.circuitBreaker.execute(() =>
        withRetry(
          () =>
            postOllamaJson(
              this.config.baseUrl,
              '/api/embed',
              { model: this.config.embedModel, input },
              OllamaEmbedResponseSchema,
              this.config.requestTimeoutMs
            ),
          isServerError,
          { ...this.config.retry, label: 'OllamaEmbedding' }
        )
      );
    } catch (error) {
      throw new EmbeddingError(
        `Ollama embedding failed: ${error instanceof Error ? error.message : String(error)}`,
        'EMBEDDING_FAILED',
        { model: this.config.embedModel, batchSize: input.length },
        { cause: error }
      );
    }

    if (data.embeddings.length !== input.length) {
      throw new EmbeddingError(
        `Ollama returned ${data.embeddings.length} embeddings for ${input.length} inputs`,
        'COUNT_MISMATCH',
        { expected: input.length, actual: data.embeddings.length }
      );
    }
    return data.embeddings.map((values) => Float32Array.from(values));
  }
}
