/**
 * MmrRetriever - binds a session index, an embedding provider and MMR
 * parameters into a query → chunks function.
 *
 * @module services/search/retriever
 */

import type { RetrievedChunk } from '../../models/chunk.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { SessionIndex } from '../storage/session-index.js';
import { type MmrParams, mmrSelect, validateMmrParams } from './mmr.js';

export class MmrRetriever {
  readonly params: Readonly<MmrParams>;

  constructor(
    readonly index: SessionIndex,
    private readonly embeddingProvider: EmbeddingProvider,
    params: MmrParams
  ) {
    validateMmrParams(params.k, params.fetchK, params.lambdaMult);
    this.params = { ...params };
  }

  /**
   * Embed the query, fetch fetchK nearest neighbours, re-rank with MMR
   */
  async retrieve(query: string): Promise<RetrievedChunk[]> {
    return this.selectByVector(await this.embedQuery(query));
  }

  embedQuery(query: string): Promise<Float32Array> {
    return this.embeddingProvider.embedQuery(query);
  }

  /**
   * Index lookup and MMR for an already embedded query. Synchronous, so a
   * caller holding a session read lock never waits on the provider inside it.
   */
  selectByVector(queryVector: Float32Array): RetrievedChunk[] {
    const candidates = this.index.searchSimilar(queryVector, this.params.fetchK);
    const selected = mmrSelect(candidates, this.params.k, this.params.lambdaMult);

    console.error(
      `[Retriever] session=${this.index.sessionId} pool=${candidates.length} selected=${selected.length} k=${this.params.k} fetch_k=${this.params.fetchK} lambda=${this.params.lambdaMult}`
    );
    return selected;
  }

  /**
   * Plain top-k by query similarity, no diversification
   */
  async similaritySearch(query: string, k: number = this.params.k): Promise<RetrievedChunk[]> {
    const queryVector = await this.embeddingProvider.embedQuery(query);
    return this.index
      .searchSimilar(queryVector, k)
      .map((candidate, rank) => ({ chunk: candidate.chunk, score: candidate.score, rank }));
  }
}
