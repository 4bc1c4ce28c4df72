/**
 * Maximal Marginal Relevance selection
 *
 * Greedy re-ranking of a candidate pool:
 *   mmr(c) = λ·sim(c, query) − (1 − λ)·max_{s ∈ S} sim(c, s)
 * with the second term 0 while S is empty. λ = 1 degenerates to plain
 * top-k by query similarity; λ = 0 ignores relevance after the first pick.
 *
 * Ties: higher query similarity, then earlier position in the pool.
 *
 * @module services/search/mmr
 */

import type { RetrievalCandidate, RetrievedChunk } from '../../models/chunk.js';
import { InvalidParameterError } from '../errors.js';
import { cosineSimilarity } from '../../utils/math.js';

export interface MmrParams {
  k: number;
  fetchK: number;
  lambdaMult: number;
}

export const DEFAULT_MMR_PARAMS: MmrParams = {
  k: 5,
  fetchK: 20,
  lambdaMult: 0.5,
};

/**
 * @throws InvalidParameterError when k <= 0, fetchK < k, λ outside [0, 1],
 * or k / fetchK not integers
 */
export function validateMmrParams(k: number, fetchK: number, lambdaMult: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidParameterError(`k must be a positive integer, got ${k}`, { k });
  }
  if (!Number.isInteger(fetchK) || fetchK < k) {
    throw new InvalidParameterError(`fetch_k must be an integer >= k (${k}), got ${fetchK}`, {
      k,
      fetchK,
    });
  }
  if (!Number.isFinite(lambdaMult) || lambdaMult < 0 || lambdaMult > 1) {
    throw new InvalidParameterError(`lambda_mult must be within [0, 1], got ${lambdaMult}`, {
      lambdaMult,
    });
  }
}

/**
 * Select up to k candidates by MMR.
 *
 * @param candidates - Pool in fetch order; `score` is the query similarity
 * @returns Selected chunks in selection order. Fewer than k when the pool
 * holds fewer distinct fingerprints.
 */
export function mmrSelect(
  candidates: readonly RetrievalCandidate[],
  k: number,
  lambdaMult: number
): RetrievedChunk[] {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidParameterError(`k must be a positive integer, got ${k}`, { k });
  }
  if (!Number.isFinite(lambdaMult) || lambdaMult < 0 || lambdaMult > 1) {
    throw new InvalidParameterError(`lambda_mult must be within [0, 1], got ${lambdaMult}`, {
      lambdaMult,
    });
  }

  // Distinct by fingerprint, first occurrence wins
  const seen = new Set<string>();
  const pool: RetrievalCandidate[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.chunk.fingerprint)) continue;
    seen.add(candidate.chunk.fingerprint);
    pool.push(candidate);
  }

  const limit = Math.min(k, pool.length);
  const selected: RetrievedChunk[] = [];
  const taken = new Array<boolean>(pool.length).fill(false);
  // maxRedundancy[i] = max similarity of pool[i] to anything selected so far
  const maxRedundancy = new Array<number>(pool.length).fill(Number.NEGATIVE_INFINITY);

  while (selected.length < limit) {
    let bestIndex = -1;
    let bestScore = Number.NEGATIVE_INFINITY;

    for (let i = 0; i < pool.length; i++) {
      if (taken[i]) continue;
      const redundancy = selected.length === 0 ? 0 : maxRedundancy[i];
      const score = lambdaMult * pool[i].score - (1 - lambdaMult) * redundancy;

      if (bestIndex === -1 || score > bestScore) {
        bestIndex = i;
        bestScore = score;
      } else if (score === bestScore && pool[i].score > pool[bestIndex].score) {
        // Equal MMR score: prefer the more relevant; equal relevance keeps the earlier one
        bestIndex = i;
      }
    }

    const chosen = pool[bestIndex];
    taken[bestIndex] = true;
    selected.push({ chunk: chosen.chunk, score: chosen.score, rank: selected.length });

    for (let i = 0; i < pool.length; i++) {
      if (taken[i]) continue;
      const similarity = cosineSimilarity(pool[i].vector, chosen.vector);
      if (similarity > maxRedundancy[i]) {
        maxRedundancy[i] = similarity;
      }
    }
  }

  return selected;
}
