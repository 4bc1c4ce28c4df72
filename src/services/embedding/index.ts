/**
 * Embedding provider selection
 *
 * @module services/embedding
 */

import { HashingEmbeddingProvider } from './hashing.js';
import { OllamaEmbeddingClient } from './ollama.js';
import type { EmbeddingProvider } from './provider.js';

export type EmbeddingProviderKind = 'ollama' | 'hashing';

export function createEmbeddingProvider(kind: EmbeddingProviderKind): EmbeddingProvider {
  switch (kind) {
    case 'ollama':
      return new OllamaEmbeddingClient();
    case 'hashing':
      return new HashingEmbeddingProvider();
  }
}

// Singleton so every tool call shares one client (and its dimension cache)
let _provider: EmbeddingProvider | null = null;
let _providerKind: EmbeddingProviderKind | null = null;

export function getEmbeddingProvider(kind: EmbeddingProviderKind): EmbeddingProvider {
  if (_provider === null || _providerKind !== kind) {
    _provider = createEmbeddingProvider(kind);
    _providerKind = kind;
    console.error(`[Embedding] Provider initialized: ${_provider.name}`);
  }
  return _provider;
}

/** Replace the provider (tests inject fakes here) */
export function setEmbeddingProvider(provider: EmbeddingProvider, kind: EmbeddingProviderKind): void {
  _provider = provider;
  _providerKind = kind;
}

export function resetEmbeddingProvider(): void {
  _provider = null;
  _providerKind = null;
}

export { HashingEmbeddingProvider, DEFAULT_HASHING_DIMENSIONS, fnv1a, tokenize } from './hashing.js';
export { OllamaEmbeddingClient } from './ollama.js';
export {
  EmbeddingError,
  assertEmbeddingBatch,
  type EmbeddingErrorCode,
  type EmbeddingProvider,
} from './provider.js';
