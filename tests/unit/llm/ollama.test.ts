/**
 * Unit Tests for the Ollama clients and the shared circuit breaker
 *
 * fetch is stubbed per test; no server is contacted.
 *
 * @module tests/unit/llm/ollama
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OllamaEmbeddingClient } from '../../../src/services/embedding/ollama.js';
import { EmbeddingError } from '../../../src/services/embedding/provider.js';
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  isServerError,
} from '../../../src/services/llm/circuit-breaker.js';
import { OllamaLanguageModel, resetSharedCircuitBreaker } from '../../../src/services/llm/client.js';
import { LanguageModelError } from '../../../src/services/llm/provider.js';

const BASE_URL = 'http://ollama.test:11434';

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestBody(init: RequestInit | undefined): Record<string, unknown> {
  return JSON.parse(String(init?.body));
}

// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER
// ═══════════════════════════════════════════════════════════════════════════════

describe('isServerError', () => {
  it('counts 429 and 5xx statuses', () => {
    expect(isServerError(new LanguageModelError('busy', 429))).toBe(true);
    expect(isServerError(new LanguageModelError('down', 503))).toBe(true);
    expect(isServerError(new LanguageModelError('missing model', 404))).toBe(false);
  });

  it('counts transport failures', () => {
    expect(isServerError(new Error('fetch failed'))).toBe(true);
    expect(isServerError(new Error('request timed out after 10ms'))).toBe(true);
    const refused = Object.assign(new Error('connect'), { code: 'ECONNREFUSED' });
    expect(isServerError(new Error('request failed', { cause: refused }))).toBe(true);
  });

  it('ignores other errors and non-errors', () => {
    expect(isServerError(new Error('Unexpected response shape'))).toBe(false);
    expect(isServerError('503')).toBe(false);
  });
});

describe('CircuitBreaker', () => {
  const serverFailure = () => Promise.reject(new LanguageModelError('down', 503));

  it('opens after the failure threshold', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, recoveryTimeMs: 60000 });

    await expect(breaker.execute(serverFailure)).rejects.toThrow('down');
    expect(breaker.getStatus().state).toBe('CLOSED');
    await expect(breaker.execute(serverFailure)).rejects.toThrow('down');
    expect(breaker.getStatus().state).toBe('OPEN');

    const fn = vi.fn(async () => 'never');
    await expect(breaker.execute(fn)).rejects.toThrow(CircuitBreakerOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('ignores client errors', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 });
    await expect(
      breaker.execute(() => Promise.reject(new LanguageModelError('bad model', 404)))
    ).rejects.toThrow('bad model');
    expect(breaker.getStatus()).toMatchObject({ state: 'CLOSED', failureCount: 0 });
  });

  it('resets the failure count on success', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2 });
    await expect(breaker.execute(serverFailure)).rejects.toThrow();
    await breaker.execute(async () => 'ok');
    await expect(breaker.execute(serverFailure)).rejects.toThrow();
    expect(breaker.getStatus().state).toBe('CLOSED');
  });

  it('closes again after a successful half-open call', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, recoveryTimeMs: 20 });
    await expect(breaker.execute(serverFailure)).rejects.toThrow();
    expect(breaker.isOpen()).toBe(true);

    await new Promise((r) => setTimeout(r, 30));
    expect(breaker.getStatus().state).toBe('HALF_OPEN');
    await expect(breaker.execute(async () => 'recovered')).resolves.toBe('recovered');
    expect(breaker.getStatus().state).toBe('CLOSED');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// OLLAMA CLIENTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('Ollama clients', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    resetSharedCircuitBreaker();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    resetSharedCircuitBreaker();
  });

  describe('OllamaLanguageModel', () => {
    function model(): OllamaLanguageModel {
      return new OllamaLanguageModel({
        baseUrl: BASE_URL,
        chatModel: 'test-chat',
        retry: { maxAttempts: 1 },
        circuitBreaker: { failureThreshold: 2, recoveryTimeMs: 60000 },
      });
    }

    it('posts a non-streaming generate request', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ model: 'test-chat', response: 'Hello there', done: true }));

      const llm = model();
      await expect(llm.generate('Say hello')).resolves.toBe('Hello there');
      expect(llm.name).toBe('ollama:test-chat');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(`${BASE_URL}/api/generate`);
      expect(requestBody(init)).toMatchObject({ model: 'test-chat', prompt: 'Say hello', stream: false });
    });

    it('reports HTTP errors with their status', async () => {
      fetchMock.mockResolvedValue(new Response('model "test-chat" not found', { status: 404, statusText: 'Not Found' }));

      const error = await model().generate('hi').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(LanguageModelError);
      expect(error).toMatchObject({
        status: 404,
        message: 'Ollama API error 404: Not Found. model "test-chat" not found',
      });
    });

    it('rejects responses of the wrong shape', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ response: 42 }));
      await expect(model().generate('hi')).rejects.toThrow('Unexpected Ollama /api/generate response');
    });

    it('wraps a body that is not JSON', async () => {
      fetchMock.mockResolvedValue(new Response('<html>proxy error</html>', { status: 200 }));

      const error = await model().generate('hi').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(LanguageModelError);
      expect(error).toMatchObject({ status: 200 });
      expect(error instanceof Error && error.message).toMatch(
        /^Ollama \/api\/generate returned a body that is not JSON: /
      );
      expect(error instanceof Error && error.cause).toBeInstanceOf(SyntaxError);
    });

    it('stops calling the server once the breaker opens', async () => {
      fetchMock.mockImplementation(async () => new Response('', { status: 503, statusText: 'Service Unavailable' }));
      const llm = model();

      await expect(llm.generate('a')).rejects.toThrow(LanguageModelError);
      await expect(llm.generate('b')).rejects.toThrow(LanguageModelError);
      await expect(llm.generate('c')).rejects.toThrow(CircuitBreakerOpenError);

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(llm.getStatus().circuitBreaker.state).toBe('OPEN');
    });

    it('retries transient failures', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('', { status: 503, statusText: 'Service Unavailable' }))
        .mockResolvedValueOnce(jsonResponse({ response: 'second try' }));

      const llm = new OllamaLanguageModel({
        baseUrl: BASE_URL,
        retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 2 },
      });
      await expect(llm.generate('hi')).resolves.toBe('second try');
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('OllamaEmbeddingClient', () => {
    it('prefixes nomic inputs and batches requests', async () => {
      fetchMock.mockImplementation(async (_url, init) => {
        const input = requestBody(init).input;
        const count = Array.isArray(input) ? input.length : 0;
        return jsonResponse({ embeddings: Array.from({ length: count }, (_, i) => [i, 1, 0]) });
      });

      const client = new OllamaEmbeddingClient({
        baseUrl: BASE_URL,
        embedModel: 'nomic-embed-text',
        embedBatchSize: 2,
        retry: { maxAttempts: 1 },
      });
      const vectors = await client.embedDocuments(['one', 'two', 'three']);

      expect(vectors.map((v) => Array.from(v))).toEqual([
        [0, 1, 0],
        [1, 1, 0],
        [0, 1, 0],
      ]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(requestBody(fetchMock.mock.calls[0][1])).toEqual({
        model: 'nomic-embed-text',
        input: ['search_document: one', 'search_document: two'],
      });
      expect(client.dimensions).toBe(3);
      expect(client.name).toBe('ollama:nomic-embed-text');
    });

    it('uses the query prefix for queries', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ embeddings: [[0.5, 0.5]] }));

      const client = new OllamaEmbeddingClient({
        baseUrl: BASE_URL,
        embedModel: 'nomic-embed-text',
        retry: { maxAttempts: 1 },
      });
      const vector = await client.embedQuery('where is it');

      expect(Array.from(vector)).toEqual([0.5, 0.5]);
      expect(requestBody(fetchMock.mock.calls[0][1]).input).toEqual(['search_query: where is it']);
    });

    it('sends texts unchanged for other models', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ embeddings: [[1, 0]] }));

      const client = new OllamaEmbeddingClient({
        baseUrl: BASE_URL,
        embedModel: 'mxbai-embed-large',
        retry: { maxAttempts: 1 },
      });
      await client.embedDocuments(['plain']);
      expect(requestBody(fetchMock.mock.calls[0][1]).input).toEqual(['plain']);
    });

    it('rejects a response with the wrong number of embeddings', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ embeddings: [[1, 0]] }));

      const client = new OllamaEmbeddingClient({ baseUrl: BASE_URL, retry: { maxAttempts: 1 } });
      await expect(client.embedDocuments(['a', 'b'])).rejects.toMatchObject({
        name: 'EmbeddingError',
        code: 'COUNT_MISMATCH',
      });
    });

    it('wraps transport failures in EmbeddingError', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      const client = new OllamaEmbeddingClient({ baseUrl: BASE_URL, retry: { maxAttempts: 1 } });
      const error = await client.embedQuery('q').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({
        code: 'EMBEDDING_FAILED',
        message: 'Ollama embedding failed: Ollama request to /api/embed failed: fetch failed',
      });
    });
  });
});
