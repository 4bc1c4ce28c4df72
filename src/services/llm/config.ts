/**
 * Ollama Provider Configuration
 *
 * One local Ollama server backs both capabilities:
 *   OLLAMA_CHAT_MODEL   — query reformulation and answer synthesis
 *   OLLAMA_EMBED_MODEL  — chunk and query embeddings
 *
 * No API key required.
 */

import { z } from 'zod';

export const OLLAMA_MODELS = {
  // Chat
  LLAMA3_2: 'llama3.2',
  QWEN2_5: 'qwen2.5',
  // Embeddings
  NOMIC_EMBED: 'nomic-embed-text',
  MXBAI_EMBED: 'mxbai-embed-large',
} as const;

// Configuration schema for Ollama
export const OllamaConfigSchema = z.object({
  // Ollama server
  baseUrl: z.string().url().default('http://localhost:11434'),

  // Chat model used for both LLM calls of a chat turn
  chatModel: z.string().min(1).default(OLLAMA_MODELS.LLAMA3_2),

  // Embedding model. Must stay fixed for the lifetime of a session index:
  // vectors from two models are not comparable.
  embedModel: z.string().min(1).default(OLLAMA_MODELS.NOMIC_EMBED),

  // Generation defaults
  maxOutputTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).default(0),

  // Per-request timeout
  requestTimeoutMs: z.number().int().positive().default(60_000),

  // Texts per /api/embed call
  embedBatchSize: z.number().int().min(1).max(512).default(64),

  // Retry configuration (transport-level only; callers decide about GenerationError)
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(2),
      baseDelayMs: z.number().default(500),
      maxDelayMs: z.number().default(10000),
    })
    .default({}),

  // Circuit breaker
  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().positive().default(5),
      recoveryTimeMs: z.number().int().positive().default(60000),
    })
    .default({}),
});

export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type OllamaConfigOverrides = Partial<z.input<typeof OllamaConfigSchema>>;

function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function parseFloatEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/**
 * Load Ollama configuration from environment variables.
 *
 * Environment variables:
 *   OLLAMA_BASE_URL           — Ollama server URL (default: http://localhost:11434)
 *   OLLAMA_CHAT_MODEL         — Chat model (default: llama3.2)
 *   OLLAMA_EMBED_MODEL        — Embedding model (default: nomic-embed-text)
 *   OLLAMA_TEMPERATURE        — Generation temperature (default: 0)
 *   OLLAMA_MAX_OUTPUT_TOKENS  — Answer token cap (default: 1024)
 *   OLLAMA_REQUEST_TIMEOUT_MS — Per-request timeout (default: 60000)
 *   OLLAMA_MAX_ATTEMPTS       — Attempts per request on transient errors (default: 2)
 */
export function loadOllamaConfig(overrides?: OllamaConfigOverrides): OllamaConfig {
  const envConfig = {
    baseUrl: process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434',
    chatModel: process.env.OLLAMA_CHAT_MODEL ?? OLLAMA_MODELS.LLAMA3_2,
    embedModel: process.env.OLLAMA_EMBED_MODEL ?? OLLAMA_MODELS.NOMIC_EMBED,
    maxOutputTokens: parseIntEnv('OLLAMA_MAX_OUTPUT_TOKENS', 1024),
    temperature: parseFloatEnv('OLLAMA_TEMPERATURE', 0),
    requestTimeoutMs: parseIntEnv('OLLAMA_REQUEST_TIMEOUT_MS', 60_000),
    retry: {
      maxAttempts: parseIntEnv('OLLAMA_MAX_ATTEMPTS', 2),
    },
  };

  return OllamaConfigSchema.parse({ ...envConfig, ...overrides });
}
