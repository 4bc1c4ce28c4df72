/**
 * JSON POST against the Ollama HTTP API with a per-request timeout.
 * Responses are validated with the supplied zod schema.
 *
 * @module services/llm/http
 */

import type { z } from 'zod';
import { LanguageModelError } from './provider.js';

export async function postOllamaJson<S extends z.ZodTypeAny>(
  baseUrl: string,
  path: string,
  body: Record<string, unknown>,
  schema: S,
  timeoutMs: number
): Promise<z.infer<S>> {
  const url = `${baseUrl.replace(/\/+$/, '')}${path}`;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let rawResponse: Response;
  try {
    rawResponse = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new LanguageModelError(`Ollama request to ${path} timed out after ${timeoutMs}ms`, undefined, {
        cause: error,
      });
    }
    throw new LanguageModelError(
      `Ollama request to ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!rawResponse.ok) {
    const text = await rawResponse.text().catch(() => '');
    throw new LanguageModelError(
      `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${text.slice(0, 200)}`,
      rawResponse.status
    );
  }

  let json: unknown;
  try {
    json = await rawResponse.json();
  } catch (error) {
    throw new LanguageModelError(
      `Ollama ${path} returned a body that is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      rawResponse.status,
      { cause: error }
    );
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new LanguageModelError(
      `Unexpected Ollama ${path} response: ${parsed.error.errors.map((e) => e.message).join(', ')}`
    );
  }
  return parsed.data;
}
