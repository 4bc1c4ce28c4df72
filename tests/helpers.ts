/**
 * Shared test helpers
 *
 * Temp directories, tool response parsing and deterministic providers.
 * Providers implement the real capability interfaces; nothing is patched.
 *
 * @module tests/helpers
 */

import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { LoadedDocument } from '../src/models/document.js';
import { checkSqliteVec } from '../src/server/startup.js';
import type { EmbeddingProvider } from '../src/services/embedding/provider.js';
import { tokenize } from '../src/services/embedding/hashing.js';
import type { LanguageModelProvider } from '../src/services/llm/provider.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE-VEC AVAILABILITY CHECK
// ═══════════════════════════════════════════════════════════════════════════════

export const sqliteVecAvailable = checkSqliteVec().available;

if (!sqliteVecAvailable) {
  console.warn('WARNING: sqlite-vec extension not available. Index tests will be skipped.');
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/** Prefix shared with tests/global-teardown.ts */
export const TEMP_DIR_PREFIX = 'docchat-test-';

export function createTempDir(label: string = ''): string {
  return mkdtempSync(join(tmpdir(), `${TEMP_DIR_PREFIX}${label}`));
}

export function cleanupTempDir(dir: string): void {
  try {
    if (existsSync(dir)) {
      rmSync(dir, { recursive: true, force: true });
    }
  } catch {
    // Ignore cleanup errors in tests
  }
}

export const CORPUS_DIR = fileURLToPath(new URL('./fixtures/corpus', import.meta.url));

export function doc(text: string, sourceId: string): LoadedDocument {
  return { text, sourceId };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ParsedToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    status: number;
    client_error: boolean;
    recovery: { tool: string; hint: string };
    details?: Record<string, unknown>;
  };
}

export function parseResponse(response: {
  content: Array<{ type: string; text: string }>;
}): ParsedToolResponse {
  return JSON.parse(response.content[0].text);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Language model that answers from a script. Reformulation prompts and
 * answer prompts are told apart by their trailing cue.
 */
export class ScriptedLanguageModel implements LanguageModelProvider {
  readonly name = 'scripted';
  readonly prompts: string[] = [];

  constructor(
    private readonly script: {
      reformulate?: (prompt: string) => string | Promise<string>;
      answer?: (prompt: string) => string | Promise<string>;
    } = {}
  ) {}

  get reformulationPrompts(): string[] {
    return this.prompts.filter(isReformulationPrompt);
  }

  get answerPrompts(): string[] {
    return this.prompts.filter((p) => !isReformulationPrompt(p));
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (isReformulationPrompt(prompt)) {
      return this.script.reformulate ? this.script.reformulate(prompt) : 'standalone question';
    }
    return this.script.answer ? this.script.answer(prompt) : 'test answer';
  }
}

function isReformulationPrompt(prompt: string): boolean {
  return prompt.endsWith('Standalone question:');
}

/**
 * One dimension per topic word plus a constant bias dimension. A text's
 * vector counts its topic words, so texts on different topics are nearly
 * orthogonal and texts on the same topic are identical.
 */
export class TopicEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  documentCalls = 0;
  embeddedTexts: string[] = [];

  constructor(private readonly topics: readonly string[]) {
    this.dimensions = topics.length + 1;
    this.name = `topic:${this.dimensions}`;
  }

  embed(text: string): Float32Array {
    const vector = new Float32Array(this.dimensions);
    for (const token of tokenize(text)) {
      const i = this.topics.indexOf(token);
      if (i >= 0) vector[i] += 1;
    }
    vector[this.topics.length] = 0.1;
    return vector;
  }

  async embedDocuments(texts: string[]): Promise<Float32Array[]> {
    this.documentCalls++;
    this.embeddedTexts.push(...texts);
    return texts.map((t) => this.embed(t));
  }

  async embedQuery(text: string): Promise<Float32Array> {
    return this.embed(text);
  }
}

/**
 * Provider whose document embedding misbehaves in a chosen way
 */
export class BrokenEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions = 4;

  constructor(
    private readonly mode: 'throw' | 'short-batch' | 'wrong-dimension',
    readonly name: string = 'broken:4'
  ) {}

  async embedDocuments(texts: string[]): Promise<Float32Array[]> {
    switch (this.mode) {
      case 'throw':
        throw new Error('provider unavailable');
      case 'short-batch':
        return texts.slice(1).map(() => new Float32Array([1, 0, 0, 0]));
      case 'wrong-dimension':
        return texts.map(() => new Float32Array([1, 0, 0]));
    }
  }

  async embedQuery(): Promise<Float32Array> {
    return new Float32Array([1, 0, 0, 0]);
  }
}
