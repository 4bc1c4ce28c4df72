/**
 * Language model capability: prompt in, text out.
 *
 * @module services/llm/provider
 */

export interface LanguageModelProvider {
  /** Provider/model label for logs and health output */
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

/**
 * Any failure talking to the language model. The orchestrator wraps it in a
 * GenerationError tagged with the stage that failed.
 */
export class LanguageModelError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LanguageModelError';
  }
}
