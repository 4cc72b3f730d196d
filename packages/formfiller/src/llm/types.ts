/**
 * Model provider contract.
 *
 * Every backend (Anthropic, OpenAI, Gemini, OpenAI-compatible endpoints)
 * is reduced to one capability: turn a prompt into text. The engine only
 * ever sees a `TextGenerator`.
 */

export interface TextGenerator {
  /** Provider id from the catalog, e.g. "anthropic" or "ollama". */
  readonly provider: string;
  /** Model identifier sent to the API. */
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

/** Everything a factory needs to build a client; resolved once at construction. */
export interface ProviderSettings {
  providerId: string;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export type ProviderFactory = (settings: ProviderSettings) => TextGenerator;
