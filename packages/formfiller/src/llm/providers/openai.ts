import OpenAI from 'openai';
import type { ProviderSettings, TextGenerator } from '../types.js';

/**
 * Chat-completions client. Also serves every OpenAI-compatible endpoint
 * (Ollama, Groq, DeepSeek, Mistral, NVIDIA, OpenRouter) through `baseUrl`.
 */
export class OpenAIGenerator implements TextGenerator {
  readonly provider: string;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(private readonly settings: ProviderSettings) {
    this.provider = settings.providerId;
    this.model = settings.model;
    this.client = new OpenAI({
      // Local endpoints such as Ollama ignore the key but the SDK insists on one.
      apiKey: settings.apiKey ?? settings.providerId,
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: this.settings.temperature,
      max_tokens: this.settings.maxOutputTokens,
    });

    return (completion.choices[0]?.message?.content ?? '').trim();
  }
}

export const createOpenAIGenerator = (settings: ProviderSettings): TextGenerator =>
  new OpenAIGenerator(settings);
