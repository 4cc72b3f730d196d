import Anthropic from '@anthropic-ai/sdk';
import type { ProviderSettings, TextGenerator } from '../types.js';

export class AnthropicGenerator implements TextGenerator {
  readonly provider: string;
  readonly model: string;
  private readonly client: Anthropic;

  constructor(private readonly settings: ProviderSettings) {
    this.provider = settings.providerId;
    this.model = settings.model;
    // Retries are handled by RetryingGenerator so backoff is configured in one place.
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.settings.maxOutputTokens,
      temperature: this.settings.temperature,
      messages: [{ role: 'user', content: prompt }],
    });

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  }
}

export const createAnthropicGenerator = (settings: ProviderSettings): TextGenerator =>
  new AnthropicGenerator(settings);
