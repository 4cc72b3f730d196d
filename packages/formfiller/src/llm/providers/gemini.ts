import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { ProviderSettings, TextGenerator } from '../types.js';

export class GeminiGenerator implements TextGenerator {
  readonly provider: string;
  readonly model: string;
  private readonly client: GenerativeModel;

  constructor(settings: ProviderSettings) {
    this.provider = settings.providerId;
    this.model = settings.model;
    const genAI = new GoogleGenerativeAI(settings.apiKey ?? '');
    this.client = genAI.getGenerativeModel(
      {
        model: settings.model,
        generationConfig: {
          temperature: settings.temperature,
          maxOutputTokens: settings.maxOutputTokens,
        },
      },
      { timeout: settings.timeoutMs },
    );
  }

  async generate(prompt: string): Promise<string> {
    const result = await this.client.generateContent(prompt);
    return result.response.text().trim();
  }
}

export const createGeminiGenerator = (settings: ProviderSettings): TextGenerator =>
  new GeminiGenerator(settings);
