export * from './types.js';
export * from './retry.js';
export * from './registry.js';
export { AnthropicGenerator } from './providers/anthropic.js';
export { OpenAIGenerator } from './providers/openai.js';
export { GeminiGenerator } from './providers/gemini.js';
