import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);
const lowercase = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

const apiKey = z.preprocess(blankToUndefined, z.string().min(1).optional());

const envSchema = z.object({
  NODE_ENV: z.preprocess(
    (value) => lowercase(blankToUndefined(value)),
    z.enum(['development', 'staging', 'production', 'test']).default('development'),
  ),
  // Unknown levels fall back to the logger default.
  LOG_LEVEL: z
    .preprocess((value) => lowercase(blankToUndefined(value)), z.enum(['debug', 'info', 'warn', 'error']).optional())
    .catch(undefined),
  ANTHROPIC_API_KEY: apiKey,
  OPENAI_API_KEY: apiKey,
  GEMINI_API_KEY: apiKey,
  GROQ_API_KEY: apiKey,
  DEEPSEEK_API_KEY: apiKey,
  MISTRAL_API_KEY: apiKey,
  NVIDIA_API_KEY: apiKey,
  OPENROUTER_API_KEY: apiKey,
  OLLAMA_API_KEY: apiKey,
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    loadDotenv();
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, {
        config_key: parsed.error.issues[0]?.path.join('.'),
        issues,
      });
    }
    _env = parsed.data;
  }
  return _env;
}

/** Drop the cached env so the next `getEnv()` re-reads `process.env`. */
export function resetEnv(): void {
  _env = null;
}
