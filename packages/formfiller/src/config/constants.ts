/** Defaults shared by the configuration schema and the engine. */

// Matching
export const DEFAULT_FUZZY_MATCH_THRESHOLD = 80;
export const MIN_FUZZY_MATCH_THRESHOLD = 0;
export const MAX_FUZZY_MATCH_THRESHOLD = 100;

// Browser
export const DEFAULT_ELEMENT_TIMEOUT_MS = 5_000;
export const MAX_FIELD_NAME_LENGTH = 100;

// Model
export const DEFAULT_LLM_PROVIDER = 'ollama';
export const DEFAULT_LLM_TEMPERATURE = 0;
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;
export const DEFAULT_LLM_MAX_RETRIES = 3;
export const MAX_LLM_RETRIES = 10;
export const DEFAULT_LLM_RETRY_BASE_DELAY_MS = 1_000;
export const DEFAULT_LLM_RETRY_MAX_DELAY_MS = 60_000;
export const DEFAULT_LLM_RETRY_EXPONENTIAL_BASE = 2;
export const DEFAULT_LLM_MAX_OUTPUT_TOKENS = 512;

// Resume
export const DEFAULT_MAX_RESUME_CHARS = 12_000;
export const MAX_RESUME_FILE_BYTES = 10_000_000;

// Generation cache
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_CACHE_MAX_SIZE = 1_000;

export const DEFAULT_ENV_PREFIX = 'FORM_FILLING_';
