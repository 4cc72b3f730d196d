// --------------------------------------------------------------------------
// Error types
// --------------------------------------------------------------------------

export type ErrorContext = Record<string, unknown>;

export type FormFillingErrorCode =
  | 'configuration_error'
  | 'element_not_interactable'
  | 'no_field_name'
  | 'no_match_found'
  | 'generation_failed'
  | 'file_not_found'
  | 'resource_error';

function formatContextValue(value: unknown): string {
  if (typeof value !== 'object' || value === null) return String(value);
  try {
    return JSON.stringify(value);
  } catch {
    // circular structures
    return String(value);
  }
}

export class FormFillingError extends Error {
  public readonly context: ErrorContext;

  constructor(
    message: string,
    public readonly code: FormFillingErrorCode,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FormFillingError';
    this.context = { ...context };
  }

  override toString(): string {
    const entries = Object.entries(this.context);
    if (entries.length === 0) return `${this.name}: ${this.message}`;
    const contextStr = entries.map(([k, v]) => `${k}=${formatContextValue(v)}`).join(', ');
    return `${this.name}: ${this.message} (context: ${contextStr})`;
  }
}

export class ConfigurationError extends FormFillingError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'configuration_error', context);
    this.name = 'ConfigurationError';
  }
}

/** The browser layer refused an action: detached, hidden, disabled or timed out. */
export class ElementNotInteractableError extends FormFillingError {
  constructor(fieldName: string, cause: unknown, context: ErrorContext = {}) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Element "${fieldName}" is not interactable: ${reason}`, 'element_not_interactable', { fieldName, ...context }, { cause });
    this.name = 'ElementNotInteractableError';
  }
}

export class NoFieldNameError extends FormFillingError {
  constructor(context: ErrorContext = {}) {
    super('No field name could be derived from the element', 'no_field_name', context);
    this.name = 'NoFieldNameError';
  }
}

export class NoMatchFoundError extends FormFillingError {
  constructor(fieldName: string, context: ErrorContext = {}) {
    super(`No known value matches field "${fieldName}"`, 'no_match_found', { fieldName, ...context });
    this.name = 'NoMatchFoundError';
  }
}

export class GenerationError extends FormFillingError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, 'generation_failed', context, { cause });
    this.name = 'GenerationError';
  }
}

export class FileNotFoundError extends FormFillingError {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`, 'file_not_found', { filePath });
    this.name = 'FileNotFoundError';
  }
}

export class ResourceError extends FormFillingError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, 'resource_error', context, { cause });
    this.name = 'ResourceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
