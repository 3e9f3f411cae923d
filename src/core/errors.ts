export type ErrorStage = 'config' | 'analyze' | 'personalize' | 'generate' | 'predict' | 'storage';

export class VitalsenseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ErrorStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'VitalsenseError';
  }
}

/**
 * Missing credentials, missing pricing entries or an invalid config file.
 * The only error class that is allowed to reach callers of the orchestrator.
 */
export class ConfigurationError extends VitalsenseError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', 'config', cause);
    this.name = 'ConfigurationError';
  }
}

export class InsufficientDataError extends VitalsenseError {
  constructor(
    message: string,
    public readonly required: number,
    public readonly actual: number,
  ) {
    super(message, 'INSUFFICIENT_DATA', 'analyze');
    this.name = 'InsufficientDataError';
  }
}

export class LLMTimeoutError extends VitalsenseError {
  constructor(public readonly timeoutMs: number, public readonly provider: string) {
    super(`LLM call to ${provider} timed out after ${timeoutMs}ms`, 'LLM_TIMEOUT', 'generate');
    this.name = 'LLMTimeoutError';
  }
}

export class LLMProviderError extends VitalsenseError {
  constructor(message: string, public readonly provider: string, cause?: Error) {
    super(message, 'LLM_PROVIDER_ERROR', 'generate', cause);
    this.name = 'LLMProviderError';
  }
}

export class ParseError extends VitalsenseError {
  constructor(message: string, public readonly raw: string) {
    super(message, 'PARSE_ERROR', 'generate');
    this.name = 'ParseError';
  }
}

export class StorageError extends VitalsenseError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORAGE_ERROR', 'storage', cause);
    this.name = 'StorageError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
