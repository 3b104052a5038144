export class RuminateError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'RuminateError';
  }
}

export class ConfigurationError extends RuminateError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ModelError extends RuminateError {
  constructor(message: string, public modelName?: string, public status?: number) {
    super(message, 'MODEL_ERROR');
    this.name = 'ModelError';
  }
}

export class RequestValidationError extends RuminateError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'INVALID_REQUEST');
    this.name = 'RequestValidationError';
  }
}

/**
 * Raised inside the execution adapter only. The adapter turns it into
 * captured output before returning, so callers never see it.
 */
export class ExecutionError extends RuminateError {
  constructor(message: string, public source?: string) {
    super(message, 'EXECUTION_ERROR');
    this.name = 'ExecutionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
