/**
 * Raised (or returned) when caller-supplied input fails a precondition.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly fields: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when the legacy system fails to answer executeTask or getStatus.
 */
export class CollaboratorError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CollaboratorError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
