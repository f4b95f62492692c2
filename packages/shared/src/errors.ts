export interface ErrorOptions {
  code?: string | undefined;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    options: ErrorOptions & {
      statusCode?: number | undefined;
      isOperational?: boolean | undefined;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.statusCode = options.statusCode ?? 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      ...(this.context ? { context: this.context } : {}),
    };
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "NOT_FOUND",
      statusCode: 404,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}

/**
 * Raised when model output is not JSON or does not satisfy the analysis
 * contract.
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "VALIDATION_ERROR",
      statusCode: 400,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}

/**
 * Missing credentials, missing selection mode, malformed settings. Fatal to
 * the whole invocation.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "CONFIGURATION_ERROR",
      statusCode: 500,
      isOperational: false,
      cause: options.cause,
      context: options.context,
    });
  }
}

export class ExternalServiceError extends AppError {
  constructor(
    message = "External service failure",
    options: ErrorOptions = {},
  ) {
    super(message, {
      code: options.code ?? "EXTERNAL_SERVICE_ERROR",
      statusCode: 502,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}

export class PersistenceError extends AppError {
  constructor(message = "Persistence failure", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "PERSISTENCE_ERROR",
      statusCode: 500,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
