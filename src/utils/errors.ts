// src/utils/errors.ts

export class PersonaError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration and input errors (raised before any network call)
export class ConfigError extends PersonaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export class InputError extends PersonaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', details);
  }
}

// Reddit errors
export class AuthError extends PersonaError {
  constructor(message: string = 'Reddit rejected the client credentials', details?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', details);
  }
}

export class NotFoundError extends PersonaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
  }
}

// API errors
export class ApiError extends PersonaError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

// Network errors
export class NetworkError extends PersonaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class NormalizationError extends PersonaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NORMALIZATION_ERROR', details);
  }
}

// Synthesis errors
export class EmptyInputError extends PersonaError {
  constructor(message: string = 'No posts or comments to analyze', details?: Record<string, unknown>) {
    super(message, 'EMPTY_INPUT', details);
  }
}

export class UpstreamError extends PersonaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UPSTREAM_ERROR', details);
  }
}

// Output errors
export class OutputError extends PersonaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OUTPUT_ERROR', details);
  }
}

const EXIT_CODES: Record<string, number> = {
  CONFIG_ERROR: 2,
  INPUT_ERROR: 2,
  AUTH_ERROR: 3,
  NOT_FOUND: 4,
  API_ERROR: 5,
  API_CLIENT_ERROR: 5,
  API_SERVER_ERROR: 5,
  NETWORK_ERROR: 5,
  NETWORK_TIMEOUT: 5,
  NORMALIZATION_ERROR: 5,
  EMPTY_INPUT: 6,
  UPSTREAM_ERROR: 7,
  OUTPUT_ERROR: 8,
};

/**
 * Map an error to the process exit code. Unknown errors exit with 1.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof PersonaError) {
    return EXIT_CODES[error.code] ?? 1;
  }
  return 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
