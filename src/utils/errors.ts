// src/utils/errors.ts

export class KeyServiceError extends Error {
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

// Configuration errors
export class ConfigError extends KeyServiceError {
  constructor(message: string, public errors: string[] = [], details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', { ...details, errors });
  }
}

export class InvalidBaseURLError extends KeyServiceError {
  constructor(baseURL: string, details?: Record<string, unknown>) {
    super(`invalid base URL "${baseURL}"`, 'INVALID_BASE_URL', { ...details, baseURL });
  }
}

export class UnsupportedSchemeError extends KeyServiceError {
  constructor(
    public scheme: string,
    details?: Record<string, unknown>
  ) {
    super(`unsupported protocol scheme "${scheme}"`, 'UNSUPPORTED_SCHEME', { ...details, scheme });
  }
}

// Request errors
export class RequestConstructionError extends KeyServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REQUEST_CONSTRUCTION_FAILED', details);
  }
}
