/**
 * LLM Error Types
 *
 * One subclass per failure kind so callers can discriminate with
 * `instanceof` or the matching guard.
 */

import { type LLMProvider, type LLMErrorInfo, LLMErrorCode } from './types.js';

// =============================================================================
// Base LLM Error Class
// =============================================================================

export class LLMError extends Error {
  readonly info: LLMErrorInfo;

  constructor(info: LLMErrorInfo) {
    super(info.message);
    this.name = 'LLMError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }

  get code(): LLMErrorCode {
    return this.info.code;
  }

  get provider(): LLMProvider {
    return this.info.provider;
  }

  static fromError(error: unknown, provider: LLMProvider): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';

    return new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message,
      provider,
      originalError: error,
    });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

export class RateLimitError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({ code: LLMErrorCode.RATE_LIMIT, message, provider, originalError });
    this.name = 'RateLimitError';
  }
}

export class AuthenticationError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({ code: LLMErrorCode.AUTH_ERROR, message, provider, originalError });
    this.name = 'AuthenticationError';
  }
}

export class InvalidRequestError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({ code: LLMErrorCode.INVALID_REQUEST, message, provider, originalError });
    this.name = 'InvalidRequestError';
  }
}

export class ModelNotFoundError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({ code: LLMErrorCode.MODEL_NOT_FOUND, message, provider, originalError });
    this.name = 'ModelNotFoundError';
  }
}

/**
 * The request exceeded its timeout. Folded into UPSTREAM_TIMEOUT at the
 * service boundary (matched by name).
 */
export class TimeoutError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({ code: LLMErrorCode.TIMEOUT, message, provider, originalError });
    this.name = 'TimeoutError';
  }
}

export class ServerError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({ code: LLMErrorCode.SERVER_ERROR, message, provider, originalError });
    this.name = 'ServerError';
  }
}

export class NetworkError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({ code: LLMErrorCode.NETWORK_ERROR, message, provider, originalError });
    this.name = 'NetworkError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}
