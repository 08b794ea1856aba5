/**
 * Error types for the manuscript engine
 *
 * Every error thrown by a core module extends ManuscriptError, carries a
 * stable code and a context object for reporting.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class
 */
export class ManuscriptError extends Error {
  public code: string;
  public readonly context?: ErrorContext;
  public readonly timestamp: Date;

  constructor(message: string, code: string, context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Version Store Errors
// ============================================================================

export class VersionNotFoundError extends ManuscriptError {
  public readonly sectionId: string;
  public readonly requestedVersion?: number;
  public readonly available: number[];

  constructor(sectionId: string, requestedVersion: number | undefined, available: number[]) {
    const what = requestedVersion === undefined
      ? `Section '${sectionId}' has no versions`
      : `Version ${requestedVersion} of section '${sectionId}' not found`;
    const hint = available.length > 0
      ? ` (available: ${available.join(', ')})`
      : '';

    super(`${what}${hint}`, 'VERSION_NOT_FOUND', { sectionId, requestedVersion, available });
    this.sectionId = sectionId;
    this.requestedVersion = requestedVersion;
    this.available = available;
  }
}

export class StorageError extends ManuscriptError {
  constructor(operation: string, target: string, cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(
      `Storage ${operation} failed for ${target}: ${causeMessage}`,
      'STORAGE_ERROR',
      { operation, target, cause: causeMessage }
    );
  }
}

export class LockTimeoutError extends ManuscriptError {
  constructor(key: string, timeoutMs: number) {
    super(`Lock acquisition timeout for '${key}' after ${timeoutMs}ms`, 'LOCK_TIMEOUT', { key, timeoutMs });
  }
}

// ============================================================================
// Context Errors
// ============================================================================

export class ContextOverflowError extends ManuscriptError {
  public readonly requiredTokens: number;
  public readonly budgetTokens: number;

  constructor(requiredTokens: number, budgetTokens: number) {
    super(
      `Objective and guidance need ${requiredTokens} tokens but the context budget is ${budgetTokens}; ` +
        'shorten the guidance or raise the budget',
      'CONTEXT_OVERFLOW',
      { requiredTokens, budgetTokens }
    );
    this.requiredTokens = requiredTokens;
    this.budgetTokens = budgetTokens;
  }
}

export class SourceNotFoundError extends ManuscriptError {
  constructor(sourceId: string) {
    super(`Source not found: ${sourceId}`, 'SOURCE_NOT_FOUND', { sourceId });
  }
}

export class SectionNotInOutlineError extends ManuscriptError {
  constructor(sectionId: string, known: string[]) {
    super(
      `Section '${sectionId}' is not in the outline` + (known.length > 0 ? ` (known: ${known.join(', ')})` : ''),
      'SECTION_NOT_IN_OUTLINE',
      { sectionId, known }
    );
  }
}

// ============================================================================
// Citation Errors
// ============================================================================

/**
 * Warning-level condition. Returned in reports, never thrown by render.
 */
export class UnresolvedCitationWarning extends ManuscriptError {
  public readonly keys: string[];

  constructor(keys: string[], sectionId?: string) {
    super(
      `Unresolved citation keys${sectionId ? ` in '${sectionId}'` : ''}: ${keys.join(', ')}`,
      'UNRESOLVED_CITATION',
      { keys, sectionId }
    );
    this.keys = keys;
  }
}

export class InvalidCitationKeyError extends ManuscriptError {
  constructor(key: string) {
    super(`Invalid citation key: '${key}'`, 'INVALID_CITATION_KEY', { key });
  }
}

export class CitationInUseError extends ManuscriptError {
  constructor(key: string) {
    super(`Citation '${key}' is still referenced by a section snapshot`, 'CITATION_IN_USE', { key });
  }
}

// ============================================================================
// Generative Service Errors
// ============================================================================

export type GenerativeFailureKind = 'rate_limited' | 'timeout' | 'service_error';

export class GenerativeServiceError extends ManuscriptError {
  public readonly kind: GenerativeFailureKind;
  public readonly provider: string;
  public readonly retryable: boolean;

  constructor(
    kind: GenerativeFailureKind,
    provider: string,
    message: string,
    retryable: boolean,
    context?: ErrorContext
  ) {
    super(message, 'GENERATIVE_SERVICE_ERROR', { ...context, kind, provider });
    this.kind = kind;
    this.provider = provider;
    this.retryable = retryable;
  }
}

export class RateLimitedError extends GenerativeServiceError {
  public readonly retryAfterMs?: number;

  constructor(provider: string, retryAfterMs?: number) {
    super(
      'rate_limited',
      provider,
      `Rate limit exceeded for ${provider}` + (retryAfterMs !== undefined ? `; retry after ${retryAfterMs}ms` : ''),
      true,
      { retryAfterMs }
    );
    this.retryAfterMs = retryAfterMs;
  }
}

export class GenerationTimeoutError extends GenerativeServiceError {
  constructor(provider: string, timeoutMs: number) {
    super('timeout', provider, `${provider} request timed out after ${timeoutMs}ms`, true, { timeoutMs });
  }
}

export class ServiceError extends GenerativeServiceError {
  public readonly statusCode?: number;

  constructor(provider: string, message: string, statusCode?: number) {
    super(
      'service_error',
      provider,
      statusCode !== undefined ? `${provider} error (status ${statusCode}): ${message}` : `${provider} error: ${message}`,
      statusCode === undefined || statusCode >= 500,
      { statusCode }
    );
    this.statusCode = statusCode;
  }
}

export class GenerationCancelledError extends ManuscriptError {
  constructor(provider: string) {
    super(`${provider} request was cancelled`, 'GENERATION_CANCELLED', { provider });
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends ManuscriptError {
  constructor(message: string, issues: Array<{ field: string; message: string }> = []) {
    super(message, 'CONFIGURATION_ERROR', { issues });
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isManuscriptError(error: unknown): error is ManuscriptError {
  return error instanceof ManuscriptError;
}

/**
 * Convert any thrown value to a ManuscriptError
 */
export function toManuscriptError(error: unknown, defaultMessage = 'Unknown error'): ManuscriptError {
  if (isManuscriptError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ManuscriptError(error.message, 'UNKNOWN_ERROR', {
      originalError: error.message,
      stack: error.stack,
    });
  }

  return new ManuscriptError(defaultMessage, 'UNKNOWN_ERROR', { originalError: String(error) });
}
