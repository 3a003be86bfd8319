/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - HTTP status code mapping
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',
  VALIDATION_SCHEMA_MISMATCH = 'VALIDATION_SCHEMA_MISMATCH',

  // Resources
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  // Media pipeline
  MEDIA_UNSUPPORTED_PLATFORM = 'MEDIA_UNSUPPORTED_PLATFORM',
  MEDIA_METADATA_FAILED = 'MEDIA_METADATA_FAILED',
  MEDIA_METADATA_INVALID = 'MEDIA_METADATA_INVALID',
  MEDIA_NO_SUITABLE_FORMAT = 'MEDIA_NO_SUITABLE_FORMAT',

  // Network
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',

  // Upstream providers (thumbnail CDNs)
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',

  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System
  SYSTEM_DEPENDENCY_MISSING = 'SYSTEM_DEPENDENCY_MISSING',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'fetchMetadata', 'proxyThumbnail') */
  operation?: string;

  /** Entity type being operated on (e.g., 'file', 'format') */
  entityType?: string;

  /** Entity ID if applicable */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

interface ApplicationErrorOptions {
  isOperational?: boolean;
  retryable?: boolean;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * HTTP status code for API responses
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether retrying the same operation could succeed
   */
  public readonly retryable: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: ApplicationErrorOptions = {}
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    const cause = this.cause instanceof Error ? this.cause : undefined;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: cause
        ? {
            name: cause.name,
            message: cause.message,
            stack: cause.stack,
          }
        : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS (4xx - Client Error)
// ============================================

export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    context?: ErrorContext,
    cause?: Error,
    code: ErrorCode = ErrorCode.VALIDATION_INPUT_INVALID
  ) {
    super(message, code, 400, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Schema validation failed: ${errors.length} error(s)`,
      { ...context, metadata: { ...context?.metadata, errors } },
      undefined,
      ErrorCode.VALIDATION_SCHEMA_MISMATCH
    );
  }
}

// ============================================
// RESOURCE ERRORS (4xx - Client Error)
// ============================================

export class ResourceNotFoundError extends ApplicationError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext
  ) {
    super(message || `${resourceType} not found: ${resourceId}`, ErrorCode.RESOURCE_NOT_FOUND, 404, {
      isOperational: true,
      retryable: false,
      context: { ...context, entityType: resourceType, entityId: resourceId },
    });
  }
}

// ============================================
// OPERATIONAL ERRORS (5xx)
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// Network Errors
export class NetworkError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, 503, true, { ...context, metadata: { ...context?.metadata, url } }, cause);
  }
}

export class TimeoutError extends NetworkError {
  constructor(
    public readonly timeoutMs: number,
    url?: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Operation timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      url,
      { ...context, durationMs: timeoutMs }
    );
  }
}

export class ConnectionError extends NetworkError {
  constructor(url: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(
      message || `Connection failed: ${url}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      url,
      context,
      cause
    );
  }
}

/**
 * Upstream answered with an error status. Surfaced to our clients as 502.
 */
export class ProviderServerError extends OperationalError {
  constructor(
    public readonly providerName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Upstream error (${httpStatusCode}): ${providerName}`,
      ErrorCode.PROVIDER_SERVER_ERROR,
      502,
      httpStatusCode >= 500,
      {
        ...context,
        service: providerName,
        metadata: { ...context?.metadata, httpStatusCode },
      },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (5xx - Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: false,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      500,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

export class DependencyError extends PermanentError {
  constructor(
    public readonly dependency: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Missing or invalid dependency: ${dependency}`,
      ErrorCode.SYSTEM_DEPENDENCY_MISSING,
      500,
      { ...context, metadata: { ...context?.metadata, dependency } }
    );
  }
}
