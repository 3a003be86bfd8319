/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors (4xx)
export {
  ValidationError,
  SchemaValidationError,
} from './ApplicationError.js';

// Resource errors (4xx)
export { ResourceNotFoundError } from './ApplicationError.js';

// Operational errors (5xx)
export {
  OperationalError,
  NetworkError,
  TimeoutError,
  ConnectionError,
  ProviderServerError,
} from './ApplicationError.js';

// Permanent errors (5xx)
export {
  PermanentError,
  ConfigurationError,
  DependencyError,
} from './ApplicationError.js';

// Media pipeline
export {
  UnsupportedPlatformError,
  MetadataFetchError,
  MetadataParseError,
  NoSuitableFormatError,
} from './mediaErrors.js';
