/**
 * Media Pipeline Errors
 *
 * Raised by platform detection, metadata fetching and format selection.
 * Download failures are not thrown: they travel as `error` progress events.
 */

import { ApplicationError, ErrorCode, ErrorContext, ValidationError } from './ApplicationError.js';

/**
 * The URL does not belong to a supported platform (HTTP 400)
 */
export class UnsupportedPlatformError extends ValidationError {
  constructor(public readonly url: string, context?: ErrorContext) {
    super(
      'Unsupported platform. Use a YouTube, TikTok, or Instagram link.',
      { ...context, metadata: { ...context?.metadata, url } },
      undefined,
      ErrorCode.MEDIA_UNSUPPORTED_PLATFORM
    );
  }
}

/**
 * yt-dlp could not be started or exited non-zero in metadata mode (HTTP 502)
 */
export class MetadataFetchError extends ApplicationError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, ErrorCode.MEDIA_METADATA_FAILED, 502, {
      isOperational: true,
      retryable: false,
      context: { ...context, metadata: { ...context?.metadata, exitCode } },
      ...(cause && { cause }),
    });
  }
}

/**
 * yt-dlp succeeded but its output is not a metadata document we understand (HTTP 502)
 */
export class MetadataParseError extends ApplicationError {
  constructor(context?: ErrorContext, cause?: Error) {
    super('Unparseable metadata', ErrorCode.MEDIA_METADATA_INVALID, 502, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * No candidate format survives selection (HTTP 422)
 */
export class NoSuitableFormatError extends ApplicationError {
  constructor(message = 'No suitable format found', context?: ErrorContext) {
    super(message, ErrorCode.MEDIA_NO_SUITABLE_FORMAT, 422, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
    });
  }
}
