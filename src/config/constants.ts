/**
 * Application-wide Constants
 *
 * Centralized location for magic numbers and fixed policy values.
 */

/**
 * Time durations in milliseconds
 */
export const TIME = {
  /** 1 second */
  ONE_SECOND: 1000,
  /** 4 seconds */
  FOUR_SECONDS: 4000,
  /** 5 seconds */
  FIVE_SECONDS: 5000,
  /** 1 minute */
  ONE_MINUTE: 60000,
  /** 1 hour */
  ONE_HOUR: 3600000,
} as const;

export const BYTES_PER_MB = 1024 * 1024;

/**
 * Format selection policy
 */
export const FORMAT_SELECTION = {
  /** Choices offered per mode per request */
  MAX_CHOICES: 5,
  /** Container required for video choices and bot downloads */
  VIDEO_CONTAINER: 'mp4',
  /** Audio bitrate dedup bucket width (kbps) */
  AUDIO_BUCKET_KBPS: 10,
  /** Raw size inflation approximating audio muxing overhead */
  SIZE_INFLATION: 1.15,
  /** Bot fallback resolution when nothing fits the ceiling */
  SAFE_HEIGHT: 720,
} as const;

/**
 * Output containers
 */
export const OUTPUT = {
  VIDEO_EXT: 'mp4',
  AUDIO_EXT: 'mp3',
  /** Audio track preferred when merging into mp4 */
  PREFERRED_AUDIO_EXT: 'm4a',
  /** Lookup order when serving a retained file */
  LOOKUP_ORDER: ['mp4', 'mp3'],
} as const;

/**
 * Telegram delivery
 */
export const TELEGRAM = {
  /** Upload ceiling for bot replies */
  MAX_FILE_BYTES: 50 * BYTES_PER_MB,
  /** Presence indicator refresh interval */
  CHAT_ACTION_INTERVAL: TIME.FOUR_SECONDS,
  /** Env key the owner id is stored under */
  OWNER_ENV_KEY: 'TELEGRAM_OWNER',
} as const;

/**
 * HTTP configuration
 */
export const HTTP = {
  /** Thumbnail proxy upstream timeout */
  THUMBNAIL_TIMEOUT: 15 * TIME.ONE_SECOND,
  /** Browser cache lifetime for proxied thumbnails (seconds) */
  THUMBNAIL_MAX_AGE: TIME.ONE_HOUR / 1000,
} as const;
