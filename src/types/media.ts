/**
 * Media pipeline domain types
 */

export type Platform = 'youtube' | 'tiktok' | 'instagram' | 'unknown';

export type SupportedPlatform = Exclude<Platform, 'unknown'>;

/**
 * Result of platform detection. For 'unknown', `url` is empty.
 */
export interface MediaReference {
  readonly platform: Platform;
  readonly url: string;
}

/**
 * One downloadable format as reported by yt-dlp
 */
export interface FormatCandidate {
  readonly formatId: string;
  /** Container extension (mp4, webm, m4a, ...) */
  readonly containerExt: string;
  /** Pixel height; 0 for audio-only or unknown */
  readonly height: number;
  /** null when yt-dlp does not report a codec */
  readonly videoCodec: string | null;
  readonly audioCodec: string | null;
  /** Audio bitrate (abr, falling back to tbr); 0 when unknown */
  readonly bitrateKbps: number;
  readonly sizeBytes: number | null;
  readonly approxSizeBytes: number | null;
}

/**
 * A format offered to the user
 */
export interface FormatChoice {
  formatId: string;
  /** "720p" for video, "128 kbps" for audio */
  qualityLabel: string;
  height?: number;
  bitrateKbps?: number;
  estimatedSizeBytes: number | null;
}

export interface MediaMetadata {
  id: string;
  title: string;
  uploaderName: string;
  durationSeconds: number;
  thumbnailUrl: string;
  formats: FormatCandidate[];
}

export type DownloadMode = 'video' | 'audio';

export type OutputExt = 'mp4' | 'mp3';

export type ProgressStage =
  | 'downloading_video'
  | 'downloading_audio'
  | 'merging'
  | 'converting'
  | 'done'
  | 'error';

/**
 * Progress update emitted by a download run.
 * `percent` is -1 while a stage has no measurable progress.
 */
export interface ProgressEvent {
  stage: ProgressStage;
  percent: number;
  fileId?: string;
  ext?: OutputExt;
  /** Human-readable failure text; only on 'error' */
  error?: string;
}

export interface DownloadRequest {
  mode: DownloadMode;
  formatId: string;
  url: string;
  /** Defaults to a fresh UUID */
  fileId?: string;
  /** Size ceiling for the finished artifact */
  maxBytes?: number;
  /** Names the ceiling in size errors ("Limit is 50 MB."); defaults to "Limit" */
  limitLabel?: string;
  signal?: AbortSignal;
}

export interface RetainedFile {
  fileId: string;
  path: string;
  ext: OutputExt;
  createdAt: Date;
}
