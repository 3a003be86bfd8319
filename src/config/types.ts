export interface ServerConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
}

export interface MediaToolConfig {
  /** yt-dlp executable (name on PATH or absolute path) */
  ytDlpPath: string;
  /** Passed as --ffmpeg-location when set */
  ffmpegPath?: string | undefined;
  /** Netscape cookie file passed as --cookies when it exists */
  cookiesFile?: string | undefined;
}

export interface StorageConfig {
  /** Directory holding in-flight and retained artifacts */
  tempDir: string;
  /** Safety-net deletion delay for artifacts nobody fetched */
  retentionMs: number;
  /** Deletion delay after an artifact has been served */
  servedGraceMs: number;
}

export interface TelegramConfig {
  botToken?: string | undefined;
  ownerId?: number | undefined;
  /** Env-style file the owner id is persisted to */
  envFile: string;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  server: ServerConfig;
  media: MediaToolConfig;
  storage: StorageConfig;
  telegram: TelegramConfig;
  logging: LoggingConfig;
}
