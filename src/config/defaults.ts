import os from 'os';
import { AppConfig } from './types.js';
import { TIME } from './constants.js';

export const defaultConfig: AppConfig = {
  server: {
    port: 8080,
    host: '0.0.0.0',
    env: 'development',
  },
  media: {
    ytDlpPath: 'yt-dlp',
  },
  storage: {
    tempDir: os.tmpdir(),
    retentionMs: 10 * TIME.ONE_MINUTE,
    servedGraceMs: TIME.FIVE_SECONDS,
  },
  telegram: {
    envFile: '.env',
  },
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
