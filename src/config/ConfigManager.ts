import dotenv from 'dotenv';
import path from 'path';
import { AppConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { TIME } from './constants.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    this.loadEnvFile();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadEnvFile(): void {
    dotenv.config({ path: process.env.ENV_FILE || defaultConfig.telegram.envFile });
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Server configuration
    config.server.port = this.getNumber('PORT', config.server.port);
    config.server.host = this.getString('HOST', config.server.host);
    config.server.env = this.getEnum('NODE_ENV', config.server.env, [
      'development',
      'production',
      'test',
    ]);

    // Media tooling
    config.media.ytDlpPath = this.getString('YTDLP_PATH', config.media.ytDlpPath);
    config.media.ffmpegPath = this.getOptionalString('FFMPEG_PATH');
    config.media.cookiesFile = this.getOptionalString('COOKIES_FILE');

    // Artifact storage
    config.storage.tempDir = path.resolve(this.getString('TEMP_DIR', config.storage.tempDir));
    config.storage.retentionMs =
      this.getNumber('FILE_RETENTION_MINUTES', config.storage.retentionMs / TIME.ONE_MINUTE) *
      TIME.ONE_MINUTE;
    config.storage.servedGraceMs =
      this.getNumber('FILE_SERVED_GRACE_SECONDS', config.storage.servedGraceMs / TIME.ONE_SECOND) *
      TIME.ONE_SECOND;

    // Telegram bot (optional)
    config.telegram.botToken = this.getOptionalString('TELEGRAM_BOT');
    config.telegram.envFile = this.getString('ENV_FILE', config.telegram.envFile);
    const owner = this.getOptionalString('TELEGRAM_OWNER');
    if (owner !== undefined) {
      config.telegram.ownerId = this.getNumber('TELEGRAM_OWNER');
    }

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
  }

  private getOptionalString(key: string): string | undefined {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
  }

  private getNumber(key: string, defaultValue?: number): number {
    const value = process.env[key];
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    const parsed = Number(value.trim());
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(candidate => candidate === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  reload(): void {
    this.loadEnvFile();
    this.config = this.loadConfig();
  }

  validate(): void {
    const errors: string[] = [];

    const { ownerId } = this.config.telegram;
    if (ownerId !== undefined && !Number.isSafeInteger(ownerId)) {
      errors.push('TELEGRAM_OWNER must be an integer user id');
    }

    if (this.config.storage.retentionMs <= 0) {
      errors.push('FILE_RETENTION_MINUTES must be positive');
    }

    if (this.config.storage.servedGraceMs < 0) {
      errors.push('FILE_SERVED_GRACE_SECONDS cannot be negative');
    }

    if (!this.config.telegram.botToken) {
      console.warn('TELEGRAM_BOT not provided - Telegram bot will be disabled');
    }

    if (errors.length > 0) {
      throw new ConfigurationError('environment', `Configuration validation failed:\n${errors.join('\n')}`);
    }
  }
}
