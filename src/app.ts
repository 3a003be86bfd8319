import express from 'express';
import fs from 'fs-extra';
import { createServer, Server as HttpServer } from 'http';
import { ConfigManager } from './config/ConfigManager.js';
import type { AppConfig } from './config/types.js';
import { corsMiddleware, securityMiddleware } from './middleware/security.js';
import {
  errorLoggingMiddleware,
  initializeLogger,
  logger,
  requestLoggingMiddleware,
} from './middleware/logging.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { ApiRouterDeps, createApiRouter } from './routes/api.js';
import { MetadataFetcher } from './services/media/MetadataFetcher.js';
import { DownloadOrchestrator } from './services/media/DownloadOrchestrator.js';
import { RetainedFileStore } from './services/files/RetainedFileStore.js';
import { ThumbnailService } from './services/thumbnailService.js';
import { TelegramBot } from './services/telegram/TelegramBot.js';
import { BotGateway } from './services/telegram/BotGateway.js';
import { OwnerRegistry } from './services/telegram/OwnerRegistry.js';
import { EnvFileOwnerStore } from './services/telegram/EnvFileOwnerStore.js';
import { checkRequiredBinaries } from './utils/binaryCheck.js';
import { getErrorMessage } from './utils/errorHandling.js';

/**
 * Build the Express application around already-constructed services.
 * Tests call this with in-process fakes.
 */
export function createExpressApp(deps: ApiRouterDeps): express.Application {
  const app = express();

  // Middleware
  app.use(securityMiddleware);
  app.use(corsMiddleware);
  app.use(express.json({ limit: '100kb' }));
  app.use(requestLoggingMiddleware);

  // Routes
  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
    });
  });
  app.use('/api', createApiRouter(deps));

  // Error handling (must be last)
  app.use(errorLoggingMiddleware);
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

interface BotRuntime {
  client: TelegramBot;
  gateway: BotGateway;
}

export class App {
  public express: express.Application;
  private httpServer: HttpServer;
  private config: AppConfig;
  private fileStore: RetainedFileStore;
  private bot?: BotRuntime;

  constructor(config: AppConfig = ConfigManager.getInstance().getConfig()) {
    this.config = config;

    const { media, storage, telegram } = this.config;

    const metadata = new MetadataFetcher({
      ytDlpPath: media.ytDlpPath,
      cookiesFile: media.cookiesFile,
    });
    const downloader = new DownloadOrchestrator({
      ytDlpPath: media.ytDlpPath,
      tempDir: storage.tempDir,
      ffmpegPath: media.ffmpegPath,
      cookiesFile: media.cookiesFile,
    });
    this.fileStore = new RetainedFileStore({
      tempDir: storage.tempDir,
      retentionMs: storage.retentionMs,
      servedGraceMs: storage.servedGraceMs,
    });

    // Telegram bot is optional
    if (telegram.botToken) {
      const client = new TelegramBot(telegram.botToken);
      const gateway = new BotGateway({
        owners: new OwnerRegistry(new EnvFileOwnerStore(telegram.envFile), telegram.ownerId),
        transport: client,
        metadata,
        downloader,
        files: this.fileStore,
      });
      this.bot = { client, gateway };
    }

    this.express = createExpressApp({
      metadata,
      downloader,
      files: this.fileStore,
      thumbnails: new ThumbnailService(),
      bot: this.bot?.client,
    });
    this.httpServer = createServer(this.express);
  }

  public async start(): Promise<void> {
    initializeLogger(this.config.logging);

    // Validate configuration
    ConfigManager.getInstance().validate();

    await fs.ensureDir(this.config.storage.tempDir);
    logger.info('Temp directory ready', { tempDir: this.config.storage.tempDir });

    await checkRequiredBinaries(this.config.media);

    if (this.bot) {
      const { client, gateway } = this.bot;
      try {
        await client.start(message => gateway.dispatch(message));
      } catch (error) {
        // The HTTP API stays up without the bot
        logger.error('Failed to start Telegram bot', { error: getErrorMessage(error) });
      }
    } else {
      logger.info('Telegram bot disabled (TELEGRAM_BOT not set)');
    }

    const { port, host } = this.config.server;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        logger.info(`reelfetch server started on ${host}:${port}`);
        logger.info(`Environment: ${this.config.server.env}`);
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    if (this.bot) {
      await this.bot.client.stop();
      await this.bot.gateway.stop();
      logger.info('Telegram bot stopped');
    }

    this.fileStore.stop();
    await this.fileStore.flush();
    logger.info('File deletion timers cleared');

    if (this.httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close(error => (error ? reject(error) : resolve()));
      });
    }
    logger.info('Server stopped gracefully');
  }
}
