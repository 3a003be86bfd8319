/**
 * BotGateway
 *
 * Chat front end of the pipeline. Every inbound message runs as its own task:
 * link detection, metadata, automatic format choice under the upload limit,
 * download, then a video reply. Replies are plain text for every failure.
 */

import { randomUUID } from 'crypto';
import { createServiceLogger } from '../../middleware/logging.js';
import { BYTES_PER_MB, TELEGRAM } from '../../config/constants.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { detectPlatform } from '../media/platformDetector.js';
import { pickBotFormat } from '../media/formatSelector.js';
import { isSizeLimitFailure } from '../media/DownloadOrchestrator.js';
import { ArtifactStore, Downloader, MetadataSource } from '../media/ports.js';
import { MediaMetadata, ProgressEvent } from '../../types/media.js';
import { OwnerRegistry } from './OwnerRegistry.js';
import { startPresenceIndicator } from './presenceIndicator.js';
import { ChatTransport, InboundMessage } from './types.js';

const logger = createServiceLogger('BotGateway');

export const HELP_TEXT = 'Send me a YouTube, TikTok, or Instagram link.';

export interface BotGatewayDeps {
  owners: OwnerRegistry;
  transport: ChatTransport;
  metadata: MetadataSource;
  downloader: Downloader;
  files: Pick<ArtifactStore, 'pathFor' | 'discard'>;
  /** Upload ceiling; defaults to Telegram's 50 MB */
  maxBytes?: number;
  /** Chat action refresh interval */
  presenceIntervalMs?: number;
}

export class BotGateway {
  private readonly deps: BotGatewayDeps;
  private readonly maxBytes: number;
  private readonly presenceIntervalMs: number;
  private readonly tasks = new Set<Promise<void>>();
  private readonly shutdown = new AbortController();

  constructor(deps: BotGatewayDeps) {
    this.deps = deps;
    this.maxBytes = deps.maxBytes ?? TELEGRAM.MAX_FILE_BYTES;
    this.presenceIntervalMs = deps.presenceIntervalMs ?? TELEGRAM.CHAT_ACTION_INTERVAL;
  }

  /**
   * Start handling a message without waiting for it
   */
  dispatch(message: InboundMessage): void {
    const task: Promise<void> = this.handle(message)
      .catch(error => {
        logger.error('Message handler failed', {
          chatId: message.chatId,
          messageId: message.messageId,
          error: getErrorMessage(error),
        });
      })
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  get activeTasks(): number {
    return this.tasks.size;
  }

  /**
   * Wait for every task started so far
   */
  async drain(): Promise<void> {
    await Promise.all([...this.tasks]);
  }

  /**
   * Cancel running downloads and wait for their tasks to finish
   */
  async stop(): Promise<void> {
    this.shutdown.abort();
    await this.drain();
  }

  async handle(message: InboundMessage): Promise<void> {
    const allowed = await this.deps.owners.tryClaim(message.senderId);
    if (!allowed) {
      logger.debug('Ignoring message from non-owner', { senderId: message.senderId });
      return;
    }

    const text = message.text.trim();
    if (text === '') {
      return;
    }

    const { platform, url } = detectPlatform(text);
    if (platform === 'unknown') {
      await this.reply(message, HELP_TEXT);
      return;
    }

    logger.info('Bot download requested', { chatId: message.chatId, platform, url });

    const presence = startPresenceIndicator(
      () => this.deps.transport.sendChatAction(message.chatId, 'upload_video'),
      this.presenceIntervalMs
    );
    try {
      await this.runJob(message, url);
    } finally {
      presence.stop();
    }
  }

  private async runJob(message: InboundMessage, url: string): Promise<void> {
    const signal = this.shutdown.signal;
    const limitMb = Math.floor(this.maxBytes / BYTES_PER_MB);

    let metadata: MediaMetadata;
    try {
      metadata = await this.deps.metadata.fetch(url, signal);
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      await this.reply(message, `Failed to get video info: ${getErrorMessage(error)}`);
      return;
    }

    const formatId = pickBotFormat(metadata.formats, this.maxBytes);
    if (formatId === null) {
      await this.reply(message, `No suitable format found under ${limitMb} MB.`);
      return;
    }

    const fileId = randomUUID();
    try {
      let terminal: ProgressEvent | undefined;
      for await (const event of this.deps.downloader.run({
        mode: 'video',
        formatId,
        url,
        fileId,
        maxBytes: this.maxBytes,
        limitLabel: 'Telegram limit',
        signal,
      })) {
        if (event.stage === 'done' || event.stage === 'error') {
          terminal = event;
        }
      }

      if (!terminal) {
        // Cancelled by shutdown
        return;
      }

      if (terminal.stage === 'error') {
        await this.reply(
          message,
          isSizeLimitFailure(terminal) && terminal.error ? terminal.error : 'Download failed.'
        );
        return;
      }

      await this.sendVideo(message, fileId);
    } finally {
      await this.deps.files.discard(fileId, 'mp4');
    }
  }

  private async sendVideo(message: InboundMessage, fileId: string): Promise<void> {
    const { transport, files } = this.deps;
    const filePath = files.pathFor(fileId, 'mp4');
    try {
      await transport.sendVideo(message.chatId, filePath, message.messageId);
      logger.info('Video sent', { chatId: message.chatId, fileId });
    } catch (error) {
      logger.warn('Failed to send video', { chatId: message.chatId, error: getErrorMessage(error) });
      await this.reply(message, `Failed to send video: ${getErrorMessage(error)}`);
    }
  }

  private async reply(message: InboundMessage, text: string): Promise<void> {
    await this.deps.transport.sendText(message.chatId, text, message.messageId);
  }
}
