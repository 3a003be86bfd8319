import { Request, Response, NextFunction } from 'express';
import path from 'path';
import { pipeline } from 'stream/promises';
import { logger } from '../middleware/logging.js';
import { parseWith } from '../middleware/validation.js';
import {
  downloadQuerySchema,
  fileParamsSchema,
  thumbnailQuerySchema,
  videoInfoRequestSchema,
} from '../validation/videoSchemas.js';
import { detectPlatform, parseHttpUrl } from '../services/media/platformDetector.js';
import { selectAudioChoices, selectVideoChoices } from '../services/media/formatSelector.js';
import { ArtifactStore, Downloader, MetadataSource } from '../services/media/ports.js';
import { ThumbnailStream, decodeProxyUrl, toProxyPath } from '../services/thumbnailService.js';
import { NoSuitableFormatError, ResourceNotFoundError, UnsupportedPlatformError } from '../errors/index.js';
import { DownloadRequest, MediaReference, ProgressEvent, SupportedPlatform } from '../types/media.js';
import { formatDuration } from '../utils/duration.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { HTTP } from '../config/constants.js';

const MIME_TYPES = {
  mp4: 'video/mp4',
  mp3: 'audio/mpeg',
} as const;

export interface ThumbnailSource {
  fetch(url: string): Promise<ThumbnailStream>;
}

export interface VideoControllerDeps {
  metadata: MetadataSource;
  downloader: Downloader;
  files: ArtifactStore;
  thumbnails: ThumbnailSource;
}

/**
 * Resolve a user-supplied link to a supported platform
 *
 * @throws ValidationError for malformed URLs
 * @throws UnsupportedPlatformError for anything that is not YouTube, TikTok or Instagram
 */
function resolveMedia(rawUrl: string): MediaReference & { platform: SupportedPlatform } {
  parseHttpUrl(rawUrl);
  const { platform, url } = detectPlatform(rawUrl);
  if (platform === 'unknown') {
    throw new UnsupportedPlatformError(rawUrl);
  }
  return { platform, url };
}

/**
 * Abort when the client goes away before the response has finished
 */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

export class VideoController {
  constructor(private readonly deps: VideoControllerDeps) {}

  /**
   * POST /api/video/info
   * Metadata plus the format choices for the requested mode
   */
  async getInfo(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { url: rawUrl, mode } = parseWith(videoInfoRequestSchema, req.body);
      const { platform, url } = resolveMedia(rawUrl);
      const controller = abortOnDisconnect(res);

      const metadata = await this.deps.metadata.fetch(url, controller.signal);
      const formats =
        mode === 'audio' ? selectAudioChoices(metadata.formats) : selectVideoChoices(metadata.formats);

      if (formats.length === 0) {
        throw new NoSuitableFormatError(`No ${mode} formats available`);
      }

      const thumbnail =
        platform === 'instagram' && metadata.thumbnailUrl !== ''
          ? toProxyPath(metadata.thumbnailUrl)
          : metadata.thumbnailUrl;

      logger.info('Video info resolved', {
        platform,
        id: metadata.id,
        mode,
        formatCount: formats.length,
      });

      res.json({
        id: metadata.id,
        title: metadata.title,
        author: metadata.uploaderName,
        duration: formatDuration(metadata.durationSeconds),
        thumbnail,
        platform,
        formats,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/video/download
   * Streams progress as Server-Sent Events until the job's terminal event.
   * Input errors are answered as JSON before the stream opens.
   */
  async download(req: Request, res: Response, next: NextFunction): Promise<void> {
    let request: Omit<DownloadRequest, 'signal'>;
    try {
      const query = parseWith(downloadQuerySchema, req.query);
      const { url } = resolveMedia(query.url);
      request = { url, formatId: query.format, mode: query.mode };
    } catch (error) {
      next(error);
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    const controller = abortOnDisconnect(res);
    const send = (event: ProgressEvent): void => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    logger.info('Download started', { url: request.url, format: request.formatId, mode: request.mode });

    try {
      for await (const event of this.deps.downloader.run({ ...request, signal: controller.signal })) {
        if (controller.signal.aborted) {
          break;
        }
        if (event.stage === 'done' && event.fileId && event.ext) {
          this.deps.files.retain(event.fileId, event.ext);
        }
        send(event);
      }
    } catch (error) {
      logger.error('Download stream failed', { url: request.url, error: getErrorMessage(error) });
      if (!controller.signal.aborted) {
        send({ stage: 'error', percent: 0, error: 'Download failed' });
      }
    }

    if (controller.signal.aborted) {
      logger.info('Download cancelled by client', { url: request.url });
    }
    res.end();
  }

  /**
   * GET /api/video/file/:id
   * Sends a finished artifact once; it is deleted shortly after
   */
  async getFile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = parseWith(fileParamsSchema, req.params);
      const file = await this.deps.files.find(id);
      if (!file) {
        throw new ResourceNotFoundError('file', id, 'File not found or expired');
      }

      res.setHeader('Content-Disposition', `attachment; filename="${file.fileId}.${file.ext}"`);
      res.setHeader('Content-Type', MIME_TYPES[file.ext]);

      res.sendFile(path.resolve(file.path), error => {
        if (error) {
          if (res.headersSent) {
            logger.warn('File transfer interrupted', { fileId: file.fileId, error: getErrorMessage(error) });
          } else {
            next(error);
          }
          return;
        }
        this.deps.files.markServed(file);
        logger.info('File served', { fileId: file.fileId, ext: file.ext });
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/video/thumb
   * Relays a remote thumbnail for hosts that block cross-origin loads
   */
  async getThumbnail(req: Request, res: Response, next: NextFunction): Promise<void> {
    let thumbnail: ThumbnailStream;
    try {
      const { url } = parseWith(thumbnailQuerySchema, req.query);
      thumbnail = await this.deps.thumbnails.fetch(decodeProxyUrl(url));
    } catch (error) {
      next(error);
      return;
    }

    res.setHeader('Content-Type', thumbnail.contentType);
    res.setHeader('Cache-Control', `public, max-age=${HTTP.THUMBNAIL_MAX_AGE}`);

    try {
      await pipeline(thumbnail.data, res);
    } catch (error) {
      logger.warn('Thumbnail relay interrupted', { error: getErrorMessage(error) });
    }
  }
}
