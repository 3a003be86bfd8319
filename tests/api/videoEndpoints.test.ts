import request from 'supertest';
import fs from 'fs-extra';
import http from 'http';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { Application } from 'express';
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { createExpressApp } from '../../src/app.js';
import { ArtifactStore, Downloader, MetadataSource } from '../../src/services/media/ports.js';
import { ThumbnailSource } from '../../src/controllers/videoController.js';
import { DownloadRequest, OutputExt, ProgressEvent, RetainedFile } from '../../src/types/media.js';
import { MetadataFetchError, ProviderServerError } from '../../src/errors/index.js';
import { MB, sampleMetadata } from '../helpers/fixtures.js';
import { deferred } from '../helpers/fakes.js';

const FILE_ID = '3f2b8c1e-9d4a-4e6f-8a7b-1c2d3e4f5a6b';
const YOUTUBE = 'https://www.youtube.com/watch?v=abc123';

class FakeDownloader implements Downloader {
  readonly requests: DownloadRequest[] = [];
  events: ProgressEvent[] = [];
  waitForAbort = false;
  readonly aborted = deferred<void>();

  async *run(request: DownloadRequest): AsyncGenerator<ProgressEvent> {
    this.requests.push(request);
    for (const event of this.events) {
      yield event;
    }
    const { signal } = request;
    if (this.waitForAbort && signal) {
      await new Promise<void>(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
      this.aborted.resolve();
    }
  }
}

class FakeStore implements ArtifactStore {
  readonly retained: Array<{ fileId: string; ext: OutputExt }> = [];
  readonly served: RetainedFile[] = [];
  readonly files = new Map<string, RetainedFile>();

  pathFor(fileId: string, ext: OutputExt): string {
    return path.join(os.tmpdir(), `${fileId}.${ext}`);
  }

  retain(fileId: string, ext: OutputExt): RetainedFile {
    this.retained.push({ fileId, ext });
    return { fileId, ext, path: this.pathFor(fileId, ext), createdAt: new Date() };
  }

  async find(fileId: string): Promise<RetainedFile | null> {
    return this.files.get(fileId) ?? null;
  }

  markServed(file: RetainedFile): void {
    this.served.push(file);
  }

  async discard(): Promise<void> {}
}

async function waitFor(condition: () => boolean): Promise<void> {
  for (let attempt = 0; attempt < 100 && !condition(); attempt++) {
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}

describe('Video API Endpoints', () => {
  let app: Application;
  let metadataFetch: jest.Mock<MetadataSource['fetch']>;
  let downloader: FakeDownloader;
  let store: FakeStore;
  let thumbnailFetch: jest.Mock<ThumbnailSource['fetch']>;

  beforeEach(() => {
    metadataFetch = jest.fn<MetadataSource['fetch']>().mockResolvedValue(sampleMetadata());
    downloader = new FakeDownloader();
    store = new FakeStore();
    thumbnailFetch = jest.fn<ThumbnailSource['fetch']>();

    app = createExpressApp({
      metadata: { fetch: metadataFetch },
      downloader,
      files: store,
      thumbnails: { fetch: thumbnailFetch },
    });
  });

  describe('POST /api/video/info', () => {
    it('should return metadata with video choices', async () => {
      const response = await request(app).post('/api/video/info').send({ url: YOUTUBE }).expect(200);

      expect(response.body).toEqual({
        id: 'abc123',
        title: 'Test clip',
        author: 'Test Channel',
        duration: '2:05',
        thumbnail: 'https://img.example.com/thumb.jpg',
        platform: 'youtube',
        formats: [
          { formatId: '137', qualityLabel: '1080p', height: 1080, estimatedSizeBytes: 80 * MB },
          { formatId: '136', qualityLabel: '720p', height: 720, estimatedSizeBytes: 40 * MB },
        ],
      });
      expect(metadataFetch.mock.calls[0]?.[0]).toBe(YOUTUBE);
    });

    it('should return audio choices in audio mode', async () => {
      const response = await request(app)
        .post('/api/video/info')
        .send({ url: YOUTUBE, mode: 'audio' })
        .expect(200);

      expect(response.body.formats).toEqual([
        { formatId: '140', qualityLabel: '130 kbps', bitrateKbps: 129.5, estimatedSizeBytes: 2 * MB },
      ]);
    });

    it('should route Instagram thumbnails through the proxy', async () => {
      const thumbnailUrl = 'https://scontent.cdninstagram.com/v/abc.jpg';
      metadataFetch.mockResolvedValue(sampleMetadata({ thumbnailUrl }));

      const response = await request(app)
        .post('/api/video/info')
        .send({ url: 'https://www.instagram.com/reel/Cabc123/' })
        .expect(200);

      expect(response.body.platform).toBe('instagram');
      expect(response.body.thumbnail).toBe(
        `/api/video/thumb?url=${Buffer.from(thumbnailUrl).toString('base64url')}`
      );
    });

    it('should require a URL', async () => {
      const response = await request(app).post('/api/video/info').send({}).expect(400);

      expect(response.body).toEqual({
        error: { message: 'URL is required', status: 400, code: 'VALIDATION_SCHEMA_MISMATCH' },
      });
    });

    it('should reject unsupported platforms', async () => {
      const response = await request(app)
        .post('/api/video/info')
        .send({ url: 'https://vimeo.com/12345' })
        .expect(400);

      expect(response.body.error).toEqual({
        message: 'Unsupported platform. Use a YouTube, TikTok, or Instagram link.',
        status: 400,
        code: 'MEDIA_UNSUPPORTED_PLATFORM',
      });
      expect(metadataFetch).not.toHaveBeenCalled();
    });

    it('should reject text that is not a URL', async () => {
      const response = await request(app).post('/api/video/info').send({ url: 'youtube' }).expect(400);

      expect(response.body.error.message).toBe('Invalid URL');
    });

    it('should answer 502 when metadata cannot be fetched', async () => {
      metadataFetch.mockRejectedValue(new MetadataFetchError('ERROR: Private video', 1));

      const response = await request(app).post('/api/video/info').send({ url: YOUTUBE }).expect(502);

      expect(response.body.error).toEqual({
        message: 'ERROR: Private video',
        status: 502,
        code: 'MEDIA_METADATA_FAILED',
      });
    });

    it('should answer 422 when no format qualifies', async () => {
      metadataFetch.mockResolvedValue(sampleMetadata({ formats: [] }));

      const response = await request(app).post('/api/video/info').send({ url: YOUTUBE }).expect(422);

      expect(response.body.error.message).toBe('No video formats available');
    });
  });

  describe('GET /api/video/download', () => {
    it('should stream progress events and retain the finished file', async () => {
      downloader.events = [
        { stage: 'downloading_video', percent: 0 },
        { stage: 'merging', percent: -1 },
        { stage: 'done', percent: 100, fileId: FILE_ID, ext: 'mp4' },
      ];

      const response = await request(app)
        .get('/api/video/download')
        .query({ url: YOUTUBE, format: '137' })
        .expect(200);

      expect(response.headers['content-type']).toBe('text/event-stream');
      expect(response.headers['cache-control']).toBe('no-cache');
      expect(response.headers['x-accel-buffering']).toBe('no');
      expect(response.text).toBe(
        'data: {"stage":"downloading_video","percent":0}\n\n' +
          'data: {"stage":"merging","percent":-1}\n\n' +
          `data: {"stage":"done","percent":100,"fileId":"${FILE_ID}","ext":"mp4"}\n\n`
      );
      expect(store.retained).toEqual([{ fileId: FILE_ID, ext: 'mp4' }]);
      expect(downloader.requests[0]).toMatchObject({ url: YOUTUBE, formatId: '137', mode: 'video' });
    });

    it('should forward the audio mode', async () => {
      downloader.events = [{ stage: 'error', percent: 0, error: 'Download failed' }];

      const response = await request(app)
        .get('/api/video/download')
        .query({ url: YOUTUBE, format: '140', mode: 'audio' })
        .expect(200);

      expect(downloader.requests[0]?.mode).toBe('audio');
      expect(response.text).toBe('data: {"stage":"error","percent":0,"error":"Download failed"}\n\n');
      expect(store.retained).toEqual([]);
    });

    it('should reject missing parameters before streaming', async () => {
      const response = await request(app).get('/api/video/download').query({ url: YOUTUBE }).expect(400);

      expect(response.body.error.message).toBe('url and format required');
      expect(downloader.requests).toEqual([]);
    });

    it('should reject unsupported platforms before streaming', async () => {
      const response = await request(app)
        .get('/api/video/download')
        .query({ url: 'https://example.com/video', format: '1' })
        .expect(400);

      expect(response.headers['content-type']).toMatch(/application\/json/);
      expect(downloader.requests).toEqual([]);
    });

    it('should abort the job when the client disconnects', async () => {
      downloader.events = [{ stage: 'downloading_video', percent: 0 }];
      downloader.waitForAbort = true;

      const server = http.createServer(app);
      await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('Test server is not listening on a port');
      }
      const { port } = address;

      try {
        await new Promise<void>((resolve, reject) => {
          const query = new URLSearchParams({ url: YOUTUBE, format: '137' });
          const req = http.get(`http://127.0.0.1:${port}/api/video/download?${query}`, res => {
            res.on('error', error => {
              if (!req.destroyed) {
                reject(error);
              }
            });
            res.once('data', () => {
              req.destroy();
              resolve();
            });
          });
          req.on('error', error => {
            if (!req.destroyed) {
              reject(error);
            }
          });
        });

        await downloader.aborted.promise;
        expect(downloader.requests[0]?.signal?.aborted).toBe(true);
      } finally {
        await new Promise<void>(resolve => server.close(() => resolve()));
      }
    });
  });

  describe('GET /api/video/file/:id', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reelfetch-api-'));
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('should send the file as an attachment and mark it served', async () => {
      const filePath = path.join(dir, `${FILE_ID}.mp3`);
      await fs.outputFile(filePath, 'ID3-audio');
      const file: RetainedFile = { fileId: FILE_ID, ext: 'mp3', path: filePath, createdAt: new Date() };
      store.files.set(FILE_ID, file);

      const response = await request(app).get(`/api/video/file/${FILE_ID}`).expect(200);

      expect(response.headers['content-type']).toBe('audio/mpeg');
      expect(response.headers['content-disposition']).toBe(`attachment; filename="${FILE_ID}.mp3"`);
      expect(response.headers['content-length']).toBe('9');

      await waitFor(() => store.served.length > 0);
      expect(store.served).toEqual([file]);
    });

    it('should answer 404 for unknown or expired files', async () => {
      const response = await request(app).get(`/api/video/file/${FILE_ID}`).expect(404);

      expect(response.body.error).toEqual({
        message: 'File not found or expired',
        status: 404,
        code: 'RESOURCE_NOT_FOUND',
      });
      expect(store.served).toEqual([]);
    });
  });

  describe('GET /api/video/thumb', () => {
    const imageUrl = 'https://scontent.cdninstagram.com/v/abc.jpg';
    const encoded = Buffer.from(imageUrl).toString('base64url');

    it('should relay the image with a cache header', async () => {
      thumbnailFetch.mockResolvedValue({
        contentType: 'image/png',
        data: Readable.from([Buffer.from('png-bytes')]),
      });

      const response = await request(app).get('/api/video/thumb').query({ url: encoded }).expect(200);

      expect(thumbnailFetch).toHaveBeenCalledWith(imageUrl);
      expect(response.headers['content-type']).toBe('image/png');
      expect(response.headers['cache-control']).toBe('public, max-age=3600');
      expect(Buffer.from(response.body).toString('utf8')).toBe('png-bytes');
    });

    it('should require the url parameter', async () => {
      const response = await request(app).get('/api/video/thumb').expect(400);

      expect(response.body.error.message).toBe('url required');
    });

    it('should answer 502 when the upstream fails', async () => {
      thumbnailFetch.mockRejectedValue(new ProviderServerError('thumbnail', 404));

      await request(app).get('/api/video/thumb').query({ url: encoded }).expect(502);
    });
  });

  describe('GET /api/telegram', () => {
    it('should report a disabled bot', async () => {
      const response = await request(app).get('/api/telegram').expect(200);

      expect(response.body).toEqual({ enabled: false, username: null });
    });

    it('should report the bot username when enabled', async () => {
      const withBot = createExpressApp({
        metadata: { fetch: metadataFetch },
        downloader,
        files: store,
        thumbnails: { fetch: thumbnailFetch },
        bot: { username: 'reel_test_bot' },
      });

      const response = await request(withBot).get('/api/telegram').expect(200);

      expect(response.body).toEqual({ enabled: true, username: 'reel_test_bot' });
    });
  });

  describe('GET /health', () => {
    it('should report healthy', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body).toMatchObject({ status: 'healthy' });
      expect(typeof response.body.timestamp).toBe('string');
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await request(app).get('/api/nope').expect(404);

    expect(response.body.error.message).toBe('Route GET /api/nope not found');
  });
});
