import axios, { AxiosInstance, isAxiosError } from 'axios';
import { Readable } from 'stream';
import { createServiceLogger } from '../middleware/logging.js';
import { HTTP } from '../config/constants.js';
import {
  ConnectionError,
  ProviderServerError,
  TimeoutError,
  ValidationError,
} from '../errors/index.js';
import { parseHttpUrl } from './media/platformDetector.js';

const logger = createServiceLogger('ThumbnailService');

const THUMBNAIL_PATH = '/api/video/thumb';

export interface ThumbnailStream {
  contentType: string;
  data: Readable;
}

/**
 * Proxy path for a thumbnail the browser cannot load directly
 * (Instagram's CDN refuses cross-origin requests)
 */
export function toProxyPath(thumbnailUrl: string): string {
  return `${THUMBNAIL_PATH}?url=${Buffer.from(thumbnailUrl, 'utf8').toString('base64url')}`;
}

/**
 * Decode the `url` query parameter of the proxy route
 *
 * @throws ValidationError unless it decodes to an http(s) URL
 */
export function decodeProxyUrl(encoded: string): string {
  const decoded = Buffer.from(encoded, 'base64url').toString('utf8');
  try {
    return parseHttpUrl(decoded).toString();
  } catch {
    throw new ValidationError('Invalid thumbnail URL');
  }
}

/**
 * Thumbnail Service
 *
 * Streams remote thumbnails back to the client. The body is never buffered.
 */
export class ThumbnailService {
  private readonly http: AxiosInstance;

  constructor(http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        timeout: HTTP.THUMBNAIL_TIMEOUT,
        maxRedirects: 5,
        headers: { Accept: 'image/*' },
      });
  }

  async fetch(url: string): Promise<ThumbnailStream> {
    try {
      const response = await this.http.get<Readable>(url, { responseType: 'stream' });
      const contentType = response.headers['content-type'];
      return {
        contentType: typeof contentType === 'string' ? contentType : 'application/octet-stream',
        data: response.data,
      };
    } catch (error) {
      throw this.toUpstreamError(error, url);
    }
  }

  private toUpstreamError(error: unknown, url: string): Error {
    const context = { service: 'ThumbnailService', operation: 'fetch' };

    if (isAxiosError(error)) {
      if (error.response) {
        logger.warn('Thumbnail upstream returned error', { url, status: error.response.status });
        return new ProviderServerError('thumbnail', error.response.status, undefined, context, error);
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        logger.warn('Thumbnail request timed out', { url });
        return new TimeoutError(HTTP.THUMBNAIL_TIMEOUT, url, 'Thumbnail request timed out', context);
      }
      logger.warn('Thumbnail request failed', { url, code: error.code, error: error.message });
      return new ConnectionError(url, 'Failed to fetch thumbnail', context, error);
    }

    return new ConnectionError(url, 'Failed to fetch thumbnail', context);
  }
}
