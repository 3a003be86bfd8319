import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { describe, it, expect, jest } from '@jest/globals';
import {
  MetadataFetcher,
  extractDiagnostic,
  toMediaMetadata,
} from '../../src/services/media/MetadataFetcher.js';
import { CommandExecutor } from '../../src/services/media/processRunner.js';
import { MetadataFetchError, MetadataParseError } from '../../src/errors/index.js';

const URL = 'https://www.tiktok.com/@someone/video/123';

const document = {
  id: 123,
  title: 'Dance',
  uploader: null,
  channel: 'someone',
  duration: 14.2,
  thumbnail: 'https://img.example.com/t.jpg',
  formats: [
    { format_id: 'h264_540p', ext: 'mp4', height: 1024, vcodec: 'h264', acodec: 'aac', tbr: 900, filesize: 1_200_000 },
    { format_id: 'audio', ext: 'm4a', vcodec: 'none', acodec: 'aac', abr: 128, filesize_approx: 230_000 },
  ],
};

function succeedWith(stdout: string) {
  return jest.fn<CommandExecutor>().mockResolvedValue({ stdout, stderr: '' });
}

function failWith(error: Error) {
  return jest.fn<CommandExecutor>().mockRejectedValue(error);
}

describe('MetadataFetcher', () => {
  it('should run yt-dlp in metadata mode and map the document', async () => {
    const executor = succeedWith(JSON.stringify(document));
    const fetcher = new MetadataFetcher({ ytDlpPath: '/usr/local/bin/yt-dlp', executor });

    const metadata = await fetcher.fetch(URL);

    expect(executor).toHaveBeenCalledWith(
      '/usr/local/bin/yt-dlp',
      ['--dump-json', '--no-download', '--no-warnings', '--no-playlist', URL],
      { signal: undefined }
    );
    expect(metadata).toEqual({
      id: '123',
      title: 'Dance',
      uploaderName: 'someone',
      durationSeconds: 14.2,
      thumbnailUrl: 'https://img.example.com/t.jpg',
      formats: [
        {
          formatId: 'h264_540p',
          containerExt: 'mp4',
          height: 1024,
          videoCodec: 'h264',
          audioCodec: 'aac',
          bitrateKbps: 900,
          sizeBytes: 1_200_000,
          approxSizeBytes: null,
        },
        {
          formatId: 'audio',
          containerExt: 'm4a',
          height: 0,
          videoCodec: 'none',
          audioCodec: 'aac',
          bitrateKbps: 128,
          sizeBytes: null,
          approxSizeBytes: 230_000,
        },
      ],
    });
  });

  it('should pass the cookie file when it exists', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reelfetch-cookies-'));
    const cookiesFile = path.join(dir, 'cookies.txt');
    await fs.outputFile(cookiesFile, '# Netscape HTTP Cookie File\n');

    try {
      const executor = succeedWith(JSON.stringify(document));
      await new MetadataFetcher({ ytDlpPath: 'yt-dlp', cookiesFile, executor }).fetch(URL);

      expect(executor.mock.calls[0]?.[1]).toEqual([
        '--dump-json',
        '--no-download',
        '--no-warnings',
        '--no-playlist',
        '--cookies',
        cookiesFile,
        URL,
      ]);
    } finally {
      await fs.remove(dir);
    }
  });

  it('should forward the abort signal', async () => {
    const executor = succeedWith(JSON.stringify(document));
    const controller = new AbortController();

    await new MetadataFetcher({ ytDlpPath: 'yt-dlp', executor }).fetch(URL, controller.signal);

    expect(executor.mock.calls[0]?.[2]).toEqual({ signal: controller.signal });
  });

  it('should surface the last ERROR line on non-zero exit', async () => {
    const error = Object.assign(new Error('Command failed'), {
      code: 1,
      stderr: 'WARNING: something minor\nERROR: [TikTok] 123: Video not available\n',
    });
    const fetcher = new MetadataFetcher({ ytDlpPath: 'yt-dlp', executor: failWith(error) });

    const failure = fetcher.fetch(URL);

    await expect(failure).rejects.toBeInstanceOf(MetadataFetchError);
    await expect(failure).rejects.toMatchObject({
      message: 'ERROR: [TikTok] 123: Video not available',
      exitCode: 1,
      statusCode: 502,
      retryable: false,
    });
  });

  it('should fall back to a generic message when stderr is empty', async () => {
    const error = Object.assign(new Error('Command failed'), { code: 2, stderr: '' });
    const fetcher = new MetadataFetcher({ ytDlpPath: 'yt-dlp', executor: failWith(error) });

    await expect(fetcher.fetch(URL)).rejects.toMatchObject({
      message: 'yt-dlp exited with code 2',
      exitCode: 2,
    });
  });

  it('should report a missing binary', async () => {
    const error = Object.assign(new Error('spawn yt-dlp ENOENT'), { code: 'ENOENT' });
    const fetcher = new MetadataFetcher({ ytDlpPath: 'yt-dlp', executor: failWith(error) });

    await expect(fetcher.fetch(URL)).rejects.toMatchObject({
      message: 'spawn yt-dlp ENOENT',
      exitCode: null,
      retryable: false,
    });
  });

  it('should reject output that is not JSON', async () => {
    const fetcher = new MetadataFetcher({ ytDlpPath: 'yt-dlp', executor: succeedWith('not json') });

    const failure = fetcher.fetch(URL);
    await expect(failure).rejects.toBeInstanceOf(MetadataParseError);
    await expect(failure).rejects.toThrow('Unparseable metadata');
  });

  it('should reject JSON that does not look like metadata', async () => {
    const fetcher = new MetadataFetcher({ ytDlpPath: 'yt-dlp', executor: succeedWith('{"title": 5}') });

    await expect(fetcher.fetch(URL)).rejects.toBeInstanceOf(MetadataParseError);
  });
});

describe('extractDiagnostic', () => {
  it('should prefer the last ERROR line', () => {
    expect(extractDiagnostic('ERROR: first\nnoise\nERROR: second\ntrailer\n')).toBe('ERROR: second');
  });

  it('should fall back to the last non-empty line', () => {
    expect(extractDiagnostic('one\r\ntwo\r\n\r\n')).toBe('two');
  });

  it('should return undefined for empty output', () => {
    expect(extractDiagnostic('  \n')).toBeUndefined();
  });
});

describe('toMediaMetadata', () => {
  it('should default missing fields', () => {
    expect(toMediaMetadata({ id: 'x', title: '' })).toEqual({
      id: 'x',
      title: '',
      uploaderName: 'Unknown',
      durationSeconds: 0,
      thumbnailUrl: '',
      formats: [],
    });
  });
});
