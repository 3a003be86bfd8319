import { DownloadRequest, MediaMetadata, OutputExt, ProgressEvent, RetainedFile } from '../../types/media.js';

/**
 * Seams between the HTTP and chat front ends and the media services.
 * MetadataFetcher, DownloadOrchestrator and RetainedFileStore implement them;
 * tests substitute in-process fakes.
 */

export interface MetadataSource {
  fetch(url: string, signal?: AbortSignal): Promise<MediaMetadata>;
}

export interface Downloader {
  run(request: DownloadRequest): AsyncIterable<ProgressEvent>;
}

export interface ArtifactStore {
  pathFor(fileId: string, ext: OutputExt): string;
  retain(fileId: string, ext: OutputExt): RetainedFile;
  find(fileId: string): Promise<RetainedFile | null>;
  markServed(file: RetainedFile): void;
  discard(fileId: string, ext: OutputExt): Promise<void>;
}
