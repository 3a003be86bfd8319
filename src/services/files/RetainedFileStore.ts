import fs from 'fs-extra';
import path from 'path';
import { createServiceLogger } from '../../middleware/logging.js';
import { OUTPUT } from '../../config/constants.js';
import { OutputExt, RetainedFile } from '../../types/media.js';
import { getErrorMessage, isNotFoundError } from '../../utils/errorHandling.js';

const logger = createServiceLogger('RetainedFileStore');

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface ScheduledTask {
  cancel(): void;
}

/**
 * Timer source; swapped for a fake in tests
 */
export interface Scheduler {
  schedule(callback: () => void, delayMs: number): ScheduledTask;
}

export type FileRemover = (filePath: string) => Promise<void>;

export const timerScheduler: Scheduler = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    // Pending deletions never keep the process alive
    handle.unref();
    return { cancel: () => clearTimeout(handle) };
  },
};

export interface RetainedFileStoreOptions {
  tempDir: string;
  /** Deletion delay for artifacts nobody fetched */
  retentionMs: number;
  /** Deletion delay once an artifact has been served */
  servedGraceMs: number;
  scheduler?: Scheduler;
  /** Must treat a missing path as success */
  remover?: FileRemover;
}

/**
 * Retained File Store
 *
 * Finished downloads wait in the temp directory until the client fetches
 * them. Every artifact gets a long safety-net deletion timer when it is
 * retained and a short one once it has been served; whichever fires first
 * deletes the file and the other finds nothing to do.
 */
export class RetainedFileStore {
  private readonly tempDir: string;
  private readonly retentionMs: number;
  private readonly servedGraceMs: number;
  private readonly scheduler: Scheduler;
  private readonly remover: FileRemover;

  private readonly pending = new Set<ScheduledTask>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: RetainedFileStoreOptions) {
    this.tempDir = options.tempDir;
    this.retentionMs = options.retentionMs;
    this.servedGraceMs = options.servedGraceMs;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.remover = options.remover ?? (filePath => fs.remove(filePath));
  }

  pathFor(fileId: string, ext: OutputExt): string {
    return path.join(this.tempDir, `${fileId}.${ext}`);
  }

  /**
   * Register a completed artifact and start its safety-net timer
   */
  retain(fileId: string, ext: OutputExt): RetainedFile {
    const file: RetainedFile = {
      fileId,
      ext,
      path: this.pathFor(fileId, ext),
      createdAt: new Date(),
    };
    this.scheduleDeletion(fileId, ext, this.retentionMs);
    logger.debug('File retained', { fileId, ext, retentionMs: this.retentionMs });
    return file;
  }

  scheduleDeletion(fileId: string, ext: OutputExt, delayMs: number): void {
    const filePath = this.pathFor(fileId, ext);

    const task: ScheduledTask = this.scheduler.schedule(() => {
      this.pending.delete(task);
      this.track(this.delete(filePath));
    }, delayMs);

    this.pending.add(task);
  }

  /**
   * Look up an artifact by id, mp4 first
   *
   * @returns null for ids that are not UUIDs and for expired files
   */
  async find(fileId: string): Promise<RetainedFile | null> {
    if (!UUID_PATTERN.test(fileId)) {
      return null;
    }

    for (const ext of OUTPUT.LOOKUP_ORDER) {
      const filePath = this.pathFor(fileId, ext);
      try {
        const stats = await fs.stat(filePath);
        if (stats.isFile()) {
          return { fileId, ext, path: filePath, createdAt: new Date(stats.mtimeMs) };
        }
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw error;
        }
      }
    }
    return null;
  }

  /**
   * Start the short timer once the response has been fully sent
   */
  markServed(file: RetainedFile): void {
    this.scheduleDeletion(file.fileId, file.ext, this.servedGraceMs);
  }

  /**
   * Delete an artifact right away (bot replies, rejected downloads)
   */
  async discard(fileId: string, ext: OutputExt): Promise<void> {
    const work = this.delete(this.pathFor(fileId, ext));
    this.track(work);
    await work;
  }

  /**
   * Cancel every pending timer. Files still on disk stay there.
   */
  stop(): void {
    for (const task of this.pending) {
      task.cancel();
    }
    const cancelled = this.pending.size;
    this.pending.clear();
    if (cancelled > 0) {
      logger.info('Cancelled pending file deletions', { count: cancelled });
    }
  }

  /**
   * Wait for deletions that already started
   */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private track(work: Promise<void>): void {
    this.inFlight.add(work);
    void work.finally(() => this.inFlight.delete(work));
  }

  /**
   * Never rejects; failures are logged
   */
  private async delete(filePath: string): Promise<void> {
    try {
      await this.remover(filePath);
      logger.debug('File deleted', { path: filePath });
    } catch (error) {
      logger.warn('Failed to delete file', { path: filePath, error: getErrorMessage(error) });
    }
  }
}
