import { messageFromCause } from './errors.js';
import { isTerminal } from './state-machine.js';
import type { ArtifactStorage } from './artifacts.js';
import type { TaskStore } from './task-store.js';

export interface RecordEviction {
  evicted: number;
  skippedActive: number;
}

export interface FileCleanup {
  filesDeleted: number;
  fileErrors: number;
}

export type RetentionReport = RecordEviction & FileCleanup;

export interface RetentionOptions {
  /** Records kept, newest by creation time. Older terminal records are evicted. */
  keepNewest: number;
  /** Artifacts whose mtime is older than this are deleted. */
  fileMaxAgeMs: number;
  now?: () => number;
}

/**
 * Reclaims old task records and old audio files. The two passes are
 * independent: files are aged by mtime whether or not a record still points
 * at them, and a failure in one pass never stops the other.
 */
export class RetentionSweeper {
  private readonly now: () => number;
  private inFlight?: Promise<RetentionReport>;
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly store: TaskStore,
    private readonly files: Pick<ArtifactStorage, 'listArtifacts' | 'remove'>,
    private readonly options: RetentionOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  evictRecords(): RecordEviction {
    const { keepNewest } = this.options;
    const byCreation = this.store.listByCreation();
    const overflow = byCreation.slice(keepNewest);
    if (overflow.length === 0) return { evicted: 0, skippedActive: 0 };

    const evictable = overflow.filter(isTerminal).map(r => r.id);
    const skippedActive = overflow.length - evictable.length;
    if (skippedActive > 0) {
      console.warn(`[retention] ${skippedActive} active tasks are past the newest ${keepNewest}, kept until they finish`);
    }

    const evicted = this.store.evict(evictable).length;
    if (evicted > 0) console.log(`[retention] Evicted ${evicted} task records, ${this.store.size} remain`);
    return { evicted, skippedActive };
  }

  async deleteStaleFiles(): Promise<FileCleanup> {
    const cutoff = this.now() - this.options.fileMaxAgeMs;
    const stale = (await this.files.listArtifacts()).filter(entry => entry.mtimeMs < cutoff);

    let filesDeleted = 0;
    let fileErrors = 0;
    for (const entry of stale) {
      try {
        await this.files.remove(entry.path);
        filesDeleted++;
      } catch (err) {
        fileErrors++;
        console.error(`[retention] Could not delete ${entry.name}: ${messageFromCause(err)}`);
      }
    }
    if (filesDeleted > 0) console.log(`[retention] Deleted ${filesDeleted} audio files older than the retention window`);
    return { filesDeleted, fileErrors };
  }

  /** Runs both passes. Overlapping calls share the sweep already in flight. */
  sweep(): Promise<RetentionReport> {
    if (!this.inFlight) {
      this.inFlight = this.runSweep().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch(err => console.error(`[retention] Sweep failed: ${messageFromCause(err)}`));
    }, intervalMs);
    this.timer.unref();
    console.log(`[retention] Sweeping every ${Math.round(intervalMs / 1000)}s`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  private async runSweep(): Promise<RetentionReport> {
    let records: RecordEviction = { evicted: 0, skippedActive: 0 };
    let files: FileCleanup = { filesDeleted: 0, fileErrors: 0 };

    try {
      records = this.evictRecords();
    } catch (err) {
      console.error(`[retention] Record eviction failed: ${messageFromCause(err)}`);
    }
    try {
      files = await this.deleteStaleFiles();
    } catch (err) {
      files = { filesDeleted: 0, fileErrors: 1 };
      console.error(`[retention] File cleanup failed: ${messageFromCause(err)}`);
    }
    return { ...records, ...files };
  }
}
