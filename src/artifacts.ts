import { existsSync } from 'node:fs';
import { mkdir, readdir, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export const ARTIFACT_PREFIX = 'voice_';
export const ARTIFACT_EXT = '.wav';
const PARTIAL_EXT = '.part';

const SAFE_TASK_ID = /^[A-Za-z0-9-]{1,64}$/;

/** Conventional output filename: voice_<taskId>.wav */
export function artifactFileName(taskId: string): string {
  return `${ARTIFACT_PREFIX}${taskId}${ARTIFACT_EXT}`;
}

export function isSafeTaskId(taskId: string): boolean {
  return SAFE_TASK_ID.test(taskId);
}

export interface StoredArtifact {
  path: string;
  sizeBytes: number;
}

export interface ArtifactEntry {
  name: string;
  path: string;
  mtimeMs: number;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Generated audio lives in one flat directory, one file per task, named after
 * the task id so a client can derive its URL without the task record.
 */
export class ArtifactStorage {
  constructor(readonly dir: string, readonly publicPath: string) {}

  pathFor(taskId: string): string {
    if (!isSafeTaskId(taskId)) throw new Error(`Refusing artifact path for task id: ${taskId}`);
    return join(this.dir, artifactFileName(taskId));
  }

  urlFor(taskId: string): string {
    return `${this.publicPath}/${artifactFileName(taskId)}`;
  }

  async ensureDir(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  /** Writes through a temp file so a sweep never sees a half-written artifact. */
  async write(taskId: string, audio: Uint8Array): Promise<StoredArtifact> {
    const path = this.pathFor(taskId);
    const tmpPath = `${path}${PARTIAL_EXT}`;
    await this.ensureDir();
    try {
      await writeFile(tmpPath, audio);
      await rename(tmpPath, path);
    } catch (err) {
      await this.remove(tmpPath);
      throw err;
    }
    return { path, sizeBytes: audio.byteLength };
  }

  exists(taskId: string): boolean {
    return isSafeTaskId(taskId) && existsSync(this.pathFor(taskId));
  }

  /**
   * Files matching the artifact naming convention, plus partial writes left by
   * a crash; a missing directory is empty.
   */
  async listArtifacts(): Promise<ArtifactEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const entries: ArtifactEntry[] = [];
    for (const name of names) {
      if (!name.startsWith(ARTIFACT_PREFIX)) continue;
      if (!name.endsWith(ARTIFACT_EXT) && !name.endsWith(ARTIFACT_EXT + PARTIAL_EXT)) continue;
      const path = join(this.dir, name);
      try {
        const info = await stat(path);
        if (info.isFile()) entries.push({ name, path, mtimeMs: info.mtimeMs });
      } catch (err) {
        // Deleted between readdir and stat
        if (!isNotFound(err)) throw err;
      }
    }
    return entries;
  }

  /** Removing a file that is already gone is not an error. */
  async remove(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }
}
