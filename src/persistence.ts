import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { messageFromCause } from './errors.js';
import type { TaskStorePersistence } from './task-store.js';
import type { TaskRecord } from './types.js';

export const TASK_SNAPSHOT_SCHEMA_VERSION = 1;

const RequestSchema = z.object({
  text: z.string(),
  speakerId: z.number().int(),
  temperature: z.number(),
  topK: z.number().int(),
  style: z.string(),
  device: z.enum(['auto', 'cuda', 'cpu']),
});

const epochMs = z.number().int().nonnegative();

const base = {
  id: z.string().min(1),
  request: RequestSchema,
  progress: z.number().min(0).max(100),
  createdAt: epochMs,
  updatedAt: epochMs,
  startedAt: epochMs.optional(),
  finishedAt: epochMs.optional(),
  deviceInfo: z.string().nullable(),
};

const TaskRecordSchema = z.discriminatedUnion('status', [
  z.object({ ...base, status: z.literal('pending'), result: z.null(), error: z.null() }),
  z.object({ ...base, status: z.literal('processing'), startedAt: epochMs, result: z.null(), error: z.null() }),
  z.object({
    ...base,
    status: z.literal('completed'),
    finishedAt: epochMs,
    result: z.object({
      fileUrl: z.string().min(1),
      filePath: z.string().min(1),
      sizeBytes: z.number().int().nonnegative(),
      durationSeconds: z.number().nonnegative(),
      sampleRate: z.number().int().nonnegative(),
    }),
    error: z.null(),
  }),
  z.object({
    ...base,
    status: z.literal('failed'),
    finishedAt: epochMs,
    result: z.null(),
    error: z.object({
      message: z.string().min(1),
      stage: z.enum(['synthesis', 'storage', 'timeout', 'cancelled', 'worker', 'recovery']),
      device: z.string().optional(),
    }),
  }),
]);

const SnapshotSchema = z.object({
  schemaVersion: z.literal(TASK_SNAPSHOT_SCHEMA_VERSION),
  savedAt: epochMs,
  records: z.array(z.unknown()),
});

export function parseTaskRecord(value: unknown): TaskRecord | undefined {
  const parsed = TaskRecordSchema.safeParse(value);
  if (!parsed.success) return undefined;
  const record: TaskRecord = parsed.data;
  return record;
}

/** Parses a snapshot document; invalid entries are dropped and counted. */
export function parseTaskSnapshot(raw: unknown): { records: TaskRecord[]; dropped: number } {
  const snapshot = SnapshotSchema.parse(raw);
  const records: TaskRecord[] = [];
  let dropped = 0;
  for (const entry of snapshot.records) {
    const record = parseTaskRecord(entry);
    if (record) records.push(record);
    else dropped++;
  }
  return { records, dropped };
}

/**
 * Stores the task map as one JSON document, replaced atomically on each save.
 * A file that cannot be read back is moved aside rather than overwritten.
 */
export function createJsonTaskPersistence(filePath: string, now: () => number = Date.now): TaskStorePersistence {
  return {
    load(): TaskRecord[] {
      if (!existsSync(filePath)) return [];
      try {
        const { records, dropped } = parseTaskSnapshot(JSON.parse(readFileSync(filePath, 'utf-8')));
        if (dropped > 0) console.warn(`[store] Dropped ${dropped} invalid task entries from ${filePath}`);
        return records;
      } catch (err) {
        const aside = `${filePath}.corrupt-${now()}`;
        renameSync(filePath, aside);
        console.error(`[store] Unreadable task snapshot moved to ${aside}: ${messageFromCause(err)}`);
        return [];
      }
    },

    save(records: readonly TaskRecord[]): void {
      mkdirSync(dirname(filePath), { recursive: true });
      const tmpPath = `${filePath}.tmp`;
      const doc = { schemaVersion: TASK_SNAPSHOT_SCHEMA_VERSION, savedAt: now(), records };
      writeFileSync(tmpPath, `${JSON.stringify(doc, null, 2)}\n`, 'utf-8');
      renameSync(tmpPath, filePath);
    },
  };
}
