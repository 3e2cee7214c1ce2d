import { randomUUID } from 'node:crypto';
import { DeadlineExceededError, IllegalTransitionError, TaskNotFoundError, messageFromCause } from './errors.js';
import { isTerminal, isTransitionAllowed } from './state-machine.js';
import type {
  CompletedTask,
  FailedTask,
  GenerationRequest,
  PendingTask,
  ProcessingTask,
  TaskError,
  TaskRecord,
  TaskResult,
  TaskStatus,
  TerminalTask,
} from './types.js';

export interface TaskStorePersistence {
  load(): TaskRecord[];
  save(records: readonly TaskRecord[]): void;
}

export interface TaskStoreOptions {
  now?: () => number;
  newId?: () => string;
  persistence?: TaskStorePersistence;
}

export interface TaskListFilter {
  status?: TaskStatus;
  limit?: number;
}

type ChangeListener = (record: TaskRecord) => void;

/** Highest progress a task may report before it has actually completed. */
export const MAX_ACTIVE_PROGRESS = 99;

function seal<T extends TaskRecord>(record: T): T {
  Object.freeze(record.request);
  if (record.result) Object.freeze(record.result);
  if (record.error) Object.freeze(record.error);
  Object.freeze(record);
  return record;
}

function clampProgress(value: number, floor: number): number {
  if (!Number.isFinite(value)) return floor;
  return Math.min(MAX_ACTIVE_PROGRESS, Math.max(floor, Math.round(value * 10) / 10));
}

/**
 * Owns every TaskRecord. All operations are synchronous, so each one runs to
 * completion on the event loop before any submission, poll, worker update or
 * sweep can observe the map.
 */
export class TaskStore {
  private readonly records = new Map<string, TaskRecord>();
  private readonly listeners = new Set<ChangeListener>();
  private readonly now: () => number;
  private readonly newId: () => string;
  private readonly persistence?: TaskStorePersistence;

  constructor(options: TaskStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.newId = options.newId ?? randomUUID;
    this.persistence = options.persistence;
    if (this.persistence) this.hydrate(this.persistence.load());
  }

  get size(): number {
    return this.records.size;
  }

  create(request: GenerationRequest): PendingTask {
    const id = this.newId();
    if (this.records.has(id)) {
      throw new Error(`Task id ${id} is already in use`);
    }
    const now = this.now();
    const record = seal<PendingTask>({
      id,
      status: 'pending',
      request: { ...request },
      progress: 0,
      createdAt: now,
      updatedAt: now,
      deviceInfo: null,
      result: null,
      error: null,
    });
    this.commit(record, true);
    return record;
  }

  get(id: string): TaskRecord | undefined {
    return this.records.get(id);
  }

  /** Newest first by last update. */
  list(filter: TaskListFilter = {}): TaskRecord[] {
    let records = [...this.records.values()];
    if (filter.status) records = records.filter(r => r.status === filter.status);
    records.sort((a, b) => b.updatedAt - a.updatedAt || b.createdAt - a.createdAt);
    return filter.limit !== undefined ? records.slice(0, Math.max(0, filter.limit)) : records;
  }

  /**
   * Newest first by creation. Map order is insertion order, so tasks created
   * in the same millisecond keep the order they were submitted in.
   */
  listByCreation(): TaskRecord[] {
    return [...this.records.values()].reverse().sort((a, b) => b.createdAt - a.createdAt);
  }

  countActive(): number {
    let count = 0;
    for (const record of this.records.values()) {
      if (!isTerminal(record)) count++;
    }
    return count;
  }

  markProcessing(id: string, progress = 0): ProcessingTask {
    const current = this.require(id);
    if (current.status !== 'pending') {
      throw new IllegalTransitionError(id, current.status, 'processing');
    }
    const at = this.touch(current);
    const record = seal<ProcessingTask>({
      ...current,
      status: 'processing',
      progress: clampProgress(progress, 0),
      startedAt: at,
      updatedAt: at,
    });
    this.commit(record, true);
    return record;
  }

  /** Lower values than the current progress are ignored. */
  updateProgress(id: string, progress: number): ProcessingTask {
    const current = this.require(id);
    if (current.status !== 'processing') {
      throw new IllegalTransitionError(id, current.status, 'processing');
    }
    const next = clampProgress(progress, current.progress);
    if (next === current.progress) return current;
    const record = seal<ProcessingTask>({ ...current, progress: next, updatedAt: this.touch(current) });
    this.commit(record, false);
    return record;
  }

  complete(id: string, result: TaskResult, deviceInfo: string | null): CompletedTask {
    const current = this.require(id);
    if (current.status !== 'processing') {
      throw new IllegalTransitionError(id, current.status, 'completed');
    }
    const at = this.touch(current);
    const record = seal<CompletedTask>({
      ...current,
      status: 'completed',
      progress: 100,
      result: { ...result },
      error: null,
      deviceInfo,
      updatedAt: at,
      finishedAt: at,
    });
    this.commit(record, true);
    return record;
  }

  fail(id: string, error: TaskError, deviceInfo?: string | null): FailedTask {
    const current = this.require(id);
    if (!isTransitionAllowed(current.status, 'failed')) {
      throw new IllegalTransitionError(id, current.status, 'failed');
    }
    const at = this.touch(current);
    const record = seal<FailedTask>({
      id: current.id,
      request: current.request,
      createdAt: current.createdAt,
      startedAt: current.startedAt,
      status: 'failed',
      progress: current.progress,
      result: null,
      error: { ...error },
      deviceInfo: deviceInfo !== undefined ? deviceInfo : current.deviceInfo,
      updatedAt: at,
      finishedAt: at,
    });
    this.commit(record, true);
    return record;
  }

  /** Removes the given records if terminal; returns the ids actually removed. */
  evict(ids: Iterable<string>): string[] {
    const removed: string[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (!record || !isTerminal(record)) continue;
      this.records.delete(id);
      removed.push(id);
    }
    if (removed.length > 0) this.persist();
    return removed;
  }

  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once the task is terminal. Polling stays the external contract. */
  waitForTerminal(id: string, timeoutMs?: number): Promise<TerminalTask> {
    const current = this.records.get(id);
    if (!current) return Promise.reject(new TaskNotFoundError(id));
    if (isTerminal(current)) return Promise.resolve(current);

    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const unsubscribe = this.onChange(record => {
        if (record.id !== id || !isTerminal(record)) return;
        cleanup();
        resolve(record);
      });
      const cleanup = () => {
        unsubscribe();
        if (timer) clearTimeout(timer);
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new DeadlineExceededError(timeoutMs));
        }, timeoutMs);
      }
    });
  }

  private require(id: string): TaskRecord {
    const record = this.records.get(id);
    if (!record) throw new TaskNotFoundError(id);
    return record;
  }

  // Strictly increasing so that successive snapshots of a task never share a timestamp.
  private touch(record: TaskRecord): number {
    return Math.max(this.now(), record.updatedAt + 1);
  }

  private commit(record: TaskRecord, persist: boolean): void {
    this.records.set(record.id, record);
    if (persist) this.persist();
    for (const listener of this.listeners) listener(record);
  }

  private persist(): void {
    if (!this.persistence) return;
    try {
      this.persistence.save([...this.records.values()]);
    } catch (err) {
      console.error(`[store] Failed to persist ${this.records.size} tasks: ${messageFromCause(err)}`);
    }
  }

  // Work that was queued or running when the previous process stopped cannot resume.
  private hydrate(records: TaskRecord[]): void {
    let recovered = 0;
    for (const record of records) {
      if (isTerminal(record)) {
        this.records.set(record.id, seal({ ...record }));
        continue;
      }
      const at = Math.max(this.now(), record.updatedAt);
      this.records.set(record.id, seal<FailedTask>({
        id: record.id,
        request: record.request,
        createdAt: record.createdAt,
        startedAt: record.startedAt,
        status: 'failed',
        progress: record.progress,
        result: null,
        error: { message: `Interrupted while ${record.status} by a server restart`, stage: 'recovery' },
        deviceInfo: record.deviceInfo,
        updatedAt: at,
        finishedAt: at,
      }));
      recovered++;
    }
    if (records.length > 0) {
      console.log(`[store] Loaded ${records.length} tasks (${recovered} interrupted)`);
    }
    if (recovered > 0) this.persist();
  }
}
