import type { ArtifactStorage } from './artifacts.js';
import type { TaskListFilter, TaskStore } from './task-store.js';
import type { FailureStage, TaskRecord, TaskStatus } from './types.js';

/** Wire shape of a task as returned by the HTTP API. */
export interface TaskResponse {
  task_id: string;
  status: TaskStatus;
  progress: number;
  result: {
    file_url: string;
    duration: number;
    sample_rate: number;
    size_bytes: number;
  } | null;
  error: string | null;
  error_stage: FailureStage | null;
  device_info: string | null;
  created_at: string;
  updated_at: string;
}

export function toTaskResponse(record: TaskRecord): TaskResponse {
  return {
    task_id: record.id,
    status: record.status,
    progress: record.progress,
    result: record.result && {
      file_url: record.result.fileUrl,
      duration: record.result.durationSeconds,
      sample_rate: record.result.sampleRate,
      size_bytes: record.result.sizeBytes,
    },
    error: record.error?.message ?? null,
    error_stage: record.error?.stage ?? null,
    device_info: record.deviceInfo,
    created_at: new Date(record.createdAt).toISOString(),
    updated_at: new Date(record.updatedAt).toISOString(),
  };
}

/** Read-only view over the store for pollers. Never mutates a record. */
export class StatusQueryService {
  constructor(
    private readonly store: TaskStore,
    private readonly artifacts: Pick<ArtifactStorage, 'exists' | 'urlFor'>,
  ) {}

  get(taskId: string): TaskRecord | undefined {
    return this.store.get(taskId);
  }

  list(filter: TaskListFilter = {}): TaskRecord[] {
    return this.store.list(filter);
  }

  /** URL of the task's audio if the conventional file is still on disk. */
  locateArtifact(taskId: string): string | null {
    return this.artifacts.exists(taskId) ? this.artifacts.urlFor(taskId) : null;
  }
}
