export type TaskStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type DevicePreference = 'auto' | 'cuda' | 'cpu';

export const DEVICE_PREFERENCES: readonly DevicePreference[] = ['auto', 'cuda', 'cpu'];

/** Generation parameters, frozen at submission time. */
export interface GenerationRequest {
  readonly text: string;
  readonly speakerId: number;
  readonly temperature: number;
  readonly topK: number;
  readonly style: string;
  readonly device: DevicePreference;
}

export interface TaskResult {
  readonly fileUrl: string;
  readonly filePath: string;
  readonly sizeBytes: number;
  readonly durationSeconds: number;
  readonly sampleRate: number;
}

export type FailureStage = 'synthesis' | 'storage' | 'timeout' | 'cancelled' | 'worker' | 'recovery';

export interface TaskError {
  readonly message: string;
  readonly stage: FailureStage;
  readonly device?: string;
}

interface TaskRecordBase {
  readonly id: string;
  readonly request: GenerationRequest;
  readonly progress: number;
  readonly createdAt: number;  // epoch ms
  readonly updatedAt: number;  // epoch ms, bumped on every change
  readonly startedAt?: number;
  readonly finishedAt?: number;
  readonly deviceInfo: string | null;
}

export interface PendingTask extends TaskRecordBase {
  readonly status: 'pending';
  readonly result: null;
  readonly error: null;
}

export interface ProcessingTask extends TaskRecordBase {
  readonly status: 'processing';
  readonly startedAt: number;
  readonly result: null;
  readonly error: null;
}

export interface CompletedTask extends TaskRecordBase {
  readonly status: 'completed';
  readonly finishedAt: number;
  readonly result: TaskResult;
  readonly error: null;
}

export interface FailedTask extends TaskRecordBase {
  readonly status: 'failed';
  readonly finishedAt: number;
  readonly result: null;
  readonly error: TaskError;
}

/**
 * One generation job. Records are frozen values: every transition replaces
 * the stored object, so a record handed out is a snapshot that never changes.
 */
export type TaskRecord = PendingTask | ProcessingTask | CompletedTask | FailedTask;

export type TerminalTask = CompletedTask | FailedTask;

export interface VoiceProfile {
  speakerId: number;
  name: string;
  gender: string;
  description: string;
  sampleUrl?: string;
}

export type EngineKind = 'mock' | 'command';
export type GenerationMode = 'fork' | 'inline';

export interface EngineConfig {
  kind: EngineKind;
  command: string;        // executable for the 'command' engine
  commandArgs: string[];
  mockDelayMs?: number;   // simulated synthesis time for the 'mock' engine
}

export interface ServiceConfig {
  host: string;
  port: number;
  outputDir: string;
  publicAudioPath: string;       // URL prefix the output dir is served under
  voicesFile: string;
  taskStorePath?: string;        // JSON snapshot; in-memory only when unset
  maxStoredTasks: number;
  keepNewest: number;
  fileMaxAgeMs: number;
  sweepIntervalMs: number;
  maxPendingTasks: number;       // queued + running ceiling
  workers: number;
  taskTimeoutMs: number;
  generationMode: GenerationMode;
  engine: EngineConfig;
  maxTextLength: number;
  temperatureRange: readonly [number, number];
  topKRange: readonly [number, number];
  defaults: {
    speakerId: number;
    temperature: number;
    topK: number;
    style: string;
    device: DevicePreference;
  };
}

export const DEFAULT_CONFIG: ServiceConfig = {
  host: '127.0.0.1',
  port: 8765,
  outputDir: 'output/voices',
  publicAudioPath: '/voices',
  voicesFile: 'voices.yaml',
  maxStoredTasks: 1000,
  keepNewest: 500,
  fileMaxAgeMs: 24 * 60 * 60 * 1000,
  sweepIntervalMs: 10 * 60 * 1000,
  maxPendingTasks: 10,
  workers: 1,
  taskTimeoutMs: 60 * 60 * 1000,
  generationMode: 'fork',
  engine: { kind: 'mock', command: '', commandArgs: [] },
  maxTextLength: 5000,
  temperatureRange: [0.1, 1.0],
  topKRange: [1, 100],
  defaults: {
    speakerId: 1,
    temperature: 0.7,
    topK: 50,
    style: 'default',
    device: 'auto',
  },
};
