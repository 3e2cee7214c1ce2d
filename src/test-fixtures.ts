import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SynthesisError, TaskCancelledError } from './errors.js';
import { TaskStore, type TaskStoreOptions } from './task-store.js';
import type { SpeechEngine, SynthesisOptions, SynthesisOutput, SynthesisParams } from './tts.js';
import type { AudioInfo, AudioProbe } from './audio-probe.js';
import { createVoiceCatalog, type VoiceCatalog } from './voices.js';
import type { GenerationRequest } from './types.js';

export function testVoices(): VoiceCatalog {
  return createVoiceCatalog([
    { speakerId: 1, name: 'Commander', gender: 'male', description: 'Steady and low' },
    { speakerId: 2, name: 'Scientist', gender: 'female', description: 'Precise' },
    { speakerId: 3, name: 'Hero', gender: 'male', description: 'Bright' },
    { speakerId: 4, name: 'Elder', gender: 'male', description: 'Slow and warm' },
  ]);
}

export function makeRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    text: 'Hello',
    speakerId: 1,
    temperature: 0.7,
    topK: 50,
    style: 'default',
    device: 'auto',
    ...overrides,
  };
}

export interface ManualClock {
  now: () => number;
  advance: (ms: number) => void;
  set: (ms: number) => void;
}

export function manualClock(start = 1_700_000_000_000): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance: ms => {
      current += ms;
    },
    set: ms => {
      current = ms;
    },
  };
}

export function makeStoreWithClock(options: Omit<TaskStoreOptions, 'now' | 'newId'> = {}): {
  store: TaskStore;
  clock: ManualClock;
} {
  const clock = manualClock();
  let seq = 0;
  const store = new TaskStore({
    ...options,
    now: clock.now,
    newId: () => `task-${++seq}`,
  });
  return { store, clock };
}

export async function withTempDir(run: (dir: string) => Promise<void> | void): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'charvox-test-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Resolves once `check` holds, polling every few milliseconds. */
export async function eventually(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error('Condition not met in time');
    await sleep(5);
  }
}

interface PendingCall {
  params: SynthesisParams;
  options: SynthesisOptions;
  resolve: (output: SynthesisOutput) => void;
  reject: (err: Error) => void;
}

/**
 * Engine whose calls stay open until the test settles them. Aborts reject the
 * open call the way a real engine would.
 */
export class FakeEngine implements SpeechEngine {
  readonly name = 'fake';
  readonly calls: PendingCall[] = [];

  generate(params: SynthesisParams, options: SynthesisOptions = {}): Promise<SynthesisOutput> {
    const { signal } = options;
    return new Promise((resolve, reject) => {
      this.calls.push({ params, options, resolve, reject });
      if (!signal) return;
      signal.addEventListener(
        'abort',
        () => reject(signal.reason instanceof Error ? signal.reason : new TaskCancelledError()),
        { once: true },
      );
    });
  }

  get last(): PendingCall {
    const call = this.calls[this.calls.length - 1];
    if (!call) throw new Error('FakeEngine has not been called');
    return call;
  }

  progress(percent: number, index = this.calls.length - 1): void {
    this.calls[index]?.options.onProgress?.(percent);
  }

  succeed(deviceInfo = 'cpu', audio: Uint8Array = new Uint8Array([82, 73, 70, 70]), index = this.calls.length - 1): void {
    this.calls[index]?.resolve({ audio, deviceInfo, sampleRate: 24000 });
  }

  fail(message: string, device?: string, index = this.calls.length - 1): void {
    this.calls[index]?.reject(new SynthesisError(message, device));
  }
}

/** Engine that answers immediately with a fixed device. */
export class InstantEngine implements SpeechEngine {
  readonly name = 'instant';

  constructor(private readonly deviceInfo = 'cpu') {}

  async generate(_params: SynthesisParams, options: SynthesisOptions = {}): Promise<SynthesisOutput> {
    options.onProgress?.(100);
    return { audio: new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]), deviceInfo: this.deviceInfo, sampleRate: 24000 };
  }
}

export class FakeProbe implements AudioProbe {
  constructor(private readonly info: AudioInfo = { durationSeconds: 1.25, sampleRate: 24000 }) {}

  async probe(_path: string): Promise<AudioInfo> {
    return this.info;
  }
}
