import { DeadlineExceededError, SynthesisError, TaskCancelledError, messageFromCause } from './errors.js';
import { isTerminal } from './state-machine.js';
import type { ArtifactStorage } from './artifacts.js';
import type { AudioProbe } from './audio-probe.js';
import type { TaskStore } from './task-store.js';
import type { SpeechEngine, SynthesisOutput } from './tts.js';
import type { FailureStage, GenerationRequest, TaskError } from './types.js';

export interface GenerationWorkerDeps {
  store: TaskStore;
  engine: SpeechEngine;
  artifacts: Pick<ArtifactStorage, 'write' | 'urlFor'>;
  probe: AudioProbe;
  /** Upper bound on one engine call; 0 disables the deadline. */
  timeoutMs: number;
}

// Engine progress (0-100) is mapped onto this band of task progress.
const STARTED_PROGRESS = 5;
const SYNTH_SPAN = 75;
const SYNTHESIZED_PROGRESS = 85;
const STORED_PROGRESS = 95;

function classify(err: unknown, stage: FailureStage): TaskError {
  if (err instanceof DeadlineExceededError) return { message: err.message, stage: 'timeout' };
  if (err instanceof TaskCancelledError) return { message: err.message, stage: 'cancelled' };
  if (err instanceof SynthesisError) {
    return err.device ? { message: err.message, stage: 'synthesis', device: err.device } : { message: err.message, stage: 'synthesis' };
  }
  return { message: messageFromCause(err), stage };
}

/**
 * Carries one task from pending to a terminal state. `run` never rejects:
 * every failure is recorded on the task.
 */
export class GenerationWorker {
  constructor(private readonly deps: GenerationWorkerDeps) {}

  async run(taskId: string, signal?: AbortSignal): Promise<void> {
    const { store } = this.deps;
    const task = store.get(taskId);
    if (!task || task.status !== 'pending') {
      console.warn(`[worker] Skipping task ${taskId}: ${task ? `already ${task.status}` : 'not found'}`);
      return;
    }

    const startedAt = Date.now();
    store.markProcessing(taskId, STARTED_PROGRESS);
    console.log(
      `[worker] Task ${taskId} started: speaker ${task.request.speakerId}, ` +
      `${task.request.text.length} chars, device ${task.request.device}`,
    );

    let stage: FailureStage = 'synthesis';
    try {
      const output = await this.synthesize(taskId, task.request, signal);
      stage = 'storage';
      this.advance(taskId, SYNTHESIZED_PROGRESS);

      const stored = await this.deps.artifacts.write(taskId, output.audio);
      this.advance(taskId, STORED_PROGRESS);
      const info = await this.deps.probe.probe(stored.path);

      store.complete(
        taskId,
        {
          fileUrl: this.deps.artifacts.urlFor(taskId),
          filePath: stored.path,
          sizeBytes: stored.sizeBytes,
          durationSeconds: info.durationSeconds,
          sampleRate: info.sampleRate || output.sampleRate || 0,
        },
        output.deviceInfo,
      );
      const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);
      console.log(`[worker] Task ${taskId} completed in ${elapsed}s on ${output.deviceInfo} (${info.durationSeconds.toFixed(2)}s audio)`);
    } catch (err) {
      this.recordFailure(taskId, classify(err, stage));
    }
  }

  /** Engine call bounded by the deadline and the caller's signal. A late result is dropped. */
  private async synthesize(taskId: string, request: GenerationRequest, signal?: AbortSignal): Promise<SynthesisOutput> {
    const controller = new AbortController();
    const onCancel = () => controller.abort(new TaskCancelledError());
    if (signal?.aborted) onCancel();
    else signal?.addEventListener('abort', onCancel, { once: true });

    const { timeoutMs } = this.deps;
    const timer = timeoutMs > 0
      ? setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs)
      : undefined;

    const aborted = new Promise<never>((_resolve, reject) => {
      const fire = () => reject(controller.signal.reason);
      if (controller.signal.aborted) fire();
      else controller.signal.addEventListener('abort', fire, { once: true });
    });

    try {
      return await Promise.race([
        this.deps.engine.generate(request, {
          signal: controller.signal,
          onProgress: percent => {
            if (controller.signal.aborted) return;
            const bounded = Math.min(100, Math.max(0, percent));
            this.advance(taskId, STARTED_PROGRESS + (bounded * SYNTH_SPAN) / 100);
          },
        }),
        aborted,
      ]);
    } finally {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onCancel);
    }
  }

  private advance(taskId: string, progress: number): void {
    if (this.deps.store.get(taskId)?.status !== 'processing') return;
    this.deps.store.updateProgress(taskId, progress);
  }

  private recordFailure(taskId: string, error: TaskError): void {
    const current = this.deps.store.get(taskId);
    if (!current || isTerminal(current)) {
      console.warn(`[worker] Task ${taskId} already settled, dropping failure: ${error.message}`);
      return;
    }
    this.deps.store.fail(taskId, error, error.device);
    console.error(`[worker] Task ${taskId} failed at ${error.stage}: ${error.message}`);
  }
}
