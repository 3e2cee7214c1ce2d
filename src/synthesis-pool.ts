import { fork, type ChildProcess } from 'node:child_process';
import { createRequire } from 'node:module';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { z } from 'zod';
import { SynthesisError, TaskCancelledError } from './errors.js';
import type { SpeechEngine, SynthesisOptions, SynthesisOutput, SynthesisParams } from './tts.js';
import type { ParentMessage } from './synthesis-worker.js';
import type { EngineConfig } from './types.js';

const ChildMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready') }),
  z.object({ type: z.literal('init-error'), error: z.string() }),
  z.object({ type: z.literal('progress'), id: z.number(), percent: z.number() }),
  z.object({
    type: z.literal('done'),
    id: z.number(),
    audio: z.string(),
    deviceInfo: z.string(),
    sampleRate: z.number().optional(),
  }),
  z.object({ type: z.literal('error'), id: z.number(), error: z.string(), device: z.string().optional() }),
]);

interface Job {
  id: number;
  params: SynthesisParams;
  options: SynthesisOptions;
  settled: boolean;
  detach: () => void;
  resolve: (output: SynthesisOutput) => void;
  reject: (err: Error) => void;
}

interface ProcState {
  proc: ChildProcess;
  ready: boolean;
  job: Job | null;
}

function abortReason(signal: AbortSignal | undefined): Error {
  return signal?.reason instanceof Error ? signal.reason : new TaskCancelledError();
}

/**
 * Hosts the speech engine in forked child processes so synthesis never blocks
 * the event loop. One job per child; a child that dies fails its job and is
 * replaced.
 */
export class SynthesisPool implements SpeechEngine {
  readonly name: string;
  private states: ProcState[] = [];
  private queue: Job[] = [];
  private nextId = 0;
  private starting = 0;
  private closing = false;

  constructor(
    private readonly engine: EngineConfig,
    readonly size = 1,
  ) {
    this.name = `pool:${engine.kind}`;
  }

  async init(): Promise<void> {
    // Each child pipes its stderr here; raise the listener limit to avoid spurious warnings
    process.stderr.setMaxListeners(this.size * 4 + process.stderr.getMaxListeners());
    await Promise.all(Array.from({ length: this.size }, () => this.spawn()));
    console.log(`[pool] ${this.size} synthesis process${this.size === 1 ? '' : 'es'} ready (${this.engine.kind})`);
  }

  generate(params: SynthesisParams, options: SynthesisOptions = {}): Promise<SynthesisOutput> {
    if (this.closing) return Promise.reject(new Error('Synthesis pool is closed'));
    const { signal } = options;
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    return new Promise((resolve, reject) => {
      const onAbort = () => this.abort(job);
      const job: Job = {
        id: this.nextId++,
        params,
        options,
        settled: false,
        detach: () => signal?.removeEventListener('abort', onAbort),
        resolve,
        reject,
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(job);
      if (!this.hasCapacity()) this.replace();
      this.dispatch();
    });
  }

  async close(): Promise<void> {
    this.closing = true;
    for (const job of this.queue.splice(0)) this.settle(job, new Error('Synthesis pool is closed'));
    await Promise.all(
      this.states.map(
        s => new Promise<void>(resolve => {
          if (s.proc.exitCode !== null || s.proc.signalCode !== null) {
            resolve();
            return;
          }
          s.proc.once('exit', () => resolve());
          s.proc.kill('SIGTERM');
        }),
      ),
    );
    this.states = [];
  }

  private hasCapacity(): boolean {
    return this.starting > 0 || this.states.some(s => s.ready);
  }

  private spawn(): Promise<void> {
    this.starting++;
    return this.startProcess().finally(() => {
      this.starting--;
    });
  }

  // Queued jobs fail only once no child is ready or starting.
  private replace(): void {
    this.spawn().catch(err => {
      if (this.closing) return;
      console.error(`[pool] Could not replace synthesis process: ${err instanceof Error ? err.message : String(err)}`);
      if (!this.hasCapacity()) {
        for (const job of this.queue.splice(0)) this.settle(job, new SynthesisError('No synthesis process available'));
      }
    });
  }

  private startProcess(): Promise<void> {
    // Detect tsx dev mode vs compiled JS
    const isTsx = import.meta.url.endsWith('.ts');
    const workerFile = isTsx ? './synthesis-worker.ts' : './synthesis-worker.js';
    const workerPath = fileURLToPath(new URL(workerFile, import.meta.url));

    // Resolve tsx/esm absolute path so it works reliably from any cwd
    const execArgv: string[] = [];
    if (isTsx) {
      const req = createRequire(import.meta.url);
      execArgv.push('--import', pathToFileURL(req.resolve('tsx/esm')).href);
    }

    return new Promise<void>((resolve, reject) => {
      const proc = fork(workerPath, [], {
        execArgv,
        env: { ...process.env, SYNTH_ENGINE: JSON.stringify(this.engine) },
        silent: true, // capture stderr so engine logs don't clutter output
      });
      const state: ProcState = { proc, ready: false, job: null };
      this.states.push(state);

      proc.on('message', (raw: unknown) => {
        const parsed = ChildMessageSchema.safeParse(raw);
        if (!parsed.success) return;
        const msg = parsed.data;

        if (msg.type === 'ready') {
          state.ready = true;
          resolve();
          this.dispatch();
          return;
        }
        if (msg.type === 'init-error') {
          reject(new Error(`Synthesis process failed to start: ${msg.error}`));
          return;
        }

        const job = state.job;
        if (!job || job.id !== msg.id) return;
        if (msg.type === 'progress') {
          if (!job.settled) job.options.onProgress?.(msg.percent);
          return;
        }

        state.job = null;
        if (msg.type === 'done') {
          this.settle(job, null, {
            audio: Buffer.from(msg.audio, 'base64'),
            deviceInfo: msg.deviceInfo,
            sampleRate: msg.sampleRate,
          });
        } else {
          this.settle(job, new SynthesisError(msg.error, msg.device));
        }
        this.dispatch();
      });

      // Surface child stderr in the parent's stderr
      proc.stderr?.pipe(process.stderr);
      proc.on('error', err => {
        if (!state.ready) reject(err);
      });
      proc.on('exit', (code, signal) => {
        if (!state.ready) {
          this.states = this.states.filter(s => s !== state);
          reject(new Error(`Synthesis process exited during start (${signal ?? `code ${code}`})`));
          return;
        }
        this.onExit(state, code, signal);
      });
    });
  }

  private onExit(state: ProcState, code: number | null, signal: NodeJS.Signals | null): void {
    this.states = this.states.filter(s => s !== state);
    if (this.closing) return;

    const reason = signal ?? `code ${code}`;
    console.error(`[pool] Synthesis process ${state.proc.pid} exited (${reason}), starting a replacement`);
    if (state.job) {
      this.settle(state.job, new SynthesisError(`Synthesis process exited unexpectedly (${reason})`));
      state.job = null;
    }
    this.replace();
  }

  private dispatch(): void {
    while (this.queue.length > 0) {
      const idle = this.states.find(s => s.ready && !s.job);
      if (!idle) break;
      const job = this.queue.shift();
      if (!job) break;
      idle.job = job;
      const msg: ParentMessage = { type: 'generate', id: job.id, params: { ...job.params } };
      idle.proc.send(msg);
    }
  }

  // Queued jobs leave the queue; running ones are told to stop and their
  // child stays busy until it answers.
  private abort(job: Job): void {
    if (job.settled) return;
    const index = this.queue.indexOf(job);
    if (index >= 0) {
      this.queue.splice(index, 1);
    } else {
      const owner = this.states.find(s => s.job === job);
      const msg: ParentMessage = { type: 'abort', id: job.id };
      owner?.proc.send(msg);
    }
    this.settle(job, abortReason(job.options.signal));
  }

  private settle(job: Job, err: Error | null, output?: SynthesisOutput): void {
    if (job.settled) return;
    job.settled = true;
    job.detach();
    if (err) job.reject(err);
    else if (output) job.resolve(output);
  }
}
